import type { AnnotatedDocument, DocumentMatch } from "../../domain/entities/annotated-document";

export interface AnnotatedDocumentRepository {
  add(document: AnnotatedDocument): Promise<void>;
  search(query: string, limit: number): Promise<DocumentMatch[]>;
  size(): Promise<number>;
}
