import type { AnnotationAnalyzer } from "../../domain/analysis/analyzer";
import type {
  AnnotatedDocument,
  DocumentMatch,
} from "../../domain/entities/annotated-document";
import type { AnnotatedDocumentRepository } from "../ports/annotated-document-repository";

interface SearchDocumentsUseCaseDependencies {
  readonly repository: AnnotatedDocumentRepository;
  readonly analyzer: AnnotationAnalyzer;
}

interface IndexDocumentRequest {
  readonly id: string;
  readonly text: string;
}

interface SearchDocumentsRequest {
  readonly query: string;
}

export interface SearchDocumentsResponse {
  readonly matches: DocumentMatch[];
  readonly guidance: string;
}

const FIXED_LIMIT = 5;

export class SearchDocumentsUseCase {
  private readonly repository: AnnotatedDocumentRepository;
  private readonly analyzer: AnnotationAnalyzer;

  constructor({ repository, analyzer }: SearchDocumentsUseCaseDependencies) {
    this.repository = repository;
    this.analyzer = analyzer;
  }

  async index({ id, text }: IndexDocumentRequest): Promise<AnnotatedDocument> {
    if (id.trim().length === 0) {
      throw new Error("Document id must not be empty.");
    }

    const { prefix, suffix } = this.analyzer.settings;
    const terms: string[] = [];
    const synonyms: string[] = [];
    const synonymPayloads: string[] = [];
    for (const token of this.analyzer.analyze(text)) {
      if (this.analyzer.isSynonym(token)) {
        synonyms.push(token.text);
        synonymPayloads.push(
          token.text.slice(prefix.length, token.text.length - suffix.length),
        );
      } else if (token.text.length > 0) {
        terms.push(token.text);
      }
    }

    const document: AnnotatedDocument = {
      id,
      text,
      terms,
      synonyms,
      synonymPayloads,
    };
    await this.repository.add(document);
    return document;
  }

  async execute({
    query,
  }: SearchDocumentsRequest): Promise<SearchDocumentsResponse> {
    if (query.trim().length === 0) {
      throw new Error("Search query must not be empty.");
    }

    const matches = await this.repository.search(query, FIXED_LIMIT);
    return {
      matches,
      guidance: this.buildGuidance(matches, query),
    };
  }

  private buildGuidance(matches: DocumentMatch[], query: string): string {
    const [first] = matches;
    if (!first) {
      return `No documents matched the query: ${query}. Annotated synonyms such as "Mozart[artist]" are searchable by "artist".`;
    }

    if (matches.length === 1) {
      return `Single document match found for query "${query}" -> ${first.document.id}.`;
    }

    return "";
  }
}
