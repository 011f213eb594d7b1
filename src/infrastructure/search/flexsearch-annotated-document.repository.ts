import FlexSearch, { type Document } from "flexsearch";
import type { AnnotatedDocumentRepository } from "../../application/ports/annotated-document-repository";
import type { AnnotatedDocument, DocumentMatch } from "../../domain/entities/annotated-document";
import { WORD_BOUNDARY } from "../../domain/constants/text-processing";

const FIELD_WEIGHTS: Record<string, number> = {
  synonyms: 3,
  terms: 2,
};

interface IndexDocument {
  id: string;
  terms: string;
  synonyms: string;
  [key: string]: string;
}

type DocumentIndex = Document<IndexDocument, false>;

interface ScoreEntry {
  score: number;
  matched: Set<string>;
}

export class FlexSearchAnnotatedDocumentRepository
  implements AnnotatedDocumentRepository
{
  private readonly documents = new Map<string, AnnotatedDocument>();
  private readonly index: DocumentIndex = new FlexSearch.Document<
    IndexDocument,
    false
  >({
    tokenize: "strict",
    document: {
      id: "id",
      index: ["terms", "synonyms"],
    },
  });

  async add(document: AnnotatedDocument): Promise<void> {
    const entry: IndexDocument = {
      id: document.id,
      terms: document.terms.join(" "),
      synonyms: document.synonymPayloads.join(" "),
    };

    if (this.documents.has(document.id)) {
      this.index.update(entry);
    } else {
      this.index.add(entry);
    }
    this.documents.set(document.id, document);
  }

  async search(query: string, limit: number): Promise<DocumentMatch[]> {
    if (this.documents.size === 0) {
      return [];
    }

    const scores = new Map<string, ScoreEntry>();
    for (const keyword of tokenize(query)) {
      const results = this.index.search(keyword, {
        limit: this.documents.size,
      });

      for (const fieldResult of results) {
        for (const entry of fieldResult.result) {
          const id = resolveDocumentId(entry);
          if (id === undefined || !this.documents.has(id)) {
            continue;
          }
          this.updateScore(scores, id, fieldResult.field, keyword);
        }
      }
    }

    return this.rankResults(scores).slice(0, limit);
  }

  async size(): Promise<number> {
    return this.documents.size;
  }

  private updateScore(
    scores: Map<string, ScoreEntry>,
    id: string,
    field: string,
    keyword: string,
  ): void {
    const current = scores.get(id) ?? { score: 0, matched: new Set<string>() };
    current.score += FIELD_WEIGHTS[field] ?? 1;

    const document = this.documents.get(id);
    if (field === "synonyms" && document) {
      document.synonymPayloads.forEach((payload, index) => {
        const synonym = document.synonyms[index];
        if (synonym !== undefined && tokenize(payload).includes(keyword)) {
          current.matched.add(synonym);
        }
      });
    }

    scores.set(id, current);
  }

  private rankResults(scores: Map<string, ScoreEntry>): DocumentMatch[] {
    return Array.from(scores.entries())
      .map(([id, value]) => {
        const document = this.documents.get(id);
        if (!document) {
          throw new Error(`Indexed document missing for id ${id}`);
        }

        return {
          document,
          score: value.score,
          matchedSynonyms: Array.from(value.matched).sort((a, b) =>
            a.localeCompare(b),
          ),
        } satisfies DocumentMatch;
      })
      .sort((a, b) => {
        if (b.score !== a.score) {
          return b.score - a.score;
        }
        return a.document.id.localeCompare(b.document.id);
      });
  }
}

function tokenize(value: string): string[] {
  return value
    .split(WORD_BOUNDARY)
    .map((token) => token.trim().toLowerCase())
    .filter(Boolean);
}

function resolveDocumentId(entry: unknown): string | undefined {
  if (typeof entry === "string") {
    return entry;
  }
  if (typeof entry === "number") {
    return String(entry);
  }
  return undefined;
}
