export interface AnnotatedDocument {
  readonly id: string;
  readonly text: string;
  /** Base token texts, annotations stripped. */
  readonly terms: readonly string[];
  /** Synonym token texts, prefix and suffix included. */
  readonly synonyms: readonly string[];
  /** Annotation content of each synonym, aligned with `synonyms`. */
  readonly synonymPayloads: readonly string[];
}

export interface DocumentMatch {
  readonly document: AnnotatedDocument;
  readonly score: number;
  readonly matchedSynonyms: readonly string[];
}
