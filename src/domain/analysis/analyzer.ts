import type { AnnotationSettings } from "../config/annotation-settings";
import { AnnotationExpander } from "./annotation-expander";
import { collectTokens, type Token } from "./token";
import { WhitespaceTokenizer } from "./whitespace-tokenizer";

export const DEFAULT_ANALYZER_NAME = "inline_annotation";

export class AnnotationAnalyzer {
  constructor(
    readonly settings: AnnotationSettings,
    readonly name: string = DEFAULT_ANALYZER_NAME,
  ) {}

  // A fresh filter per pass keeps pending synonyms from leaking between texts.
  tokenStream(text: string): AnnotationExpander {
    return new AnnotationExpander(new WhitespaceTokenizer(text), this.settings);
  }

  analyze(text: string): Token[] {
    return collectTokens(this.tokenStream(text));
  }

  terms(text: string): string[] {
    return this.analyze(text).map((token) => token.text);
  }

  isSynonym(token: Token): boolean {
    return token.positionIncrement === 0 && token.type === this.settings.tokenType;
  }
}
