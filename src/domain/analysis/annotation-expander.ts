import type { AnnotationSettings } from "../config/annotation-settings";
import { detectAnnotation } from "./annotation-detector";
import type { Token, TokenStream } from "./token";

/**
 * Token filter that strips inline annotations (`Salzburg[city;Austria]`) from
 * the upstream tokens and replays each synonym as its own token at the same
 * position (`positionIncrement` 0).
 *
 * Pending synonyms are kept on a stack, so they come out in reverse encounter
 * order: `Salzburg`, `[Austria]`, `[city]`.
 */
export class AnnotationExpander implements TokenStream {
  private readonly pending: string[] = [];
  private anchor?: Token;

  constructor(
    private readonly input: TokenStream,
    private readonly settings: AnnotationSettings,
  ) {}

  get pendingCount(): number {
    return this.pending.length;
  }

  next(): Token | undefined {
    const synonym = this.pending.pop();
    if (synonym !== undefined && this.anchor) {
      const { prefix, suffix, tokenType } = this.settings;
      return {
        ...this.anchor,
        text: `${prefix}${synonym}${suffix}`,
        type: tokenType,
        positionIncrement: 0,
      };
    }

    const token = this.input.next();
    if (!token) {
      return undefined;
    }

    const { prefix, synonyms } = detectAnnotation(token.text, this.settings);
    if (synonyms === null) {
      return token;
    }

    const base: Token = { ...token, text: prefix };
    if (synonyms.length > 0) {
      this.pending.push(...synonyms);
      this.anchor = base;
    }

    return base;
  }
}
