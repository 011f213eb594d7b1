import { TOKEN_PATTERN } from "../constants/text-processing";
import { DEFAULT_TOKEN_TYPE, type Token, type TokenStream } from "./token";

/**
 * Splits text on whitespace. Offsets are UTF-16 indexes into the source text.
 */
export class WhitespaceTokenizer implements TokenStream {
  private readonly pattern = new RegExp(TOKEN_PATTERN);

  constructor(private readonly text: string) {}

  next(): Token | undefined {
    const match = this.pattern.exec(this.text);
    if (!match) {
      return undefined;
    }

    const [text] = match;
    return {
      text,
      positionIncrement: 1,
      type: DEFAULT_TOKEN_TYPE,
      startOffset: match.index,
      endOffset: match.index + text.length,
    };
  }
}
