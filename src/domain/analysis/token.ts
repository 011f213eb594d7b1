export const DEFAULT_TOKEN_TYPE = "word";

export interface Token {
  readonly text: string;
  readonly positionIncrement: number;
  readonly type: string;
  readonly startOffset: number;
  readonly endOffset: number;
  readonly attributes?: Readonly<Record<string, unknown>>;
}

/**
 * Pull-based token producer. `undefined` marks the end of the stream.
 */
export interface TokenStream {
  next(): Token | undefined;
}

export function collectTokens(stream: TokenStream): Token[] {
  const tokens: Token[] = [];
  for (let token = stream.next(); token; token = stream.next()) {
    tokens.push(token);
  }
  return tokens;
}
