/**
 * Runs of non-whitespace characters; each run becomes one token.
 */
export const TOKEN_PATTERN = /\S+/gu;

/**
 * Regular expression for matching word boundaries including punctuation,
 * symbols, and whitespace characters.
 */
export const WORD_BOUNDARY = /[\p{P}\p{S}\s]+/u;
