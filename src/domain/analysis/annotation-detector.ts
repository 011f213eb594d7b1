import type { AnnotationSettings } from "../config/annotation-settings";

export interface AnnotationDetection {
  /** Token text before the start delimiter, or the whole text when nothing was detected. */
  readonly prefix: string;
  /**
   * Synonyms in encounter order. `null` when the text carries no annotation;
   * an empty array when the annotation is present but empty (`word[]`).
   */
  readonly synonyms: readonly string[] | null;
}

// Control characters and spaces up to U+0020; other Unicode spaces are kept.
const SURROUNDING_CONTROL = /^[\u0000-\u0020]+|[\u0000-\u0020]+$/gu;

type DelimiterSettings = Pick<AnnotationSettings, "start" | "end" | "delimiter">;

/**
 * Finds the annotation region opened by the first start delimiter and closed by
 * the next end delimiter. Later start delimiters are never considered, so
 * `a[x]b[y]` only yields `x`.
 */
export function detectAnnotation(
  text: string,
  settings: DelimiterSettings,
): AnnotationDetection {
  const open = text.indexOf(settings.start);
  if (open === -1) {
    return { prefix: text, synonyms: null };
  }

  const payloadStart = open + settings.start.length;
  const close = text.indexOf(settings.end, payloadStart);
  if (close === -1) {
    return { prefix: text, synonyms: null };
  }

  return {
    prefix: text.slice(0, open),
    synonyms: splitSynonyms(text.slice(payloadStart, close), settings.delimiter),
  };
}

/**
 * Every segment closed by a delimiter is kept (trimmed, possibly empty). The
 * remainder after the last delimiter only counts when it is not empty, so a
 * trailing delimiter adds nothing.
 */
export function splitSynonyms(payload: string, delimiter: string): string[] {
  const segments: string[] = [];
  let begin = 0;

  for (
    let end = payload.indexOf(delimiter, begin);
    end !== -1;
    end = payload.indexOf(delimiter, begin)
  ) {
    segments.push(trimSegment(payload.slice(begin, end)));
    begin = end + delimiter.length;
  }

  if (begin < payload.length) {
    segments.push(trimSegment(payload.slice(begin)));
  }

  return segments;
}

function trimSegment(segment: string): string {
  return segment.replace(SURROUNDING_CONTROL, "");
}
