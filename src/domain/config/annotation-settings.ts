import { z } from "zod";
import { InvalidConfigurationError } from "../errors/invalid-configuration.error";

export interface AnnotationSettings {
  /** Opens the annotation region, e.g. `[` in `Mozart[artist]`. */
  readonly start: string;
  readonly end: string;
  /** Separates several synonyms inside one annotation. */
  readonly delimiter: string;
  /** Prepended to every emitted synonym. */
  readonly prefix: string;
  readonly suffix: string;
  /** Type tag assigned to synonym tokens. */
  readonly tokenType: string;
}

export const DEFAULT_ANNOTATION_SETTINGS: AnnotationSettings = Object.freeze({
  start: "[",
  end: "]",
  delimiter: ";",
  prefix: "[",
  suffix: "]",
  tokenType: "synonym",
});

/**
 * Settings as supplied by the host, keyed by option name
 * (`start`, `end`, `prefix`, `suffix`, `delimiter`, `token-type`).
 */
export type RawAnnotationSettings = Readonly<Record<string, unknown>>;

const text = (option: string) =>
  z.string({ invalid_type_error: `${option} must be a string` });

// One UTF-16 unit: a delimiter outside the basic plane such as "🔖" is rejected.
const singleCharacter = (option: string, label: string) =>
  text(option).refine(
    (value) => value.length === 1,
    `${label} is limited to be single character`,
  );

const rawSettingsSchema = z.object({
  start: singleCharacter("start", "start delimiter").optional(),
  end: singleCharacter("end", "end delimiter").optional(),
  prefix: text("prefix").optional(),
  suffix: text("suffix").optional(),
  delimiter: singleCharacter("delimiter", "delimiter").optional(),
  "token-type": text("token-type").optional(),
});

export function createAnnotationSettings(
  raw: RawAnnotationSettings,
  analyzerName: string,
): AnnotationSettings {
  const parsed = rawSettingsSchema.safeParse(raw);

  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const option = String(issue?.path[0] ?? "settings");
    throw new InvalidConfigurationError(
      option,
      analyzerName,
      `Analyzer ${analyzerName} has invalid settings: ${issue?.message ?? "unreadable settings"}`,
    );
  }

  const options = parsed.data;
  return Object.freeze({
    start: options.start ?? DEFAULT_ANNOTATION_SETTINGS.start,
    end: options.end ?? DEFAULT_ANNOTATION_SETTINGS.end,
    delimiter: options.delimiter ?? DEFAULT_ANNOTATION_SETTINGS.delimiter,
    prefix: options.prefix ?? DEFAULT_ANNOTATION_SETTINGS.prefix,
    suffix: options.suffix ?? DEFAULT_ANNOTATION_SETTINGS.suffix,
    tokenType: options["token-type"] ?? DEFAULT_ANNOTATION_SETTINGS.tokenType,
  });
}
