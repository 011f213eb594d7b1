import { describe, expect, it } from "vitest";
import { AnalyzeTextUseCase } from "../../src/application/use-cases/analyze-text.usecase";
import { AnnotationAnalyzer } from "../../src/domain/analysis/analyzer";
import { DEFAULT_ANNOTATION_SETTINGS } from "../../src/domain/config/annotation-settings";

describe("AnalyzeTextUseCase", () => {
  const useCase = new AnalyzeTextUseCase({
    analyzer: new AnnotationAnalyzer(DEFAULT_ANNOTATION_SETTINGS),
  });

  it("returns the expanded tokens and counts synonyms", async () => {
    const response = await useCase.execute({
      text: "Hello[greeting] World Mozart[artist;composer]",
    });

    expect(response.tokens.map((token) => token.text)).toEqual([
      "Hello",
      "[greeting]",
      "World",
      "Mozart",
      "[composer]",
      "[artist]",
    ]);
    expect(response.synonymCount).toBe(3);
  });

  it("rejects blank text", async () => {
    await expect(useCase.execute({ text: "   " })).rejects.toThrowError(
      "Text to analyse must not be empty.",
    );
  });
});
