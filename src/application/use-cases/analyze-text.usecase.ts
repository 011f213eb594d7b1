import type { AnnotationAnalyzer } from "../../domain/analysis/analyzer";
import type { Token } from "../../domain/analysis/token";

interface AnalyzeTextUseCaseDependencies {
  readonly analyzer: AnnotationAnalyzer;
}

interface AnalyzeTextRequest {
  readonly text: string;
}

export interface AnalyzeTextResponse {
  readonly tokens: Token[];
  readonly synonymCount: number;
}

export class AnalyzeTextUseCase {
  private readonly analyzer: AnnotationAnalyzer;

  constructor({ analyzer }: AnalyzeTextUseCaseDependencies) {
    this.analyzer = analyzer;
  }

  async execute({ text }: AnalyzeTextRequest): Promise<AnalyzeTextResponse> {
    if (text.trim().length === 0) {
      throw new Error("Text to analyse must not be empty.");
    }

    const tokens = this.analyzer.analyze(text);
    return {
      tokens,
      synonymCount: tokens.filter((token) => this.analyzer.isSynonym(token))
        .length,
    };
  }
}
