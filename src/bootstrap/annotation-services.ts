import { AnalyzeTextUseCase } from "../application/use-cases/analyze-text.usecase";
import { SearchDocumentsUseCase } from "../application/use-cases/search-documents.usecase";
import { AnnotationAnalyzer } from "../domain/analysis/analyzer";
import { createAnnotationSettings } from "../domain/config/annotation-settings";
import type { ConfigManager } from "../infrastructure/config/config-manager";
import { ErrorHandler } from "../infrastructure/error/error-handler";
import { ConsoleLogger, type ILogger } from "../infrastructure/logging/logger";
import { FlexSearchAnnotatedDocumentRepository } from "../infrastructure/search/flexsearch-annotated-document.repository";

export interface AnnotationServices {
  readonly analyzer: AnnotationAnalyzer;
  readonly analyzeText: AnalyzeTextUseCase;
  readonly searchDocuments: SearchDocumentsUseCase;
  readonly errorHandler: ErrorHandler;
  readonly logger: ILogger;
}

/**
 * Wires the analyzer and use cases. Throws InvalidConfigurationError when the
 * configured annotation settings are invalid.
 */
export function createAnnotationServices(
  config: ConfigManager,
  logger: ILogger = new ConsoleLogger(config.getLoggingConfig().level),
): AnnotationServices {
  const { name, settings } = config.getAnalyzerConfig();
  const analyzer = new AnnotationAnalyzer(
    createAnnotationSettings(settings, name),
    name,
  );
  logger.debug("Annotation analyzer configured", {
    analyzer: name,
    settings: analyzer.settings,
  });

  return {
    analyzer,
    analyzeText: new AnalyzeTextUseCase({ analyzer }),
    searchDocuments: new SearchDocumentsUseCase({
      repository: new FlexSearchAnnotatedDocumentRepository(),
      analyzer,
    }),
    errorHandler: new ErrorHandler(logger),
    logger,
  };
}
