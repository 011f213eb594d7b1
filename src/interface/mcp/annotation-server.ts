import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { AnalyzeTextResponse } from "../../application/use-cases/analyze-text.usecase";
import type { SearchDocumentsResponse } from "../../application/use-cases/search-documents.usecase";
import {
  type AnnotationServices,
  createAnnotationServices,
} from "../../bootstrap/annotation-services";
import type { AnnotatedDocument } from "../../domain/entities/annotated-document";
import { ConfigManager } from "../../infrastructure/config/config-manager";
import { ErrorType } from "../../infrastructure/error/error-handler";

const textSchema = z
  .string()
  .min(1, "Provide some text.")
  .max(10_000, "Text must stay below 10000 characters.");

const idSchema = z.string().min(1, "Provide a document id.").max(200);

export function createMcpServer(services: AnnotationServices): McpServer {
  const { analyzeText, searchDocuments, errorHandler, logger } = services;
  const server = new McpServer({
    name: "inline-annotation-server",
    version: "0.1.0",
  });

  server.registerTool(
    "analyze_text",
    {
      title: "Analyse text with inline annotations",
      description:
        "Tokenises text and expands inline annotations such as 'Mozart[artist]' or 'Salzburg[city;Austria]' into synonym tokens at the position of the annotated word.",
      inputSchema: {
        text: textSchema.describe("Text to analyse, e.g. 'Mozart[artist] was born in Salzburg[city;Austria]'"),
      },
    },
    async ({ text }) => {
      const result = await errorHandler.safeExecute(
        () => analyzeText.execute({ text }),
        ErrorType.ANALYSIS,
        "analyze text",
      );
      return result.fold(buildAnalysisResponse, buildErrorResponse);
    },
  );

  server.registerTool(
    "index_document",
    {
      title: "Index an annotated document",
      description:
        "Analyses the document text and adds it to the in-memory index so that its annotated synonyms become searchable. Re-using an id replaces the document.",
      inputSchema: {
        id: idSchema.describe("Unique document id"),
        text: textSchema.describe("Document text with inline annotations"),
      },
    },
    async ({ id, text }) => {
      const result = await errorHandler.safeExecute(
        () => searchDocuments.index({ id, text }),
        ErrorType.ANALYSIS,
        "index document",
        { id },
      );
      return result.fold<CallToolResult>((document) => {
        logger.info("Indexed document", {
          id,
          synonyms: document.synonyms.length,
        });
        return buildIndexResponse(document);
      }, buildErrorResponse);
    },
  );

  server.registerTool(
    "search_documents",
    {
      title: "Search indexed documents",
      description:
        "Searches indexed documents by their words and annotated synonyms. Returns the top 5 documents.",
      inputSchema: {
        query: z
          .string()
          .min(1, "Provide a query.")
          .max(200, "Query must stay concise.")
          .describe("Words or synonyms to look for, e.g. 'artist'"),
      },
    },
    async ({ query }) => {
      const result = await errorHandler.safeExecute(
        () => searchDocuments.execute({ query }),
        ErrorType.SEARCH,
        "search documents",
        { query },
      );
      return result.fold(buildSearchResponse, buildErrorResponse);
    },
  );

  return server;
}

export async function startMcpServer(
  env: Record<string, string | undefined> = process.env,
): Promise<void> {
  const services = createAnnotationServices(ConfigManager.fromEnvironment(env));
  const server = createMcpServer(services);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  services.logger.info("Inline annotation MCP server listening on stdio", {
    analyzer: services.analyzer.name,
  });
}

function buildAnalysisResponse(result: AnalyzeTextResponse): CallToolResult {
  const lines = result.tokens.map(
    (token) =>
      `${token.text} (${token.type}, +${token.positionIncrement}, ${token.startOffset}-${token.endOffset})`,
  );
  lines.push("");
  lines.push(`${result.tokens.length} tokens, ${result.synonymCount} synonyms.`);

  return {
    content: [{ type: "text" as const, text: lines.join("\n") }],
    structuredContent: {
      tokens: result.tokens.map((token) => ({ ...token })),
      synonymCount: result.synonymCount,
    },
  };
}

function buildIndexResponse(document: AnnotatedDocument): CallToolResult {
  return {
    content: [
      {
        type: "text" as const,
        text: `Indexed ${document.id} with ${document.terms.length} terms and ${document.synonyms.length} synonyms.`,
      },
    ],
    structuredContent: {
      id: document.id,
      terms: [...document.terms],
      synonyms: [...document.synonyms],
    },
  };
}

function buildSearchResponse(result: SearchDocumentsResponse): CallToolResult {
  const lines: string[] = [];

  if (result.guidance) {
    lines.push(result.guidance);
  }

  if (result.matches.length > 1) {
    lines.push("Top document candidates:");
    for (const match of result.matches) {
      lines.push(`- ${match.document.id} (score ${match.score})`);
    }
  }

  return {
    content: [{ type: "text" as const, text: lines.join("\n") }],
    structuredContent: {
      guidance: result.guidance,
      matches: result.matches.map((match) => ({
        id: match.document.id,
        text: match.document.text,
        score: match.score,
        matchedSynonyms: [...match.matchedSynonyms],
      })),
    },
  };
}

function buildErrorResponse(error: Error): CallToolResult {
  return {
    isError: true,
    content: [{ type: "text" as const, text: error.message }],
  };
}
