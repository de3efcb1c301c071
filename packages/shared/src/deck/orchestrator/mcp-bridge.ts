/**
 * MCP Bridge — Programmatic Tool Calls
 *
 * Typed access to the deck tool server over a ToolSession.
 * The orchestrator calls tools directly through this bridge; the model never
 * issues tool calls itself.
 *
 * Key design decisions:
 * - parseToolJson() unwraps the first text block → JSON.parse() → Zod validation
 * - Every failure surfaces as ToolError carrying the tool name
 * - Argument names follow the tool server's snake_case contract
 */

import { z } from 'zod';
import { DEFAULT_CONFIDENCE, type RawSourceRecord } from '@deckwright/source-ranking-core';
import { ToolError } from './errors.ts';
import type { ChartData, DeckTools, FinalSlidePayload, ToolCallResult, ToolSession } from './types.ts';

// ============================================================================
// TOOL NAMES
// ============================================================================

export const DECK_TOOLS = {
  searchWeb: 'search_web',
  generateChart: 'generate_chart',
  fetchImage: 'fetch_image',
  createPresentation: 'create_presentation',
} as const;

export type DeckToolName = (typeof DECK_TOOLS)[keyof typeof DECK_TOOLS];

// ============================================================================
// RESULT PARSING
// ============================================================================

/**
 * Extract the text of the first text block.
 *
 * @throws ToolError when the result has no text content
 */
export function extractToolText(result: ToolCallResult, toolName: string): string {
  const textBlock = result.content.find((c) => c.type === 'text');
  if (textBlock?.text === undefined) {
    const types = result.content.map((c) => c.type).join(', ') || 'none';
    throw new ToolError(toolName, `returned no text content (content types: ${types})`);
  }
  return textBlock.text;
}

/**
 * Unwrap a tool result → text → JSON.parse → Zod validate.
 *
 * @throws ToolError if the text is missing, not JSON, or fails the schema
 */
export function parseToolJson<T>(result: ToolCallResult, schema: z.ZodType<T, z.ZodTypeDef, unknown>, toolName: string): T {
  const text = extractToolText(result, toolName);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (parseError) {
    throw new ToolError(
      toolName,
      `returned invalid JSON: ${parseError instanceof Error ? parseError.message : 'parse error'}. ` +
      `Raw text (first 200 chars): ${text.slice(0, 200)}`,
    );
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    const issue = validated.error.issues[0];
    throw new ToolError(
      toolName,
      `returned data that doesn't match schema: ${issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'validation error'}`,
    );
  }
  return validated.data;
}

// ============================================================================
// ZOD SCHEMAS
// ============================================================================

const SearchHitSchema = z.object({
  url: z.string().min(1),
  /** Provider confidence in [0, 1]. */
  score: z.number().optional(),
  title: z.string().optional(),
  content: z.string().optional(),
});

/** Accepts `{ results: [...] }` and a bare array. */
const SearchWebResultSchema = z.union([
  z.object({ results: z.array(SearchHitSchema) }).passthrough(),
  z.array(SearchHitSchema),
]);

const AssetResultSchema = z.object({
  file_path: z.string().min(1),
}).passthrough();

/** Assembly messages that start like this are failures even without isError. */
const ASSEMBLY_ERROR_PATTERN = /^\s*error\b/i;

// ============================================================================
// BRIDGE
// ============================================================================

export class DeckToolBridge implements DeckTools {
  constructor(private readonly session: ToolSession) {}

  /** One web lookup. Returns raw candidate sources for the ranker. */
  async searchWeb(query: string): Promise<RawSourceRecord[]> {
    const result = await this.session.invoke(DECK_TOOLS.searchWeb, { query });
    const parsed = parseToolJson(result, SearchWebResultSchema, DECK_TOOLS.searchWeb);
    const hits = Array.isArray(parsed) ? parsed : parsed.results;

    return hits.map((hit) => ({
      url: hit.url,
      confidence: hit.score ?? DEFAULT_CONFIDENCE,
      ...(hit.title !== undefined ? { title: hit.title } : {}),
      ...(hit.content !== undefined ? { content: hit.content } : {}),
    }));
  }

  /** Render a chart; returns the generated file path. */
  async generateChart(title: string, data: ChartData): Promise<string> {
    const result = await this.session.invoke(DECK_TOOLS.generateChart, {
      title,
      labels: data.labels,
      values: data.values,
    });
    return parseToolJson(result, AssetResultSchema, DECK_TOOLS.generateChart).file_path;
  }

  /** Acquire an image for a prompt; returns the downloaded file path. */
  async fetchImage(prompt: string): Promise<string> {
    const result = await this.session.invoke(DECK_TOOLS.fetchImage, { query: prompt });
    return parseToolJson(result, AssetResultSchema, DECK_TOOLS.fetchImage).file_path;
  }

  /**
   * Assemble the final document.
   *
   * @returns The tool's success message
   * @throws ToolError when the tool reports failure
   */
  async createPresentation(filename: string, slides: FinalSlidePayload[]): Promise<string> {
    const result = await this.session.invoke(DECK_TOOLS.createPresentation, {
      filename,
      slides_content: JSON.stringify(slides),
    });
    const message = extractToolText(result, DECK_TOOLS.createPresentation);
    if (ASSEMBLY_ERROR_PATTERN.test(message)) {
      throw new ToolError(DECK_TOOLS.createPresentation, message.trim());
    }
    return message;
  }
}
