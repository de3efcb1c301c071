/**
 * Deck LLM Client
 *
 * Structured-completion collaborator backed by the Anthropic SDK.
 * One streaming call per request; the reply text is searched for JSON that
 * satisfies the caller's Zod schema.
 *
 * Key design decisions:
 * - Transport failures throw CompletionTransportError (never retried by stages)
 * - Missing or malformed JSON returns `{ ok: false, reason: 'no_valid_output' }`
 * - No tools (the orchestrator calls MCP tools programmatically)
 * - Streaming via `messages.stream()` + `finalMessage()` so long decks do not
 *   hit the non-streaming max_tokens ceiling
 */

import Anthropic from '@anthropic-ai/sdk';
import { debug } from '../../utils/debug.ts';
import { CompletionTransportError, errorMessage } from './errors.ts';
import { extractJson } from './json-extractor.ts';
import type { CompletionOutcome, CompletionRequest, StructuredCompletion, TokenUsage } from './types.ts';

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_MODEL = 'claude-sonnet-4-5';

export const DEFAULT_MAX_TOKENS = 16_000;

// ============================================================================
// TRANSPORT PORT
// ============================================================================

export interface RawCompletionRequest {
  model: string;
  maxTokens: number;
  systemPrompt: string;
  userMessage: string;
}

export interface RawCompletion {
  text: string;
  usage: TokenUsage;
  stopReason: string;
}

/** Sends one prompt and returns the reply text. Rejects on transport failure. */
export type CompletionTransport = (request: RawCompletionRequest) => Promise<RawCompletion>;

export interface DeckLlmClientOptions {
  model?: string;
  maxTokens?: number;
  apiKey?: string;
  baseURL?: string;
  /** Replaces the Anthropic transport (tests, alternative providers). */
  transport?: CompletionTransport;
}

/**
 * Anthropic transport. Creates the SDK client once; the API key falls back to
 * ANTHROPIC_API_KEY inside the SDK when not given.
 */
export function createAnthropicTransport(options: { apiKey?: string; baseURL?: string } = {}): CompletionTransport {
  const client = new Anthropic({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
  });

  return async (request) => {
    const stream = client.messages.stream({
      model: request.model,
      max_tokens: request.maxTokens,
      system: request.systemPrompt,
      messages: [{ role: 'user', content: request.userMessage }],
    });
    const response = await stream.finalMessage();

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }

    return {
      text,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      stopReason: response.stop_reason ?? 'unknown',
    };
  };
}

// ============================================================================
// CLIENT
// ============================================================================

export class DeckLlmClient implements StructuredCompletion {
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly transport: CompletionTransport;

  constructor(options: DeckLlmClientOptions = {}) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.transport = options.transport ?? createAnthropicTransport({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
    });
  }

  async complete<T>(request: CompletionRequest<T>): Promise<CompletionOutcome<T>> {
    let raw: RawCompletion;
    try {
      raw = await this.transport({
        model: this.model,
        maxTokens: request.maxTokens ?? this.maxTokens,
        systemPrompt: request.systemPrompt,
        userMessage: request.userMessage,
      });
    } catch (error) {
      throw new CompletionTransportError(
        `Completion request for ${request.stage} failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    debug(
      '[DeckLlmClient] %s: %d chars, stop=%s, tokens in=%d out=%d',
      request.stage, raw.text.length, raw.stopReason, raw.usage.inputTokens, raw.usage.outputTokens,
    );

    const extraction = extractJson(raw.text, request.schema);
    if (extraction.ok) {
      return { ok: true, value: extraction.value, usage: raw.usage };
    }

    const truncated = raw.stopReason === 'max_tokens' ? ' (output truncated at max_tokens)' : '';
    return { ok: false, reason: 'no_valid_output', detail: extraction.detail + truncated, usage: raw.usage };
  }
}
