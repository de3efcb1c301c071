/**
 * Deck Orchestrator Types
 *
 * Core type definitions for the deck generation pipeline.
 * Data flows strictly forward:
 *   Topic → Outline → ResearchSummaries → DeckContent → GeneratedAssets → FinalSlidePayload[] → artifact
 *
 * Design principles:
 * - TypeScript writes state — the model never touches it
 * - Each stage owns and returns its output; nothing is shared-mutable across stages
 * - Side effects go through one ToolSession owned by the orchestrator
 */

import type { z } from 'zod';
import type { RankedSource, RawSourceRecord } from '@deckwright/source-ranking-core';
import type { DeckErrorKind } from './errors.ts';

// ============================================================================
// REQUEST
// ============================================================================

/** Immutable request parameters for one pipeline run. */
export interface DeckRequest {
  topic: string;
  slideCount: number;
  /** Target filename (without extension). Defaults to the drafting stage's suggestion. */
  filename?: string;
}

// ============================================================================
// STAGE OUTPUTS
// ============================================================================

/** One planned slide. `index` is its position and is stable for the whole run. */
export interface OutlineEntry {
  index: number;
  title: string;
  searchQueries: string[];
  contentGoal: string;
}

export interface ResearchSummary {
  slideIndex: number;
  slideTitle: string;
  /** Ranked by descending credibility score. Empty when lookups failed. */
  sources: RankedSource[];
}

export interface ChartData {
  labels: string[];
  values: number[];
}

/** A chart always carries well-formed data; an image never carries data. */
export type VisualRequest =
  | { type: 'chart'; prompt: string; data: ChartData }
  | { type: 'image'; prompt: string };

export interface SlideContent {
  title: string;
  /** 3–5 bullet points. */
  points: string[];
  speakerNotes?: string;
  /** Source URLs cited on this slide. */
  sources: string[];
  visualRequest?: VisualRequest;
}

export interface DeckContent {
  filenameSuggestion: string;
  /** One per outline entry, same order. */
  slides: SlideContent[];
}

/** A visual request addressed to a slide position. */
export interface IndexedVisualRequest {
  slideIndex: number;
  request: VisualRequest;
}

export interface GeneratedAsset {
  slideIndex: number;
  filePath: string;
}

/** Wire shape sent to the document-assembly tool (snake_case by contract). */
export interface FinalSlidePayload {
  title: string;
  points: string[];
  image: string | null;
  speaker_notes?: string;
  sources: string[];
}

// ============================================================================
// PIPELINE STATE MACHINE
// ============================================================================

export type PipelinePhase =
  | 'requested'
  | 'planning'
  | 'researching'
  | 'drafting'
  | 'illustrating'
  | 'assembling'
  | 'ready'
  | 'failed';

export interface PipelineFailure {
  kind: DeckErrorKind;
  message: string;
  /** Phase the run was in when it failed. */
  phase: PipelinePhase;
}

/** Terminal value of a run. Not mutated after emission. */
export type PipelineResult =
  | { status: 'ready'; filename: string; message: string }
  | { status: 'failed'; error: PipelineFailure };

// ============================================================================
// SUBSTEP & ORCHESTRATOR EVENTS
// ============================================================================

/**
 * Fine-grained progress events emitted by StageRunner during stage execution.
 * StageRunner → onProgress callback → orchestrator queue → OrchestratorEvent yield.
 */
export type SubstepEvent =
  | { type: 'tool_start'; toolName: string; callId: string; input: Record<string, unknown> }
  | { type: 'tool_result'; toolName: string; callId: string; isError: boolean; summary: string }
  | { type: 'completion_start'; stage: PipelinePhase; attempt: number; callId: string }
  | { type: 'completion_complete'; stage: PipelinePhase; callId: string; ok: boolean }
  | { type: 'degraded'; stage: PipelinePhase; slideIndex: number; reason: string };

export type OnProgressCallback = (event: SubstepEvent) => void;

/** Events yielded by DeckOrchestrator.run(). */
export type OrchestratorEvent =
  | { type: 'phase_start'; phase: PipelinePhase }
  | { type: 'phase_complete'; phase: PipelinePhase; summary: string }
  | { type: 'substep'; phase: PipelinePhase; substep: SubstepEvent }
  | { type: 'complete'; result: Extract<PipelineResult, { status: 'ready' }> }
  | { type: 'error'; result: Extract<PipelineResult, { status: 'failed' }> };

// ============================================================================
// STRUCTURED COMPLETION PORT
// ============================================================================

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export const ZERO_USAGE: Readonly<TokenUsage> = Object.freeze({
  inputTokens: 0,
  outputTokens: 0,
});

export interface CompletionRequest<T> {
  /** Which stage is asking. Used for logging only. */
  stage: PipelinePhase;
  systemPrompt: string;
  userMessage: string;
  /** Input is unknown model JSON; output is T. */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  maxTokens?: number;
}

/**
 * Outcome of one completion call. `no_valid_output` is the typed sentinel for
 * missing or malformed structured output; transport failures are thrown as
 * CompletionTransportError instead and never appear here.
 */
export type CompletionOutcome<T> =
  | { ok: true; value: T; usage: TokenUsage }
  | { ok: false; reason: 'no_valid_output'; detail: string; usage: TokenUsage };

/** Port for the structured-completion collaborator. */
export interface StructuredCompletion {
  complete<T>(request: CompletionRequest<T>): Promise<CompletionOutcome<T>>;
}

// ============================================================================
// TOOL SESSION PORT
// ============================================================================

/** Raw tool result as returned over the channel (MCP CallToolResult subset). */
export interface ToolCallResult {
  content: Array<{ type: string; text?: string }>;
  isError?: boolean;
}

/**
 * A single logical channel to the tool-execution endpoint.
 * One instance per run, owned by the orchestrator; never shared across runs.
 */
export interface ToolSession {
  /** Handshake + capability discovery. Returns the advertised tool names. */
  open(): Promise<ReadonlySet<string>>;
  /** One request, one response. Calls are serialized per instance. */
  invoke(toolName: string, args: Record<string, unknown>): Promise<ToolCallResult>;
  /** Release the channel. Safe to call more than once. */
  close(): Promise<void>;
}

// ============================================================================
// TOOL BRIDGE PORT — typed access to the four deck tools
// ============================================================================

export interface DeckTools {
  searchWeb(query: string): Promise<RawSourceRecord[]>;
  generateChart(title: string, data: ChartData): Promise<string>;
  fetchImage(prompt: string): Promise<string>;
  createPresentation(filename: string, slides: FinalSlidePayload[]): Promise<string>;
}

// ============================================================================
// ORCHESTRATOR OPTIONS
// ============================================================================

export interface ResearchOptions {
  maxSourcesPerSlide: number;
  blockedDomains: readonly string[];
  verifyLinks: boolean;
  linkTimeoutMs: number;
  trustedSuffixes: readonly string[];
}

export interface OrchestratorOptions {
  /** Bounded retry for malformed outlines. Default: 3 attempts. */
  planningMaxAttempts?: number;
  /** Upper bound on slide count. Default: 20. */
  maxSlides?: number;
  research?: Partial<ResearchOptions>;
  /** Structured diagnostic logging hook. */
  onDebug?: (message: string) => void;
  /** Real-time substep callback, fired before the event is queued for yield. */
  onSubstepEvent?: (event: SubstepEvent, phase: PipelinePhase) => void;
}
