/**
 * Stage Runner — Per-Stage Execution
 *
 * One method per pipeline stage. Each handler builds its own context, makes at
 * most one completion call per attempt (or only tool calls), validates the
 * result, and returns a typed stage output.
 *
 * Design principles:
 * - Stages never share mutable state; the orchestrator hands outputs forward
 * - Recoverable failures (a research lookup, one illustration) degrade locally
 *   and are reported as substep events; everything else propagates
 * - Tool access goes through the DeckTools bridge over the run's single session
 */

import { z } from 'zod';
import {
  createHttpPageFetcher,
  hostOf,
  matchesDomain,
  normalizeUrl,
  rankSources,
  type PageFetcher,
  type RawSourceRecord,
} from '@deckwright/source-ranking-core';
import { buildDraftingPrompt, buildPlanningPrompt } from './context-builder.ts';
import {
  ConnectionError,
  DraftingConstraintViolationError,
  DraftingFailedError,
  InvalidRequestError,
  PlanningFailedError,
  ToolError,
  errorMessage,
} from './errors.ts';
import { DECK_TOOLS } from './mcp-bridge.ts';
import { summarizeZodError } from './json-extractor.ts';
import type {
  DeckContent,
  DeckRequest,
  DeckTools,
  FinalSlidePayload,
  GeneratedAsset,
  IndexedVisualRequest,
  OnProgressCallback,
  OutlineEntry,
  PipelinePhase,
  ResearchOptions,
  ResearchSummary,
  SlideContent,
  StructuredCompletion,
  SubstepEvent,
  TokenUsage,
  VisualRequest,
} from './types.ts';

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_PLANNING_MAX_ATTEMPTS = 3;
export const DEFAULT_MAX_SLIDES = 20;
export const MIN_POINTS = 3;
export const MAX_POINTS = 5;

export const DEFAULT_BLOCKED_DOMAINS: readonly string[] = [
  'reddit.com',
  'quora.com',
  'twitter.com',
  'facebook.com',
  'instagram.com',
  'youtube.com',
  'tiktok.com',
  'linkedin.com',
];

export const DEFAULT_RESEARCH_OPTIONS: Readonly<ResearchOptions> = Object.freeze({
  maxSourcesPerSlide: 5,
  blockedDomains: DEFAULT_BLOCKED_DOMAINS,
  verifyLinks: true,
  linkTimeoutMs: 5_000,
  trustedSuffixes: ['.edu', '.gov'],
});

// ============================================================================
// MODEL OUTPUT SCHEMAS
// ============================================================================

const PlannedSlideSchema = z.object({
  slide_number: z.number().optional(),
  title: z.string(),
  search_queries: z.array(z.string()),
  content_goal: z.string().default(''),
});

const PlanSchema = z.object({
  slides: z.array(PlannedSlideSchema),
});

export type PlannedSlide = z.infer<typeof PlannedSlideSchema>;

/**
 * Visual requests are validated per slide after parsing, so the deck-level
 * schema accepts any object here and one bad visual cannot sink the deck.
 */
const RawVisualRequestSchema = z.object({
  type: z.string(),
  prompt: z.string().nullable().optional(),
  data: z.unknown().optional(),
  /** Chart data serialized as a JSON string. */
  data_json: z.string().nullable().optional(),
}).passthrough();

export type RawVisualRequest = z.infer<typeof RawVisualRequestSchema>;

const DraftedSlideSchema = z.object({
  title: z.string().default(''),
  points: z.array(z.string()),
  speaker_notes: z.string().nullable().optional(),
  sources: z.array(z.string()).default([]),
  visual_request: RawVisualRequestSchema.nullable().optional(),
});

const DraftedDeckSchema = z.object({
  filename_suggestion: z.string().default(''),
  slides: z.array(DraftedSlideSchema),
});

const ChartDataSchema = z.object({
  labels: z.array(z.string()).min(1, 'chart needs at least one label'),
  values: z.array(z.number().finite()).min(1, 'chart needs at least one value'),
}).refine((data) => data.labels.length === data.values.length, {
  message: 'labels and values must have equal length',
});

// ============================================================================
// VALIDATION HELPERS
// ============================================================================

/**
 * Semantic checks on a parsed outline. Returns the problems found; an empty
 * list means the outline is usable.
 */
export function validateOutline(slides: readonly PlannedSlide[], slideCount: number): string[] {
  const issues: string[] = [];
  if (slides.length === 0) {
    issues.push('outline is empty');
  } else if (slides.length !== slideCount) {
    issues.push(`expected ${slideCount} slides, got ${slides.length}`);
  }
  slides.forEach((slide, i) => {
    if (!slide.title.trim()) {
      issues.push(`slide ${i + 1}: title is empty`);
    }
    if (!slide.search_queries.some((q) => q.trim())) {
      issues.push(`slide ${i + 1}: no search queries`);
    }
  });
  return issues;
}

export type VisualValidation =
  | { ok: true; request: VisualRequest }
  | { ok: false; reason: string };

/**
 * Turn the model's visual request into a VisualRequest, or explain why it
 * breaks the invariant (chart ⇒ well-formed data, image ⇒ no data).
 */
export function parseVisualRequest(raw: RawVisualRequest, fallbackPrompt: string): VisualValidation {
  const type = raw.type.trim().toLowerCase();
  const prompt = raw.prompt?.trim() || fallbackPrompt;
  const hasData = raw.data !== undefined && raw.data !== null;
  const hasDataJson = typeof raw.data_json === 'string' && raw.data_json.trim() !== '';

  if (type === 'image') {
    if (hasData || hasDataJson) {
      return { ok: false, reason: 'image request carries chart data' };
    }
    if (!raw.prompt?.trim()) {
      return { ok: false, reason: 'image request has no prompt' };
    }
    return { ok: true, request: { type: 'image', prompt } };
  }

  if (type !== 'chart') {
    return { ok: false, reason: `unknown visual type '${raw.type}'` };
  }

  let data: unknown = raw.data;
  if (!hasData) {
    if (!hasDataJson || raw.data_json == null) {
      return { ok: false, reason: 'chart request has no data' };
    }
    try {
      data = JSON.parse(raw.data_json);
    } catch {
      return { ok: false, reason: 'chart data_json is not valid JSON' };
    }
  }

  const parsed = ChartDataSchema.safeParse(data);
  if (!parsed.success) {
    return { ok: false, reason: `chart data is malformed: ${summarizeZodError(parsed.error)}` };
  }
  return { ok: true, request: { type: 'chart', prompt, data: parsed.data } };
}

export function isWellFormedChart(request: VisualRequest | undefined): boolean {
  return (
    request?.type === 'chart' &&
    request.data.labels.length > 0 &&
    request.data.labels.length === request.data.values.length &&
    request.data.values.every((v) => Number.isFinite(v))
  );
}

// ============================================================================
// STAGE RUNNER
// ============================================================================

export interface StageRunnerConfig {
  planningMaxAttempts: number;
  maxSlides: number;
  research: ResearchOptions;
  /** Overrides the HTTP page fetcher used when ranking sources. */
  fetchPage?: PageFetcher;
}

export class StageRunner {
  private callCounter = 0;
  private _onProgress?: OnProgressCallback;
  private _usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };

  constructor(
    private readonly completion: StructuredCompletion,
    private readonly tools: DeckTools,
    private readonly config: StageRunnerConfig,
    private readonly onDebug?: (message: string) => void,
  ) {}

  /**
   * Set the progress callback. Called by the orchestrator before each run so
   * substep events can be queued and yielded.
   */
  setOnProgress(callback: OnProgressCallback | undefined): void {
    this._onProgress = callback;
  }

  /** Token usage accumulated across every completion call so far. */
  get usage(): TokenUsage {
    return { ...this._usage };
  }

  private emitProgress(event: SubstepEvent): void {
    this._onProgress?.(event);
  }

  /** Synthetic call ID with an orch- prefix. */
  private generateCallId(prefix: string): string {
    return `orch-${prefix}-${++this.callCounter}`;
  }

  private recordUsage(usage: TokenUsage): void {
    this._usage = {
      inputTokens: this._usage.inputTokens + usage.inputTokens,
      outputTokens: this._usage.outputTokens + usage.outputTokens,
    };
  }

  // ──────────────────────────────────────────────────────────────────────────
  // REQUEST VALIDATION
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Normalize and check a request before any stage runs.
   *
   * @throws InvalidRequestError for an empty topic, a non-integer slide count,
   *   or a count outside 1..maxSlides
   */
  validateRequest(request: DeckRequest): DeckRequest {
    const topic = typeof request.topic === 'string' ? request.topic.trim() : '';
    if (!topic) {
      throw new InvalidRequestError('Topic must be a non-empty string');
    }
    const { slideCount } = request;
    if (!Number.isInteger(slideCount) || slideCount < 1 || slideCount > this.config.maxSlides) {
      throw new InvalidRequestError(
        `Slide count must be an integer between 1 and ${this.config.maxSlides}, got ${String(slideCount)}`,
      );
    }
    const filename = request.filename?.trim();
    return { topic, slideCount, ...(filename ? { filename } : {}) };
  }

  // ──────────────────────────────────────────────────────────────────────────
  // PLANNING
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Stage: planning
   *
   * Asks for exactly `slideCount` outline entries. Malformed or invalid output
   * is retried with the same input up to `planningMaxAttempts` attempts.
   *
   * @throws PlanningFailedError when no attempt produced a valid outline
   * @throws CompletionTransportError on transport failure (not retried)
   */
  async runPlanning(request: DeckRequest): Promise<OutlineEntry[]> {
    const { topic, slideCount } = this.validateRequest(request);
    const prompt = buildPlanningPrompt(topic, slideCount);
    const maxAttempts = Math.max(1, this.config.planningMaxAttempts);
    const issues: string[] = [];

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const callId = this.generateCallId('plan');
      this.emitProgress({ type: 'completion_start', stage: 'planning', attempt, callId });

      const outcome = await this.completion.complete({
        stage: 'planning',
        systemPrompt: prompt.systemPrompt,
        userMessage: prompt.userMessage,
        schema: PlanSchema,
      });
      this.recordUsage(outcome.usage);

      let problem: string;
      if (outcome.ok) {
        const outlineIssues = validateOutline(outcome.value.slides, slideCount);
        if (outlineIssues.length === 0) {
          this.emitProgress({ type: 'completion_complete', stage: 'planning', callId, ok: true });
          return outcome.value.slides.map((slide, index) => ({
            index,
            title: slide.title.trim(),
            searchQueries: slide.search_queries.map((q) => q.trim()).filter(Boolean),
            contentGoal: slide.content_goal.trim(),
          }));
        }
        problem = outlineIssues.join('; ');
      } else {
        problem = outcome.detail;
      }

      this.emitProgress({ type: 'completion_complete', stage: 'planning', callId, ok: false });
      issues.push(`attempt ${attempt}: ${problem}`);
      this.onDebug?.(`[planning] Attempt ${attempt}/${maxAttempts} rejected: ${problem}`);
    }

    throw new PlanningFailedError(
      `No valid outline after ${maxAttempts} attempt${maxAttempts === 1 ? '' : 's'}: ${issues.at(-1) ?? 'unknown'}`,
      maxAttempts,
      issues,
    );
  }

  // ──────────────────────────────────────────────────────────────────────────
  // RESEARCH
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Stage: research
   *
   * One summary per outline entry, in outline order. A failed lookup empties
   * that entry's sources and processing continues with the next entry.
   */
  async runResearch(outline: readonly OutlineEntry[]): Promise<ResearchSummary[]> {
    const summaries: ResearchSummary[] = [];
    for (const entry of outline) {
      summaries.push(await this.researchEntry(entry));
    }
    return summaries;
  }

  private async researchEntry(entry: OutlineEntry): Promise<ResearchSummary> {
    const options = this.config.research;
    const records: RawSourceRecord[] = [];

    try {
      for (const query of entry.searchQueries) {
        const hits = await this.trackTool(DECK_TOOLS.searchWeb, { query }, () => this.tools.searchWeb(query));
        records.push(...hits);
      }
    } catch (error) {
      if (!(error instanceof ToolError || error instanceof ConnectionError)) throw error;
      this.degrade('researching', entry.index, `research for "${entry.title}" failed: ${error.message}`);
      return { slideIndex: entry.index, slideTitle: entry.title, sources: [] };
    }

    const candidates = dedupeByUrl(records.filter((r) => !isBlocked(r.url, options.blockedDomains)));
    const ranked = await rankSources(candidates, {
      verifyLinks: options.verifyLinks,
      trustedSuffixes: options.trustedSuffixes,
      fetchPage: this.config.fetchPage ?? createHttpPageFetcher(options.linkTimeoutMs),
    });

    this.onDebug?.(
      `[research] Slide ${entry.index + 1}: ${records.length} hits, ${candidates.length} candidates, ` +
      `${ranked.filter((s) => s.status === 'live').length} live`,
    );

    return {
      slideIndex: entry.index,
      slideTitle: entry.title,
      sources: ranked.slice(0, Math.max(0, options.maxSourcesPerSlide)),
    };
  }

  // ──────────────────────────────────────────────────────────────────────────
  // DRAFTING
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Stage: drafting
   *
   * One completion call for the whole deck. Visual requests that break the
   * chart/image invariant are dropped per slide; afterwards the deck as a
   * whole must carry at least one well-formed chart.
   *
   * @throws DraftingFailedError on no valid output, a slide-count mismatch or a slide with too few points
   * @throws DraftingConstraintViolationError when no chart survives validation
   */
  async runDrafting(
    request: DeckRequest,
    outline: readonly OutlineEntry[],
    research: readonly ResearchSummary[],
  ): Promise<DeckContent> {
    const prompt = buildDraftingPrompt(request.topic, outline, research);
    const callId = this.generateCallId('draft');
    this.emitProgress({ type: 'completion_start', stage: 'drafting', attempt: 1, callId });

    const outcome = await this.completion.complete({
      stage: 'drafting',
      systemPrompt: prompt.systemPrompt,
      userMessage: prompt.userMessage,
      schema: DraftedDeckSchema,
    });
    this.recordUsage(outcome.usage);
    this.emitProgress({ type: 'completion_complete', stage: 'drafting', callId, ok: outcome.ok });

    if (!outcome.ok) {
      throw new DraftingFailedError(`Drafting produced no valid deck: ${outcome.detail}`);
    }

    const drafted = outcome.value;
    if (drafted.slides.length !== outline.length) {
      throw new DraftingFailedError(
        `Drafting returned ${drafted.slides.length} slides for an outline of ${outline.length}`,
      );
    }

    const slides = drafted.slides.map((slide, index): SlideContent => {
      const title = slide.title.trim() || (outline[index]?.title ?? '');
      const points = slide.points.map((p) => p.trim()).filter(Boolean);
      if (points.length < MIN_POINTS) {
        throw new DraftingFailedError(
          `Slide ${index + 1} has ${points.length} bullet points; at least ${MIN_POINTS} are required`,
        );
      }
      if (points.length > MAX_POINTS) {
        this.onDebug?.(`[drafting] Slide ${index + 1}: trimming ${points.length} points to ${MAX_POINTS}`);
      }

      const content: SlideContent = {
        title,
        points: points.slice(0, MAX_POINTS),
        sources: slide.sources.map((s) => s.trim()).filter(Boolean),
      };
      const notes = slide.speaker_notes?.trim();
      if (notes) content.speakerNotes = notes;

      if (slide.visual_request) {
        const visual = parseVisualRequest(slide.visual_request, title);
        if (visual.ok) {
          content.visualRequest = visual.request;
        } else {
          this.degrade('drafting', index, `dropped visual request on slide ${index + 1}: ${visual.reason}`);
        }
      }
      return content;
    });

    // Aggregate invariant over the whole deck, checked after per-slide cleanup
    if (!slides.some((slide) => isWellFormedChart(slide.visualRequest))) {
      throw new DraftingConstraintViolationError(
        'Drafted deck has no chart with well-formed data; at least one chart is required',
      );
    }

    return { filenameSuggestion: drafted.filename_suggestion.trim(), slides };
  }

  // ──────────────────────────────────────────────────────────────────────────
  // ILLUSTRATION
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Stage: illustration
   *
   * Sequential over the single session. A failed request yields no asset and
   * does not stop the remaining requests.
   */
  async runIllustration(requests: readonly IndexedVisualRequest[]): Promise<GeneratedAsset[]> {
    const assets: GeneratedAsset[] = [];

    for (const { slideIndex, request } of requests) {
      try {
        const filePath = request.type === 'chart'
          ? await this.trackTool(
            DECK_TOOLS.generateChart,
            { title: request.prompt, labels: request.data.labels, values: request.data.values },
            () => this.tools.generateChart(request.prompt, request.data),
          )
          : await this.trackTool(
            DECK_TOOLS.fetchImage,
            { query: request.prompt },
            () => this.tools.fetchImage(request.prompt),
          );
        assets.push({ slideIndex, filePath });
      } catch (error) {
        if (!(error instanceof ToolError || error instanceof ConnectionError)) throw error;
        this.degrade('illustrating', slideIndex, `${request.type} for slide ${slideIndex + 1} failed: ${error.message}`);
      }
    }

    return assets;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // ASSEMBLY
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Stage: assembly
   *
   * One create_presentation call with the complete ordered payload.
   *
   * @returns The tool's success message
   * @throws ToolError when assembly fails
   */
  async runAssembly(baseFilename: string, slides: readonly FinalSlidePayload[]): Promise<string> {
    return this.trackTool(
      DECK_TOOLS.createPresentation,
      { filename: baseFilename, slideCount: slides.length },
      () => this.tools.createPresentation(baseFilename, [...slides]),
    );
  }

  // ──────────────────────────────────────────────────────────────────────────
  // INTERNALS
  // ──────────────────────────────────────────────────────────────────────────

  /** Wrap one tool call in tool_start / tool_result substep events. */
  private async trackTool<T>(
    toolName: string,
    input: Record<string, unknown>,
    call: () => Promise<T>,
  ): Promise<T> {
    const callId = this.generateCallId(toolName);
    this.emitProgress({ type: 'tool_start', toolName, callId, input });
    try {
      const result = await call();
      this.emitProgress({ type: 'tool_result', toolName, callId, isError: false, summary: summarize(result) });
      return result;
    } catch (error) {
      this.emitProgress({ type: 'tool_result', toolName, callId, isError: true, summary: errorMessage(error) });
      throw error;
    }
  }

  private degrade(stage: PipelinePhase, slideIndex: number, reason: string): void {
    console.warn(`[${stage}] ${reason}`);
    this.onDebug?.(`[${stage}] ${reason}`);
    this.emitProgress({ type: 'degraded', stage, slideIndex, reason });
  }
}

// ============================================================================
// RESEARCH HELPERS
// ============================================================================

export function isBlocked(url: string, blockedDomains: readonly string[]): boolean {
  const host = hostOf(url);
  return host !== '' && blockedDomains.some((domain) => matchesDomain(host, domain));
}

/** Keep the first record for each normalized URL. */
export function dedupeByUrl(records: readonly RawSourceRecord[]): RawSourceRecord[] {
  const seen = new Set<string>();
  const unique: RawSourceRecord[] = [];
  for (const record of records) {
    const key = normalizeUrl(record.url);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(record);
  }
  return unique;
}

function summarize(result: unknown): string {
  if (Array.isArray(result)) return `${result.length} result${result.length === 1 ? '' : 's'}`;
  if (typeof result === 'string') return result.length > 120 ? `${result.slice(0, 117)}...` : result;
  return 'ok';
}
