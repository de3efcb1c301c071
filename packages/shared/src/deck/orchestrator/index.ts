/**
 * Deck Orchestrator — Deterministic Stage Pipeline
 *
 * A TypeScript loop sequences the five stages, hands each stage's output to
 * the next, and owns the run's single ToolSession. Each completion stage is
 * one focused model call with shaped context; every tool call is made
 * programmatically.
 *
 * Design principles:
 * - Phases advance through PipelineState; illegal transitions throw
 * - Every error is caught at this boundary and becomes a failure result
 * - The session is closed on every exit: ready, failed, or an abandoned generator
 *
 * Usage:
 * ```typescript
 * const orchestrator = DeckOrchestrator.create({ completion, session });
 * for await (const event of orchestrator.run({ topic: 'Space Exploration', slideCount: 2 })) {
 *   switch (event.type) {
 *     case 'phase_start':  // show progress
 *     case 'substep':      // tool call started / finished
 *     case 'complete':     // event.result.filename
 *     case 'error':        // event.result.error.kind
 *   }
 * }
 * ```
 */

import { randomUUID } from 'node:crypto';
import type { PageFetcher } from '@deckwright/source-ranking-core';
import type { DeckConfig } from '../../config/deck-config.ts';
import { debug } from '../../utils/debug.ts';
import {
  PRESENTATION_EXTENSION,
  collectVisualRequests,
  reconcileSlides,
  resolveBaseFilename,
} from './assembly-reconciler.ts';
import { errorMessage, isDeckPipelineError } from './errors.ts';
import { DeckLlmClient } from './llm-client.ts';
import { DeckToolBridge } from './mcp-bridge.ts';
import { McpToolSession } from './mcp-lifecycle.ts';
import { PipelineState } from './pipeline-state.ts';
import {
  DEFAULT_MAX_SLIDES,
  DEFAULT_PLANNING_MAX_ATTEMPTS,
  DEFAULT_RESEARCH_OPTIONS,
  StageRunner,
} from './stage-runner.ts';
import type {
  DeckRequest,
  DeckTools,
  OrchestratorEvent,
  OrchestratorOptions,
  PipelinePhase,
  PipelineResult,
  StructuredCompletion,
  SubstepEvent,
  ToolSession,
} from './types.ts';

// ============================================================================
// RE-EXPORTS — Convenience imports for consumers
// ============================================================================

export { PipelineState, IllegalTransitionError, isTerminalPhase } from './pipeline-state.ts';
export { StageRunner, validateOutline, parseVisualRequest, isWellFormedChart, isBlocked, dedupeByUrl } from './stage-runner.ts';
export { DeckLlmClient, createAnthropicTransport } from './llm-client.ts';
export type { CompletionTransport, RawCompletion, RawCompletionRequest } from './llm-client.ts';
export { extractJson, summarizeZodError } from './json-extractor.ts';
export { buildPlanningPrompt, buildDraftingPrompt, wrapXml } from './context-builder.ts';
export { DeckToolBridge, DECK_TOOLS, parseToolJson, extractToolText } from './mcp-bridge.ts';
export { McpToolSession } from './mcp-lifecycle.ts';
export { reconcileSlides, collectVisualRequests, resolveBaseFilename, sanitizeFilename } from './assembly-reconciler.ts';
export * from './errors.ts';
export type * from './types.ts';
export { ZERO_USAGE } from './types.ts';

// ============================================================================
// DEPENDENCIES
// ============================================================================

export interface DeckOrchestratorDeps {
  completion: StructuredCompletion;
  /** Owned by the orchestrator for exactly one run. */
  session: ToolSession;
  /** Typed tool access. Defaults to a DeckToolBridge over `session`. */
  tools?: DeckTools;
  /** Page fetcher for source ranking. Defaults to HTTP with the configured timeout. */
  fetchPage?: PageFetcher;
}

// ============================================================================
// DECK ORCHESTRATOR
// ============================================================================

export class DeckOrchestrator {
  readonly runId: string;
  private state: PipelineState;
  private started = false;

  /**
   * Substep queue — StageRunner pushes events via its progress callback and
   * the generator drains them after each stage settles.
   */
  private readonly substepQueue: SubstepEvent[] = [];
  private readonly onDebug?: (message: string) => void;
  private readonly onSubstepEvent?: (event: SubstepEvent, phase: PipelinePhase) => void;

  private constructor(
    private readonly session: ToolSession,
    private readonly stageRunner: StageRunner,
    options: OrchestratorOptions,
  ) {
    this.runId = randomUUID();
    this.state = PipelineState.create(this.runId);
    this.onDebug = options.onDebug;
    this.onSubstepEvent = options.onSubstepEvent;

    this.stageRunner.setOnProgress((event) => {
      this.substepQueue.push(event);
      // Real-time delivery, ahead of the generator queue
      this.onSubstepEvent?.(event, this.state.phase);
    });
  }

  /** Factory — wires the stage runner over the given collaborators. */
  static create(deps: DeckOrchestratorDeps, options: OrchestratorOptions = {}): DeckOrchestrator {
    const stageRunner = new StageRunner(
      deps.completion,
      deps.tools ?? new DeckToolBridge(deps.session),
      {
        planningMaxAttempts: options.planningMaxAttempts ?? DEFAULT_PLANNING_MAX_ATTEMPTS,
        maxSlides: options.maxSlides ?? DEFAULT_MAX_SLIDES,
        research: { ...DEFAULT_RESEARCH_OPTIONS, ...options.research },
        ...(deps.fetchPage ? { fetchPage: deps.fetchPage } : {}),
      },
      options.onDebug,
    );
    return new DeckOrchestrator(deps.session, stageRunner, options);
  }

  /**
   * Factory from process configuration: an MCP session over the configured
   * transport and an Anthropic-backed completion client.
   */
  static fromConfig(config: DeckConfig, options: OrchestratorOptions = {}): DeckOrchestrator {
    const session = McpToolSession.fromConfig(
      config.mcp.transport === 'stdio'
        ? { ...config.mcp, env: { ...config.mcp.env, DECK_OUTPUT_DIR: config.outputDir } }
        : config.mcp,
      { handshakeTimeoutMs: config.session.handshakeTimeoutMs },
    );
    const completion = new DeckLlmClient({
      model: config.llm.model,
      maxTokens: config.llm.maxTokens,
      ...(config.llm.apiKey ? { apiKey: config.llm.apiKey } : {}),
      ...(config.llm.baseURL ? { baseURL: config.llm.baseURL } : {}),
    });
    return DeckOrchestrator.create({ completion, session }, {
      planningMaxAttempts: config.planning.maxAttempts,
      maxSlides: config.maxSlides,
      research: config.research,
      ...options,
    });
  }

  /** Current phase of the run. */
  get phase(): PipelinePhase {
    return this.state.phase;
  }

  get pipelineState(): PipelineState {
    return this.state;
  }

  /**
   * Run the pipeline once.
   *
   * Yields progress events and ends with exactly one `complete` or `error`
   * event; the same result is the generator's return value.
   */
  async *run(request: DeckRequest): AsyncGenerator<OrchestratorEvent, PipelineResult> {
    if (this.started) {
      return yield* this.finishFailed(new Error('DeckOrchestrator.run() may only be called once per instance'));
    }
    this.started = true;

    // Rejected before any stage runs; the session is released without being opened
    let validated: DeckRequest;
    try {
      validated = this.stageRunner.validateRequest(request);
    } catch (error) {
      await this.session.close();
      return yield* this.finishFailed(error);
    }

    this.onDebug?.(`[orchestrator] Run ${this.runId}: "${validated.topic}", ${validated.slideCount} slides`);

    try {
      const tools = await this.session.open();
      debug('[orchestrator] Session open, %d tools', tools.size);

      const outline = yield* this.executePhase(
        'planning',
        () => this.stageRunner.runPlanning(validated),
        (o) => `${o.length} outline entries`,
      );
      this.state = this.state.withOutput('outline', outline);

      const research = yield* this.executePhase(
        'researching',
        () => this.stageRunner.runResearch(outline),
        (r) => `${r.reduce((n, s) => n + s.sources.length, 0)} sources across ${r.length} slides`,
      );
      this.state = this.state.withOutput('research', research);

      const content = yield* this.executePhase(
        'drafting',
        () => this.stageRunner.runDrafting(validated, outline, research),
        (c) => `${c.slides.length} slides, ${collectVisualRequests(c.slides).length} visual requests`,
      );
      this.state = this.state.withOutput('content', content);

      const assets = yield* this.executePhase(
        'illustrating',
        () => this.stageRunner.runIllustration(collectVisualRequests(content.slides)),
        (a) => `${a.length} assets generated`,
      );
      this.state = this.state.withOutput('assets', assets);

      const baseFilename = resolveBaseFilename(validated, content);
      const message = yield* this.executePhase(
        'assembling',
        () => this.stageRunner.runAssembly(baseFilename, reconcileSlides(content.slides, assets)),
        () => `assembled ${baseFilename}${PRESENTATION_EXTENSION}`,
      );

      const filename = `${baseFilename}${PRESENTATION_EXTENSION}`;
      this.state = this.state.withOutput('filename', filename).advance('ready');
      const usage = this.stageRunner.usage;
      this.onDebug?.(
        `[orchestrator] Ready: ${filename} (tokens in=${usage.inputTokens} out=${usage.outputTokens})`,
      );

      const result = { status: 'ready' as const, filename, message };
      yield { type: 'complete', result };
      return result;
    } catch (error) {
      return yield* this.finishFailed(error);
    } finally {
      await this.session.close();
    }
  }

  // ──────────────────────────────────────────────────────────────────────────
  // INTERNALS
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Advance into `phase`, run its stage, drain substep events, and emit the
   * phase boundaries. Errors propagate after the substeps collected so far
   * are yielded.
   */
  private async *executePhase<T>(
    phase: PipelinePhase,
    work: () => Promise<T>,
    summarize: (result: T) => string,
  ): AsyncGenerator<OrchestratorEvent, T> {
    this.state = this.state.advance(phase);
    yield { type: 'phase_start', phase };
    this.substepQueue.length = 0;

    let result: T;
    try {
      result = await work();
    } catch (error) {
      yield* this.drainSubsteps(phase);
      throw error;
    }
    yield* this.drainSubsteps(phase);

    const summary = summarize(result);
    this.onDebug?.(`[orchestrator] ${phase} complete: ${summary}`);
    yield { type: 'phase_complete', phase, summary };
    return result;
  }

  private async *drainSubsteps(phase: PipelinePhase): AsyncGenerator<OrchestratorEvent, void> {
    const pending = this.substepQueue.splice(0, this.substepQueue.length);
    for (const substep of pending) {
      yield { type: 'substep', phase, substep };
    }
  }

  /** Enter `failed` and emit the error event. */
  private async *finishFailed(error: unknown): AsyncGenerator<OrchestratorEvent, PipelineResult> {
    const kind = isDeckPipelineError(error) ? error.kind : 'Unexpected';
    const message = errorMessage(error);
    const failedFrom = this.state.phase;

    if (!this.state.isTerminal) {
      this.state = this.state.fail(kind, message);
    }
    if (kind === 'Unexpected') {
      console.error(`[orchestrator] Unexpected failure in ${failedFrom}:`, error);
    } else {
      console.warn(`[orchestrator] ${kind} in ${failedFrom}: ${message}`);
    }
    this.onDebug?.(`[orchestrator] Failed in ${failedFrom}: ${kind}: ${message}`);

    const result = { status: 'failed' as const, error: { kind, message, phase: failedFrom } };
    yield { type: 'error', result };
    return result;
  }
}

// ============================================================================
// ENTRY POINTS
// ============================================================================

export interface GenerateDeckOptions extends OrchestratorOptions {
  /** Receives every event as it is yielded. */
  onEvent?: (event: OrchestratorEvent) => void;
}

/**
 * Run one pipeline to completion and return its result. Never rejects: every
 * failure, including an unexpected one, is reported as a failed result.
 */
export async function generateDeck(
  request: DeckRequest,
  deps: DeckOrchestratorDeps,
  options: GenerateDeckOptions = {},
): Promise<PipelineResult> {
  const orchestrator = DeckOrchestrator.create(deps, options);
  return drain(orchestrator, request, options.onEvent);
}

/** `generateDeck` for an orchestrator built elsewhere (e.g. `fromConfig`). */
export async function drain(
  orchestrator: DeckOrchestrator,
  request: DeckRequest,
  onEvent?: (event: OrchestratorEvent) => void,
): Promise<PipelineResult> {
  const run = orchestrator.run(request);
  try {
    for (;;) {
      const next = await run.next();
      if (next.done) return next.value;
      onEvent?.(next.value);
    }
  } catch (error) {
    console.error('[orchestrator] Pipeline generator threw:', error);
    const result: PipelineResult = {
      status: 'failed',
      error: { kind: 'Unexpected', message: errorMessage(error), phase: orchestrator.phase },
    };
    // A throwing onEvent leaves the generator suspended at a yield; finish it
    // so its finally block closes the session
    try {
      await run.return(result);
    } catch (closeError) {
      console.warn('[orchestrator] Error finishing pipeline generator:', errorMessage(closeError));
    }
    return result;
  }
}

export interface DeckGenerationHandle {
  runId: string;
  /** Settles with the result; never rejects. */
  done: Promise<PipelineResult>;
}

/**
 * Fire-and-forget entry for a hosting layer: starts the run and returns at
 * once. Observe progress through `options.onEvent` or await `done`.
 */
export function startDeckGeneration(
  request: DeckRequest,
  orchestrator: DeckOrchestrator,
  options: { onEvent?: (event: OrchestratorEvent) => void } = {},
): DeckGenerationHandle {
  return { runId: orchestrator.runId, done: drain(orchestrator, request, options.onEvent) };
}
