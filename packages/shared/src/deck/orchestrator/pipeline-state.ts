/**
 * Pipeline State — Immutable Phase Machine
 *
 * The orchestrator's state container is immutable and append-only: every
 * transition returns a new `PipelineState` while the original is unchanged.
 *
 * Phases:
 *   requested → planning → researching → drafting → illustrating → assembling → ready
 *   failed is reachable from every non-terminal phase.
 *
 * Design principles:
 * - TypeScript writes state — the model never touches it
 * - Illegal transitions throw (they are programming errors, not run failures)
 * - Append-only event log — complete audit trail of the run
 * - Stage outputs stored as typed records, written once per phase
 */

import type {
  DeckContent,
  GeneratedAsset,
  OutlineEntry,
  PipelineFailure,
  PipelinePhase,
  ResearchSummary,
} from './types.ts';

// ============================================================================
// TRANSITIONS
// ============================================================================

const NEXT_PHASE: Readonly<Record<PipelinePhase, PipelinePhase | null>> = {
  requested: 'planning',
  planning: 'researching',
  researching: 'drafting',
  drafting: 'illustrating',
  illustrating: 'assembling',
  assembling: 'ready',
  ready: null,
  failed: null,
};

export function isTerminalPhase(phase: PipelinePhase): boolean {
  return phase === 'ready' || phase === 'failed';
}

export class IllegalTransitionError extends Error {
  constructor(readonly from: PipelinePhase, readonly to: PipelinePhase) {
    super(`Illegal pipeline transition: ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

// ============================================================================
// EVENTS & OUTPUTS
// ============================================================================

export type PhaseEventType = 'phase_entered' | 'phase_failed';

export interface PhaseEvent {
  type: PhaseEventType;
  phase: PipelinePhase;
  timestamp: number;
  data: Record<string, unknown>;
}

/** Typed outputs, one per producing phase. */
export interface StageOutputs {
  outline?: readonly OutlineEntry[];
  research?: readonly ResearchSummary[];
  content?: DeckContent;
  assets?: readonly GeneratedAsset[];
  filename?: string;
}

// ============================================================================
// PIPELINE STATE
// ============================================================================

export class PipelineState {
  readonly runId: string;
  readonly phase: PipelinePhase;
  readonly events: readonly PhaseEvent[];
  readonly outputs: Readonly<StageOutputs>;
  readonly failure?: PipelineFailure;

  private constructor(
    runId: string,
    phase: PipelinePhase,
    events: readonly PhaseEvent[],
    outputs: Readonly<StageOutputs>,
    failure?: PipelineFailure,
  ) {
    this.runId = runId;
    this.phase = phase;
    this.events = events;
    this.outputs = outputs;
    this.failure = failure;
  }

  /** Fresh state in `requested`. */
  static create(runId: string): PipelineState {
    return new PipelineState(runId, 'requested', [], {});
  }

  // ──────────────────────────────────────────────────────────────────────────
  // DERIVED PROPERTIES
  // ──────────────────────────────────────────────────────────────────────────

  get isTerminal(): boolean {
    return isTerminalPhase(this.phase);
  }

  /** Phases entered so far, in order. */
  get phaseHistory(): PipelinePhase[] {
    return this.events.filter((e) => e.type === 'phase_entered').map((e) => e.phase);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // IMMUTABLE TRANSITIONS — Each returns a NEW PipelineState instance
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Move to the next phase in sequence.
   *
   * @throws IllegalTransitionError unless `to` is the successor of the current phase
   */
  advance(to: PipelinePhase): PipelineState {
    if (NEXT_PHASE[this.phase] !== to) {
      throw new IllegalTransitionError(this.phase, to);
    }
    return new PipelineState(
      this.runId,
      to,
      [...this.events, { type: 'phase_entered', phase: to, timestamp: Date.now(), data: {} }],
      this.outputs,
    );
  }

  /**
   * Enter `failed`, preserving the originating error.
   *
   * @throws IllegalTransitionError from a terminal phase
   */
  fail(kind: PipelineFailure['kind'], message: string): PipelineState {
    if (this.isTerminal) {
      throw new IllegalTransitionError(this.phase, 'failed');
    }
    const failure: PipelineFailure = { kind, message, phase: this.phase };
    return new PipelineState(
      this.runId,
      'failed',
      [...this.events, { type: 'phase_failed', phase: this.phase, timestamp: Date.now(), data: { kind, message } }],
      this.outputs,
      failure,
    );
  }

  /** Record stage output. Outputs are written once; overwriting one throws. */
  withOutput<K extends keyof StageOutputs>(key: K, value: NonNullable<StageOutputs[K]>): PipelineState {
    if (this.outputs[key] !== undefined) {
      throw new Error(`Stage output '${key}' is already recorded`);
    }
    return new PipelineState(this.runId, this.phase, this.events, { ...this.outputs, [key]: value }, this.failure);
  }
}
