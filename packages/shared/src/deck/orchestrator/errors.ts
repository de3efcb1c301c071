/**
 * Pipeline error taxonomy.
 *
 * Every error the pipeline raises on purpose carries a `kind` so the
 * orchestrator boundary can turn it into a failure result without string
 * matching. Recoverability depends on where the error is raised, not on
 * its kind (a ToolError during research is skipped, during assembly it is fatal).
 */

export type DeckErrorKind =
  | 'InvalidRequest'
  | 'PlanningFailed'
  | 'CompletionTransportError'
  | 'ConnectionError'
  | 'ToolError'
  | 'DraftingFailed'
  | 'DraftingConstraintViolation'
  | 'ConfigError'
  | 'Unexpected';

export abstract class DeckPipelineError extends Error {
  abstract readonly kind: DeckErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad topic or slide count. Raised before any stage runs. */
export class InvalidRequestError extends DeckPipelineError {
  readonly kind = 'InvalidRequest' as const;
}

/** The completion collaborator never produced a valid outline within the retry bound. */
export class PlanningFailedError extends DeckPipelineError {
  readonly kind = 'PlanningFailed' as const;

  constructor(
    message: string,
    public readonly attempts: number,
    public readonly issues: readonly string[],
  ) {
    super(message);
  }
}

/** Network or API failure talking to the completion provider. Not retried. */
export class CompletionTransportError extends DeckPipelineError {
  readonly kind = 'CompletionTransportError' as const;
}

/** The tool endpoint could not be reached, the handshake timed out, or the session is not open. */
export class ConnectionError extends DeckPipelineError {
  readonly kind = 'ConnectionError' as const;
}

/** A single tool invocation failed. */
export class ToolError extends DeckPipelineError {
  readonly kind = 'ToolError' as const;

  constructor(
    public readonly toolName: string,
    public readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Tool '${toolName}' failed: ${reason}`, options);
  }
}

/** Drafting returned no valid deck, or a deck that does not match the outline. */
export class DraftingFailedError extends DeckPipelineError {
  readonly kind = 'DraftingFailed' as const;
}

/** The drafted deck has no well-formed chart request. */
export class DraftingConstraintViolationError extends DeckPipelineError {
  readonly kind = 'DraftingConstraintViolation' as const;
}

/** Configuration file or environment failed validation. */
export class ConfigError extends DeckPipelineError {
  readonly kind = 'ConfigError' as const;

  constructor(message: string, public readonly issues: readonly string[] = []) {
    super(message);
  }
}

export function isDeckPipelineError(error: unknown): error is DeckPipelineError {
  return error instanceof DeckPipelineError;
}

/** Human-readable message for any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
