/**
 * MCP Tool Session
 *
 * One logical channel to the tool server for one pipeline run:
 * open() → invoke()* → close().
 *
 * The orchestrator's session is the only owner of its MCP client. Invocations
 * are chained onto the previous call's settlement, so at most one request is
 * in flight per session no matter how callers schedule them. There is no
 * retry here; retry policy belongs to the stages.
 *
 * Usage:
 * ```typescript
 * const session = new McpToolSession(new DeckMcpClient(config.mcp), { handshakeTimeoutMs: 30_000 });
 * try {
 *   await session.open();
 *   const hits = await new DeckToolBridge(session).searchWeb('artemis program budget');
 * } finally {
 *   await session.close();
 * }
 * ```
 */

import { z } from 'zod';
import { DeckMcpClient, type McpClientConfig, type McpToolClient } from '../../mcp/client.ts';
import { debug } from '../../utils/debug.ts';
import { ConnectionError, ToolError, errorMessage } from './errors.ts';
import type { ToolCallResult, ToolSession } from './types.ts';

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 30_000;

// ============================================================================
// RESULT SHAPE
// ============================================================================

/**
 * MCP CallToolResult subset. Content blocks other than text (images,
 * resources) are kept with their type so callers can report them.
 */
const CallToolResultSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    }).passthrough(),
  ),
  isError: z.boolean().optional(),
}).passthrough();

// ============================================================================
// SESSION
// ============================================================================

export interface McpToolSessionOptions {
  /** Bound on connect + tool discovery. Default: 30 s. */
  handshakeTimeoutMs?: number;
}

type SessionState = 'idle' | 'open' | 'closed';

export class McpToolSession implements ToolSession {
  private state: SessionState = 'idle';
  private capabilities: ReadonlySet<string> = new Set();
  private readonly handshakeTimeoutMs: number;

  /** Settles when the most recent invocation settles. */
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly client: McpToolClient,
    options: McpToolSessionOptions = {},
  ) {
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
  }

  /** Convenience constructor from a transport config. */
  static fromConfig(config: McpClientConfig, options?: McpToolSessionOptions): McpToolSession {
    return new McpToolSession(new DeckMcpClient(config), options);
  }

  /**
   * Connect and discover tools within the handshake bound.
   *
   * @throws ConnectionError on connect failure, discovery failure, timeout,
   *   or when the session was already opened
   */
  async open(): Promise<ReadonlySet<string>> {
    if (this.state !== 'idle') {
      throw new ConnectionError(`Tool session cannot be opened from state '${this.state}'`);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    let timedOut = false;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        reject(new ConnectionError(`Tool server handshake timed out after ${this.handshakeTimeoutMs} ms`));
      }, this.handshakeTimeoutMs);
    });

    const handshake = this.handshake();
    // A handshake that loses the race may still settle later; a late
    // success leaves a live connection that must be released again
    void handshake.then(
      () => (timedOut ? this.closeClient() : undefined),
      () => undefined,
    );

    try {
      const names = await Promise.race([handshake, timeout]);
      this.capabilities = new Set(names);
      this.state = 'open';
      debug('[McpToolSession] Open with tools: %s', names.join(', '));
      return this.capabilities;
    } catch (error) {
      // Release whatever half-open transport the handshake left behind
      await this.closeClient();
      this.state = 'closed';
      if (error instanceof ConnectionError) throw error;
      throw new ConnectionError(`Failed to connect to tool server: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Invoke one tool and wait for its single response.
   *
   * @throws ConnectionError when the session is not open
   * @throws ToolError for unadvertised tools, transport failures, malformed or error results
   */
  invoke(toolName: string, args: Record<string, unknown>): Promise<ToolCallResult> {
    const run = this.tail.then(
      () => this.invokeNow(toolName, args),
      () => this.invokeNow(toolName, args),
    );
    this.tail = run.catch(() => undefined);
    return run;
  }

  /** Release the channel. Idempotent; close errors are logged, not thrown. */
  async close(): Promise<void> {
    if (this.state === 'closed') return;
    this.state = 'closed';
    // Let an in-flight invocation settle before tearing down the transport
    await this.tail;
    await this.closeClient();
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  get tools(): ReadonlySet<string> {
    return this.capabilities;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // INTERNALS
  // ──────────────────────────────────────────────────────────────────────────

  private async handshake(): Promise<string[]> {
    await this.client.connect();
    return this.client.listTools();
  }

  private async invokeNow(toolName: string, args: Record<string, unknown>): Promise<ToolCallResult> {
    if (this.state !== 'open') {
      throw new ConnectionError(`Tool session is not open (state '${this.state}'); cannot call '${toolName}'`);
    }
    if (!this.capabilities.has(toolName)) {
      throw new ToolError(toolName, 'tool is not advertised by the server');
    }

    let raw: unknown;
    try {
      raw = await this.client.callTool(toolName, args);
    } catch (error) {
      throw new ToolError(toolName, errorMessage(error), { cause: error });
    }

    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ToolError(toolName, `unexpected result shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const result: ToolCallResult = {
      content: parsed.data.content.map((block) => ({ type: block.type, text: block.text })),
      isError: parsed.data.isError,
    };
    if (result.isError) {
      const text = result.content.find((c) => c.type === 'text')?.text;
      throw new ToolError(toolName, text ?? 'unknown error');
    }
    return result;
  }

  private async closeClient(): Promise<void> {
    try {
      await this.client.close();
    } catch (error) {
      console.warn('[McpToolSession] Error closing MCP client:', errorMessage(error));
    }
  }
}
