/**
 * Deck MCP Client
 *
 * Thin wrapper over the MCP SDK client. Owns the transport (stdio subprocess
 * or streamable HTTP) and exposes the four operations the tool session needs.
 * Result payloads are returned raw; validation happens one layer up.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { debug } from '../utils/debug.ts';

// ============================================================================
// CONFIG
// ============================================================================

export interface StdioMcpClientConfig {
  transport: 'stdio';
  command: string;
  args?: string[];
  cwd?: string;
  /** Extra environment for the subprocess, layered over the parent environment. */
  env?: Record<string, string>;
}

export interface HttpMcpClientConfig {
  transport: 'http';
  url: string;
  headers?: Record<string, string>;
}

export type McpClientConfig = StdioMcpClientConfig | HttpMcpClientConfig;

// ============================================================================
// CLIENT PORT
// ============================================================================

/**
 * What McpToolSession needs from an MCP client.
 * DeckMcpClient is the production implementation; tests supply in-process fakes.
 */
export interface McpToolClient {
  connect(): Promise<void>;
  /** Names of every tool the server advertises. */
  listTools(): Promise<string[]>;
  /** Raw CallToolResult. */
  callTool(name: string, args: Record<string, unknown>): Promise<unknown>;
  close(): Promise<void>;
}

// ============================================================================
// IMPLEMENTATION
// ============================================================================

const CLIENT_INFO = { name: 'deckwright-pipeline', version: '0.1.0' } as const;

export class DeckMcpClient implements McpToolClient {
  private client: Client | null = null;
  /** Client whose handshake is still in flight; close() tears it down too. */
  private connecting: Client | null = null;

  constructor(private readonly config: McpClientConfig) {}

  async connect(): Promise<void> {
    if (this.client) return;
    const client = new Client(CLIENT_INFO);
    this.connecting = client;
    try {
      await client.connect(createTransport(this.config));
    } catch (error) {
      if (this.connecting === client) this.connecting = null;
      throw error;
    }

    if (this.connecting !== client) {
      // close() ran while the handshake was pending
      await client.close();
      throw new Error('MCP client was closed while connecting');
    }
    this.connecting = null;
    this.client = client;
    debug('[DeckMcpClient] Connected via %s transport', this.config.transport);
  }

  async listTools(): Promise<string[]> {
    const client = this.requireClient();
    const names: string[] = [];
    let cursor: string | undefined;
    do {
      const page = await client.listTools(cursor ? { cursor } : undefined);
      names.push(...page.tools.map((tool) => tool.name));
      cursor = page.nextCursor;
    } while (cursor);
    return names;
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
    return this.requireClient().callTool({ name, arguments: args });
  }

  async close(): Promise<void> {
    const client = this.client ?? this.connecting;
    this.client = null;
    this.connecting = null;
    if (client) {
      await client.close();
      debug('[DeckMcpClient] Closed');
    }
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new Error('MCP client is not connected');
    }
    return this.client;
  }
}

/** Build the SDK transport for a config. Exported for tests. */
export function createTransport(config: McpClientConfig): Transport {
  if (config.transport === 'stdio') {
    return new StdioClientTransport({
      command: config.command,
      args: config.args,
      cwd: config.cwd,
      env: config.env ? { ...inheritedEnv(), ...config.env } : undefined,
      stderr: 'inherit',
    });
  }
  return new StreamableHTTPClientTransport(new URL(config.url), {
    requestInit: config.headers ? { headers: config.headers } : undefined,
  });
}

function inheritedEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (typeof value === 'string') env[key] = value;
  }
  return env;
}
