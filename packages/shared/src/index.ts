/**
 * @deckwright/shared
 *
 * Deck generation pipeline and its ambient stack.
 */

export * from './deck/orchestrator/index.ts';
export {
  DeckConfigSchema,
  DEFAULT_CONFIG_FILENAME,
  applyEnvOverrides,
  loadDeckConfig,
} from './config/deck-config.ts';
export type { DeckConfig, LoadDeckConfigOptions, McpConfig } from './config/deck-config.ts';
export { DeckMcpClient, createTransport } from './mcp/client.ts';
export type { HttpMcpClientConfig, McpClientConfig, McpToolClient, StdioMcpClientConfig } from './mcp/client.ts';
export { debug, isDebugEnabled, setDebugEnabled } from './utils/debug.ts';
