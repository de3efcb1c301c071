/**
 * Deck Config
 *
 * Process-wide configuration, read once at startup and never mutated.
 *
 * Sources, later wins:
 * 1. Schema defaults
 * 2. JSON file (explicit path, else `deckwright.config.json` in cwd when present)
 * 3. Environment overrides
 *
 * Relative paths (outputDir, mcp.cwd, a path-like mcp.command) resolve against
 * the config file's directory, or cwd when there is no file.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../deck/orchestrator/errors.ts';
import { summarizeZodError } from '../deck/orchestrator/json-extractor.ts';
import { DEFAULT_MAX_TOKENS, DEFAULT_MODEL } from '../deck/orchestrator/llm-client.ts';
import { DEFAULT_HANDSHAKE_TIMEOUT_MS } from '../deck/orchestrator/mcp-lifecycle.ts';
import {
  DEFAULT_MAX_SLIDES,
  DEFAULT_PLANNING_MAX_ATTEMPTS,
  DEFAULT_RESEARCH_OPTIONS,
} from '../deck/orchestrator/stage-runner.ts';

export const DEFAULT_CONFIG_FILENAME = 'deckwright.config.json';

// ============================================================================
// SCHEMA
// ============================================================================

const StdioMcpSchema = z.object({
  transport: z.literal('stdio'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().min(1).optional(),
  env: z.record(z.string()).optional(),
});

const HttpMcpSchema = z.object({
  transport: z.literal('http'),
  url: z.string().url(),
  headers: z.record(z.string()).optional(),
});

export const DeckConfigSchema = z.object({
  outputDir: z.string().min(1).default('./concluded_presentations'),
  maxSlides: z.number().int().min(1).default(DEFAULT_MAX_SLIDES),
  mcp: z.discriminatedUnion('transport', [StdioMcpSchema, HttpMcpSchema])
    .default({ transport: 'stdio', command: 'deck-tool-server', args: [] }),
  session: z.object({
    handshakeTimeoutMs: z.number().int().positive().default(DEFAULT_HANDSHAKE_TIMEOUT_MS),
  }).default({}),
  llm: z.object({
    model: z.string().min(1).default(DEFAULT_MODEL),
    maxTokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
    apiKey: z.string().min(1).optional(),
    baseURL: z.string().url().optional(),
  }).default({}),
  planning: z.object({
    maxAttempts: z.number().int().min(1).max(10).default(DEFAULT_PLANNING_MAX_ATTEMPTS),
  }).default({}),
  research: z.object({
    maxSourcesPerSlide: z.number().int().min(1).default(DEFAULT_RESEARCH_OPTIONS.maxSourcesPerSlide),
    verifyLinks: z.boolean().default(DEFAULT_RESEARCH_OPTIONS.verifyLinks),
    linkTimeoutMs: z.number().int().positive().default(DEFAULT_RESEARCH_OPTIONS.linkTimeoutMs),
    blockedDomains: z.array(z.string().min(1)).default([...DEFAULT_RESEARCH_OPTIONS.blockedDomains]),
    trustedSuffixes: z.array(z.string().min(1)).default([...DEFAULT_RESEARCH_OPTIONS.trustedSuffixes]),
  }).default({}),
});

export type DeckConfig = z.infer<typeof DeckConfigSchema>;
export type McpConfig = DeckConfig['mcp'];

// ============================================================================
// LOADING
// ============================================================================

export interface LoadDeckConfigOptions {
  /** JSON config file. Missing explicit file is an error. */
  configPath?: string;
  /** Defaults to process.env. */
  env?: Readonly<Record<string, string | undefined>>;
  /** Defaults to process.cwd(). */
  cwd?: string;
}

/**
 * Load, override and validate the configuration.
 *
 * @throws ConfigError when the file cannot be read, is not JSON, or the
 *   merged result fails validation
 */
export function loadDeckConfig(options: LoadDeckConfigOptions = {}): DeckConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const configPath = options.configPath
    ? resolve(cwd, options.configPath)
    : defaultConfigPath(cwd);
  const baseDir = configPath ? dirname(configPath) : cwd;

  const fromFile = parseConfig(configPath ? readConfigFile(configPath) : {}, configPath ?? 'defaults');
  const merged = parseConfig(applyEnvOverrides(fromFile, env), 'environment');

  return resolvePaths(merged, baseDir);
}

function defaultConfigPath(cwd: string): string | undefined {
  const candidate = resolve(cwd, DEFAULT_CONFIG_FILENAME);
  return existsSync(candidate) ? candidate : undefined;
}

function readConfigFile(path: string): unknown {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`);
  }
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Config file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

function parseConfig(raw: unknown, origin: string): DeckConfig {
  const result = DeckConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid configuration (${origin}): ${summarizeZodError(result.error)}`, issues);
  }
  return result.data;
}

// ============================================================================
// ENVIRONMENT OVERRIDES
// ============================================================================

/**
 * Overlay environment variables onto a validated config.
 *
 * DECK_MCP_URL switches to the HTTP transport; DECK_MCP_COMMAND switches to
 * stdio. When both are set the URL wins.
 */
export function applyEnvOverrides(
  config: DeckConfig,
  env: Readonly<Record<string, string | undefined>>,
): DeckConfig {
  const value = (key: string): string | undefined => {
    const v = env[key]?.trim();
    return v ? v : undefined;
  };

  let mcp: McpConfig = config.mcp;
  const mcpUrl = value('DECK_MCP_URL');
  const mcpCommand = value('DECK_MCP_COMMAND');
  const mcpArgs = value('DECK_MCP_ARGS');
  const mcpCwd = value('DECK_MCP_CWD');

  if (mcpUrl) {
    mcp = { transport: 'http', url: mcpUrl };
  } else if (mcpCommand || mcpArgs || mcpCwd) {
    const base = mcp.transport === 'stdio' ? mcp : { transport: 'stdio' as const, command: '', args: [] };
    mcp = {
      ...base,
      ...(mcpCommand ? { command: mcpCommand } : {}),
      ...(mcpArgs ? { args: mcpArgs.split(/\s+/) } : {}),
      ...(mcpCwd ? { cwd: mcpCwd } : {}),
    };
  }

  const outputDir = value('DECK_OUTPUT_DIR');
  const model = value('DECK_MODEL');
  const apiKey = value('ANTHROPIC_API_KEY');
  const baseURL = value('ANTHROPIC_BASE_URL');

  return {
    ...config,
    ...(outputDir ? { outputDir } : {}),
    mcp,
    llm: {
      ...config.llm,
      ...(model ? { model } : {}),
      ...(apiKey ? { apiKey } : {}),
      ...(baseURL ? { baseURL } : {}),
    },
  };
}

// ============================================================================
// PATH RESOLUTION
// ============================================================================

function resolvePaths(config: DeckConfig, baseDir: string): DeckConfig {
  const outputDir = isAbsolute(config.outputDir) ? config.outputDir : resolve(baseDir, config.outputDir);
  if (config.mcp.transport !== 'stdio') {
    return { ...config, outputDir };
  }

  const { command, cwd } = config.mcp;
  return {
    ...config,
    outputDir,
    mcp: {
      ...config.mcp,
      // Bare executable names are left for PATH lookup
      command: isPathLike(command) && !isAbsolute(command) ? resolve(baseDir, command) : command,
      ...(cwd !== undefined ? { cwd: isAbsolute(cwd) ? cwd : resolve(baseDir, cwd) } : {}),
    },
  };
}

function isPathLike(command: string): boolean {
  return command.startsWith('.') || command.includes('/') || command.includes('\\');
}
