/**
 * Generate a Deck from the Command Line
 *
 * Loads configuration (deckwright.config.json + environment), starts the
 * configured tool server, and runs the full pipeline once:
 *   planning → researching → drafting → illustrating → assembling
 *
 * Run:
 *   npx tsx scripts/generate-deck.ts "Space Exploration" 5
 *   npx tsx scripts/generate-deck.ts "Space Exploration" 5 --filename="space_101"
 *   npx tsx scripts/generate-deck.ts "Space Exploration" 5 --config=./deck.json --debug
 *
 * Requires ANTHROPIC_API_KEY (or llm.apiKey in the config file).
 * Exit code is 0 when the deck is ready, 1 on failure.
 */

import { join } from 'node:path';
import {
  ConfigError,
  DeckOrchestrator,
  drain,
  loadDeckConfig,
  setDebugEnabled,
  type DeckConfig,
  type OrchestratorEvent,
} from '../packages/shared/src/index.ts';

// ============================================================================
// Arguments
// ============================================================================

interface CliArgs {
  topic: string;
  slideCount: number;
  filename?: string;
  configPath?: string;
  debug: boolean;
}

function usage(): never {
  console.error('Usage: generate-deck <topic> <slide-count> [--filename=<name>] [--config=<path>] [--debug]');
  process.exit(1);
}

function parseArgs(argv: string[]): CliArgs {
  const flag = (name: string) => argv.find((a) => a.startsWith(`--${name}=`))?.slice(name.length + 3);
  const positional = argv.filter((a) => !a.startsWith('--'));

  const [topic, count] = positional;
  if (!topic || !count) usage();

  const filename = flag('filename');
  const configPath = flag('config');
  return {
    topic,
    // Range is checked by the pipeline; only the format is checked here
    slideCount: /^\d+$/.test(count) ? Number(count) : Number.NaN,
    ...(filename ? { filename } : {}),
    ...(configPath ? { configPath } : {}),
    debug: argv.includes('--debug'),
  };
}

// ============================================================================
// Progress
// ============================================================================

function printEvent(event: OrchestratorEvent): void {
  switch (event.type) {
    case 'phase_start':
      console.log(`\n── ${event.phase} ${'─'.repeat(Math.max(0, 50 - event.phase.length))}`);
      break;
    case 'phase_complete':
      console.log(`   ✓ ${event.summary}`);
      break;
    case 'substep': {
      const { substep } = event;
      if (substep.type === 'tool_start') {
        console.log(`   → ${substep.toolName} ${JSON.stringify(substep.input).slice(0, 100)}`);
      } else if (substep.type === 'tool_result' && substep.isError) {
        console.log(`   ✗ ${substep.toolName}: ${substep.summary}`);
      } else if (substep.type === 'degraded') {
        console.log(`   ⚠ slide ${substep.slideIndex + 1}: ${substep.reason}`);
      } else if (substep.type === 'completion_start' && substep.attempt > 1) {
        console.log(`   ↻ ${substep.stage} attempt ${substep.attempt}`);
      }
      break;
    }
    case 'complete':
    case 'error':
      break;
  }
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.debug) setDebugEnabled(true);

  let config: DeckConfig;
  try {
    config = loadDeckConfig(args.configPath ? { configPath: args.configPath } : {});
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`ERROR: ${error.message}`);
      for (const issue of error.issues) console.error(`  - ${issue}`);
      process.exit(1);
    }
    throw error;
  }

  console.log(`[config] Tool server: ${config.mcp.transport === 'stdio'
    ? `${config.mcp.command} ${config.mcp.args.join(' ')}`
    : config.mcp.url}`);
  console.log(`[config] Output: ${config.outputDir}`);

  const orchestrator = DeckOrchestrator.fromConfig(config, {
    ...(args.debug ? { onDebug: (message: string) => console.log(`   ${message}`) } : {}),
  });

  const result = await drain(
    orchestrator,
    {
      topic: args.topic,
      slideCount: args.slideCount,
      ...(args.filename ? { filename: args.filename } : {}),
    },
    printEvent,
  );

  if (result.status === 'ready') {
    console.log(`\n✅ ${join(config.outputDir, result.filename)}`);
    return;
  }

  console.error(`\n❌ ${result.error.kind} in ${result.error.phase}: ${result.error.message}`);
  process.exit(1);
}

main().catch((error: unknown) => {
  console.error('Fatal:', error);
  process.exit(1);
});
