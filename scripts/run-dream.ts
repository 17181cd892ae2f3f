/**
 * Run one what-if scenario against a snapshot file and print the result.
 *
 * Usage:
 *   npx tsx scripts/run-dream.ts scope_creep fixtures/sprint.json
 *   npx tsx scripts/run-dream.ts resource_stress fixtures/sprint.json --params '{"remove_count":2}'
 *   npx tsx scripts/run-dream.ts --help
 *
 * Dreams are saved under DREAMS_DIR (default ./data/dreams). With
 * ANTHROPIC_API_KEY set, the impact summary comes from Claude.
 */

import { readFile } from 'node:fs/promises';

import {
  BUILTIN_SCENARIOS_PATH,
  ClaudeNarrativeGenerator,
  DreamingEngine,
  FileDreamStore,
  Logger,
  SCENARIO_TYPES,
  SprintSnapshotSchema,
  createHaikuClient,
  errorMessage,
  loadScenarioDefaults,
  parseOrThrow,
} from '@sprint-garden/core';

// ---------------------------------------------------------------------------
// CLI argument parsing
// ---------------------------------------------------------------------------

const args = process.argv.slice(2);

if (args.length < 2 || args.includes('--help') || args.includes('-h')) {
  console.log(`
Usage: npx tsx scripts/run-dream.ts <scenario> <snapshot.json> [--params '<json>']

Scenarios:
  ${SCENARIO_TYPES.join('\n  ')}

Options:
  --params '<json>'  Scenario parameters (merged over the configured defaults)
  --help, -h         Show this help message

Environment:
  DREAMS_DIR         Where dreams are saved (default: ./data/dreams)
  SCENARIOS_PATH     Scenario defaults file (default: built-in)
  ANTHROPIC_API_KEY  Enables the Claude narrative forecast
`);
  process.exit(args.includes('--help') || args.includes('-h') ? 0 : 1);
}

const [scenario = '', snapshotPath = ''] = args;

function parseParams(): Record<string, unknown> {
  const index = args.indexOf('--params');
  if (index === -1) {
    return {};
  }
  const raw = args[index + 1];
  if (!raw) {
    console.error('--params flag requires a JSON string argument');
    process.exit(1);
  }
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    console.error('--params must be a JSON object');
    process.exit(1);
  }
  return Object.fromEntries(Object.entries(parsed));
}

async function main(): Promise<void> {
  const logger = new Logger({ level: 'WARN' });
  const snapshot = parseOrThrow(
    SprintSnapshotSchema,
    JSON.parse(await readFile(snapshotPath, 'utf-8')),
    'snapshot file'
  );

  const apiKey = process.env.ANTHROPIC_API_KEY;
  const engine = new DreamingEngine({
    store: new FileDreamStore(process.env.DREAMS_DIR ?? './data/dreams', logger),
    narrator: apiKey ? new ClaudeNarrativeGenerator({ completer: createHaikuClient(apiKey), logger }) : undefined,
    scenarioDefaults: await loadScenarioDefaults(process.env.SCENARIOS_PATH ?? BUILTIN_SCENARIOS_PATH, logger),
    logger,
  });

  const outcome = await engine.simulate(scenario, snapshot, parseParams());
  if (!outcome.ok) {
    console.error(`${outcome.error}\nValid scenarios: ${outcome.validScenarios.join(', ')}`);
    process.exit(1);
  }
  console.log(JSON.stringify(outcome.result, null, 2));
}

main().catch((err: unknown) => {
  console.error('Dream failed:', errorMessage(err));
  process.exit(1);
});
