#!/usr/bin/env node
/**
 * NexusMind CLI
 *
 * Runs a single query through the reasoning pipeline and prints the result.
 */

import { Command, CommanderError } from 'commander';
import { settings, Settings } from './config';
import { errorMessage, logger } from './logger';
import { GoTProcessor } from './application/gotProcessor';
import { createGraphRepository } from './infrastructure/graphRepositoryFactory';
import { GoTProcessorSessionData } from './domain/models/commonTypes';

const USAGE = 'Usage: nexusmind "<query>" [--json] [--memory]';

interface CliOptions {
  json: boolean;
  memory: boolean;
}

export const formatSessionReport = (session: GoTProcessorSessionData): string => {
  const lines = [
    session.final_answer,
    '',
    `Confidence: [${session.final_confidence_vector.map((value) => value.toFixed(2)).join(', ')}]`,
    '',
    'Reasoning trace:',
    ...session.stage_outputs_trace.map(
      (entry) => `  ${entry.stage_number}. ${entry.stage_name} (${entry.duration_ms}ms): ${entry.summary}`
    ),
  ];
  return lines.join('\n');
};

const buildProgram = (): Command =>
  new Command('nexusmind')
    .description('Run a query through the NexusMind reasoning pipeline')
    .version(settings.mcp_settings.server_version)
    .argument('[query...]', 'Question to reason about')
    .option('--json', 'Print the full session as JSON', false)
    .option('--memory', 'Use the in-memory graph store instead of Neo4j', false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => process.stdout.write(text),
      writeErr: (text) => process.stderr.write(text),
    });

async function runQuery(query: string, options: CliOptions): Promise<void> {
  const runtimeSettings: Settings = options.memory
    ? { ...settings, graph_store: { backend: 'memory' } }
    : settings;
  const repository = await createGraphRepository(runtimeSettings);
  const processor = new GoTProcessor(runtimeSettings, { repository });
  try {
    const session = await processor.processQuery(query);
    process.stdout.write(`${options.json ? JSON.stringify(session, null, 2) : formatSessionReport(session)}\n`);
  } finally {
    await processor.shutdownResources();
    await repository.close();
  }
}

/** Parses `argv` (without the node and script entries) and returns the exit code. */
export async function run(argv: string[]): Promise<number> {
  const program = buildProgram();
  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const query = program.args.join(' ').trim();
  if (!query) {
    process.stderr.write(`${USAGE}\n`);
    return 2;
  }
  await runQuery(query, program.opts<CliOptions>());
  return 0;
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error(`nexusmind failed: ${errorMessage(error)}`);
      process.exitCode = 1;
    });
}
