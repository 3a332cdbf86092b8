#!/usr/bin/env node

/**
 * Scenario runner.
 *
 * Usage:
 *   dispatch <observer|strategy|mediator|chain> [--skip-errors] [--replace-duplicates]
 *
 * Reads the scenario's input from stdin and writes its output to stdout.
 * Logs go to stderr.
 *
 * Environment Variables:
 *   DISPATCH_ENV              - Environment: development (default), test, production
 *   DISPATCH_LOG_LEVEL        - Log level: fatal, error, warn, info, debug, trace, silent
 *   DISPATCH_DUPLICATE_POLICY - reject (default) or replace
 *   DISPATCH_ERROR_POLICY     - halt (default) or skip
 */

import { parseArgs } from 'node:util';
import { type DispatchConfig, loadConfig } from '../src/config/index.js';
import { ArrayLineSource, StreamLineSink } from '../src/io/line-io.js';
import { configureLogging } from '../src/logging/index.js';
import { exitCodeFor, isScenarioName, runScenario, SCENARIO_NAMES } from '../src/scenarios/index.js';

const USAGE = `Usage: dispatch <${SCENARIO_NAMES.join('|')}> [--skip-errors] [--replace-duplicates]`;

async function readStdin(): Promise<string> {
  const chunks: string[] = [];
  process.stdin.setEncoding('utf8');
  for await (const chunk of process.stdin) {
    chunks.push(String(chunk));
  }
  return chunks.join('');
}

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      'skip-errors': { type: 'boolean', default: false },
      'replace-duplicates': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const [scenario] = positionals;
  if (positionals.length !== 1 || !isScenarioName(scenario)) {
    process.stderr.write(`${USAGE}\n`);
    return 2;
  }

  const fromEnv = loadConfig({ NODE_ENV: 'development', ...process.env });
  const config: DispatchConfig = {
    ...fromEnv,
    errorPolicy: values['skip-errors'] ? 'skip' : fromEnv.errorPolicy,
    duplicatePolicy: values['replace-duplicates'] ? 'replace' : fromEnv.duplicatePolicy,
  };
  const log = configureLogging(config);

  const source = ArrayLineSource.fromText(await readStdin());
  const outcome = runScenario(scenario, source, new StreamLineSink(process.stdout), {
    errorPolicy: config.errorPolicy,
    duplicatePolicy: config.duplicatePolicy,
  });

  log.debug({ component: 'cli', scenario, status: outcome.status }, 'Scenario finished');
  return exitCodeFor(outcome);
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`${message}\n`);
    process.exitCode = 2;
  });
