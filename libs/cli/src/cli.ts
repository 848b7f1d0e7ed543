#!/usr/bin/env node
/**
 * Filter Runner CLI
 *
 * Compile and run a filter script once, outside any host application, and
 * print the report as JSON.
 *
 * Usage:
 *   filter-vm-run <script.js> [options]
 *
 * Options:
 *   --entry <name>         Entry function to call (default: main)
 *   --callbacks <file>     JSON file mapping callback names to canned results
 *   --timeout <ms>         Watchdog for loading and running (default: 1000)
 *   --limit-math           Remove non-essential Math built-ins and Date.now
 *   --debug                Enable debug logging
 *   --help                 Show help
 *
 * @packageDocumentation
 */

import * as fs from 'fs';
import { FilterConfigError } from 'filter-vm';
import { ExitCode, HELP_TEXT, executeFilterCommand, parseArgs } from './run-command';

function readJsonFile(path: string): unknown {
  return JSON.parse(fs.readFileSync(path, 'utf8'));
}

/**
 * Main entry point
 */
export function main(args: string[]): ExitCode {
  const parsed = parseArgs(args);

  if (parsed.kind === 'help') {
    console.log(HELP_TEXT);
    return ExitCode.Ok;
  }
  if (parsed.kind === 'error') {
    console.error(parsed.message);
    console.error('Run with --help for usage');
    return ExitCode.Usage;
  }

  const { config } = parsed;
  let script: string;
  let fixtures: unknown;
  try {
    script = fs.readFileSync(config.scriptPath, 'utf8');
    fixtures = config.fixturesPath === undefined ? undefined : readJsonFile(config.fixturesPath);
  } catch (error: unknown) {
    console.error(`Failed to read input: ${error instanceof Error ? error.message : String(error)}`);
    return ExitCode.Usage;
  }

  try {
    const { report, exitCode } = executeFilterCommand(config, { script, fixtures });
    console.log(JSON.stringify(report, null, 2));
    return exitCode;
  } catch (error: unknown) {
    if (error instanceof FilterConfigError) {
      console.error(error.message);
      return ExitCode.Usage;
    }
    throw error;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
