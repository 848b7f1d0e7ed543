/**
 * Run Command
 *
 * Argument parsing and execution for `filter-vm-run`, kept free of process
 * and file system access so it can be driven from tests.
 *
 * @packageDocumentation
 */

import {
  CallbackRegistry,
  FilterConfigError,
  FilterEngine,
  parseCallbackFixtures,
  testFilter,
  type CallbackDefinition,
  type CallbackFixtures,
  type FilterEngineOptions,
  type FilterTestReport,
} from 'filter-vm';

/**
 * Exit codes
 */
export const ExitCode = {
  Ok: 0,
  Diagnostic: 1,
  Usage: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Parsed command configuration
 */
export interface RunCommandConfig {
  scriptPath: string;
  entryPoint: string;
  fixturesPath?: string;
  options: FilterEngineOptions;
}

export type ParsedArgs =
  | { kind: 'run'; config: RunCommandConfig }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

export const HELP_TEXT = `
Deterministic filter runner

Usage:
  filter-vm-run <script.js> [options]

Options:
  --entry <name>         Entry function to call (default: main)
  --callbacks <file>     JSON file mapping callback names to canned results
  --timeout <ms>         Watchdog for loading and running (default: 1000)
  --limit-math           Remove non-essential Math built-ins and Date.now
  --debug                Enable debug logging
  --help, -h             Show this help message

Callback fixtures:
  { "getfiltertransaction": { "result": { "amount": 5 } },
    "getfilterblock": { "error": "not available" } }

Examples:
  filter-vm-run filter.js
  filter-vm-run filter.js --entry filtertransaction --callbacks fixtures.json --timeout 200
`;

/**
 * Parse command line arguments
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const options: FilterEngineOptions = {};
  let scriptPath: string | undefined;
  let entryPoint = 'main';
  let fixturesPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--entry':
      case '--callbacks':
      case '--timeout': {
        const value = args[++i];
        if (value === undefined) {
          return { kind: 'error', message: `Missing value for ${arg}` };
        }
        if (arg === '--entry') {
          entryPoint = value;
        } else if (arg === '--callbacks') {
          fixturesPath = value;
        } else {
          const timeoutMs = Number(value);
          if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
            return { kind: 'error', message: `Invalid value for --timeout: ${value}` };
          }
          options.timeoutMs = timeoutMs;
        }
        break;
      }

      case '--limit-math':
        options.limitMathBuiltins = true;
        break;

      case '--debug':
        options.debug = true;
        break;

      case '--help':
      case '-h':
        return { kind: 'help' };

      default:
        if (arg.startsWith('-')) {
          return { kind: 'error', message: `Unknown option: ${arg}` };
        }
        if (scriptPath !== undefined) {
          return { kind: 'error', message: `Unexpected argument: ${arg}` };
        }
        scriptPath = arg;
    }
  }

  if (scriptPath === undefined) {
    return { kind: 'error', message: 'Missing script path' };
  }
  return { kind: 'run', config: { scriptPath, entryPoint, fixturesPath, options } };
}

/**
 * Build a registry whose callbacks return or throw what the fixtures say.
 *
 * @throws FilterConfigError if a fixture name is reserved
 */
export function createFixtureRegistry(fixtures: CallbackFixtures): CallbackRegistry {
  const definitions: CallbackDefinition[] = Object.entries(fixtures).map(([name, fixture]) => ({
    name,
    description: 'Fixture',
    handler: () => {
      if ('error' in fixture) {
        throw new Error(fixture.error);
      }
      return fixture.result;
    },
  }));
  return new CallbackRegistry(definitions);
}

/**
 * Input files of one command run, already read
 */
export interface RunCommandInput {
  script: string;
  /** Parsed JSON of the fixtures file */
  fixtures?: unknown;
}

export interface RunCommandOutcome {
  report: FilterTestReport;
  exitCode: ExitCode;
}

/**
 * Run the script once with every fixture callback available.
 *
 * @throws FilterConfigError if the fixtures or the options do not validate
 */
export function executeFilterCommand(config: RunCommandConfig, input: RunCommandInput): RunCommandOutcome {
  const parsed = parseCallbackFixtures(input.fixtures ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'fixtures'}: ${issue.message}`,
    );
    throw new FilterConfigError(`Invalid callback fixtures: ${issues.join('; ')}`, issues);
  }

  const registry = createFixtureRegistry(parsed.data);
  const engine = new FilterEngine(config.options, { registry });
  const report = testFilter(engine, {
    script: input.script,
    entryPoint: config.entryPoint,
    callbacks: registry.list(),
  });

  const failed = !report.compiled || report.exception !== undefined;
  return { report, exitCode: failed ? ExitCode.Diagnostic : ExitCode.Ok };
}
