#!/usr/bin/env node
/**
 * snapdbg CLI - inspects Snapshot Debugger snapshots and logpoints.
 *
 * Usage:
 *   snapdbg get-snapshot ./b-1649962215.json --max-level 5
 *   snapdbg compile-logpoint index.js:26 "a={a}, b={b}"
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { LOCATION_ERROR_MSG, parseAndValidateLocation, type FileLine } from '../breakpoint/utils';
import { buildLogpoint, parseLogLevel, type LogLevel } from '../logpoint/logpoint';
import { LogTemplateError, mergeLogExpressions } from '../logpoint/template';
import { DEFAULT_MAX_EXPANSION_LEVEL } from '../snapshot/resolver';
import {
  CommandError,
  expectBreakpoint,
  renderLogpoint,
  renderLogpointList,
  renderSnapshot,
  renderSnapshotList,
  selectBreakpoints,
} from './commands';
import { getConfigPath, loadConfig, saveConfig, type SnapdbgConfig } from './config';
import { OUTPUT_FORMATS, toJsonString, type OutputFormat } from './format';

const VERSION = '0.1.0';

function parseNonNegativeInt(value: string): number {
  if (!/^[0-9]+$/.test(value)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parseInt(value, 10);
}

function parseLocation(value: string): FileLine {
  const location = parseAndValidateLocation(value);
  if (location === null) {
    throw new InvalidArgumentError(LOCATION_ERROR_MSG);
  }
  return location;
}

function parseLogLevelArg(value: string): LogLevel {
  try {
    return parseLogLevel(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Read and parse a JSON document from a file, or from stdin when the path
 * is "-".
 */
export function readJsonInput(filePath: string): unknown {
  let content: string;

  if (filePath === '-') {
    content = fs.readFileSync(0, 'utf-8');
  } else {
    if (!fs.existsSync(filePath)) {
      throw new CommandError(`Input file not found: ${filePath}`);
    }
    content = fs.readFileSync(filePath, 'utf-8');
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new CommandError(`Could not parse ${filePath === '-' ? 'stdin' : filePath} as JSON: ${errorMessage}`);
  }
}

function printJson(data: unknown, format: OutputFormat): void {
  console.log(toJsonString(data, format === 'pretty-json'));
}

function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

/**
 * Runs a command body, turning the errors a user can act on into a message
 * and exit status 1.
 */
function runCommand(body: () => void): void {
  try {
    body();
  } catch (error) {
    if (error instanceof CommandError || error instanceof LogTemplateError) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Build the program. Config file settings are used where an option was not
 * given on the command line.
 */
export function createProgram(config: SnapdbgConfig = loadConfig()): Command {
  const program = new Command();

  const formatOption = (): Option =>
    new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS);
  const resolveFormat = (format?: OutputFormat): OutputFormat => format || config.format || 'default';

  program
    .name('snapdbg')
    .description('Inspect Snapshot Debugger snapshots and logpoints')
    .version(VERSION);

  program
    .command('get-snapshot')
    .description(
      'Display a snapshot: summary, evaluated expressions, local variables and call stack'
    )
    .argument('<file>', 'Snapshot JSON document, or "-" for stdin')
    .option('--frame-index <n>', 'Stack frame to display local variables from', parseNonNegativeInt, 0)
    .option(
      '--max-level <n>',
      `Maximum variable expansion level (default: ${config.maxLevel ?? DEFAULT_MAX_EXPANSION_LEVEL})`,
      parseNonNegativeInt
    )
    .addOption(formatOption())
    .action((file: string, options: { frameIndex: number; maxLevel?: number; format?: OutputFormat }) => {
      runCommand(() => {
        const snapshot = expectBreakpoint(readJsonInput(file), 'CAPTURE');
        const format = resolveFormat(options.format);

        if (format !== 'default') {
          printJson(snapshot, format);
          return;
        }

        printLines(
          renderSnapshot(snapshot, {
            frameIndex: options.frameIndex,
            maxLevel: options.maxLevel ?? config.maxLevel ?? DEFAULT_MAX_EXPANSION_LEVEL,
          })
        );
      });
    });

  program
    .command('get-logpoint')
    .description('Display a logpoint')
    .argument('<file>', 'Logpoint JSON document, or "-" for stdin')
    .addOption(formatOption())
    .action((file: string, options: { format?: OutputFormat }) => {
      runCommand(() => {
        const logpoint = expectBreakpoint(readJsonInput(file), 'LOG');
        const format = resolveFormat(options.format);

        if (format !== 'default') {
          printJson(logpoint, format);
          return;
        }

        printLines(renderLogpoint(logpoint));
      });
    });

  for (const kind of ['snapshots', 'logpoints'] as const) {
    program
      .command(`list-${kind}`)
      .description(`List the ${kind} in a breakpoints document (keyed by id, or an array)`)
      .argument('<file>', 'Breakpoints JSON document, or "-" for stdin')
      .option('--include-inactive', `Include ${kind} which have completed`, false)
      .option('--user-email <email>', `Only show ${kind} created by this user`)
      .addOption(formatOption())
      .action((file: string, options: { includeInactive: boolean; userEmail?: string; format?: OutputFormat }) => {
        runCommand(() => {
          const breakpoints = selectBreakpoints(readJsonInput(file), {
            action: kind === 'snapshots' ? 'CAPTURE' : 'LOG',
            includeInactive: options.includeInactive,
            userEmail: options.userEmail,
          });
          const format = resolveFormat(options.format);

          if (format !== 'default') {
            printJson(breakpoints, format);
          } else if (kind === 'snapshots') {
            console.log(renderSnapshotList(breakpoints));
          } else {
            console.log(renderLogpointList(breakpoints));
          }
        });
      });
  }

  program
    .command('compile-logpoint')
    .description(
      'Compile a log message template such as "a={a}, b={b}" into a logpoint document'
    )
    .argument('<location>', 'Location of the form FILE:LINE', parseLocation)
    .argument('<template>', 'Log message; text inside {} is evaluated as an expression')
    .option('--log-level <level>', 'One of info, warning, error', parseLogLevelArg, 'INFO')
    .option('--condition <condition>', 'Only log when this condition is true')
    .option('--user-email <email>', 'Email to record as the logpoint creator')
    .option('--id <id>', 'Breakpoint id (default: b-<unix seconds>)')
    .addOption(formatOption())
    .action(
      (
        location: FileLine,
        template: string,
        options: { logLevel: LogLevel; condition?: string; userEmail?: string; id?: string; format?: OutputFormat }
      ) => {
        runCommand(() => {
          const logpoint = buildLogpoint({
            id: options.id || `b-${Math.floor(Date.now() / 1000)}`,
            location,
            logFormatString: template,
            logLevel: options.logLevel,
            condition: options.condition,
            userEmail: options.userEmail || config.userEmail || 'unknown',
          });
          const format = resolveFormat(options.format);

          if (format !== 'default') {
            printJson(logpoint, format);
            return;
          }

          console.log(`Log Message Format: ${logpoint.logMessageFormat}`);
          console.log(`Expressions:        ${JSON.stringify(logpoint.expressions || [])}`);
        });
      }
    );

  program
    .command('decompile-logpoint')
    .description('Turn a positional log message format and its expressions back into a template')
    .argument('<format>', 'Log message format using $0, $1, ...')
    .argument('[expressions...]', 'Expressions referenced by the format', [])
    .action((format: string, expressions: string[]) => {
      console.log(mergeLogExpressions(format, expressions));
    });

  program
    .command('init')
    .description('Save default options for this project in snapdbg.config.json')
    .action(async () => {
      const configPath = getConfigPath();
      const readline = await import('readline');

      const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
      });

      const question = (prompt: string): Promise<string> => {
        return new Promise((resolve) => {
          rl.question(prompt, (answer) => {
            resolve(answer);
          });
        });
      };

      console.log('\nsnapdbg setup\n');
      console.log(`Project directory: ${process.cwd()}\n`);

      const defaultMaxLevel = config.maxLevel ?? DEFAULT_MAX_EXPANSION_LEVEL;
      const maxLevelInput = (await question(`Maximum variable expansion level [${defaultMaxLevel}]: `)).trim();
      const defaultFormat = config.format || 'default';
      const formatInput = (await question(`Output format (${OUTPUT_FORMATS.join(', ')}) [${defaultFormat}]: `)).trim();
      const defaultEmail = config.userEmail || '';
      const emailInput = (await question(`User email${defaultEmail ? ` [${defaultEmail}]` : ''}: `)).trim();

      rl.close();

      const next: SnapdbgConfig = {
        maxLevel: maxLevelInput ? parseNonNegativeInt(maxLevelInput) : defaultMaxLevel,
        format: OUTPUT_FORMATS.find((f) => f === formatInput) || defaultFormat,
      };
      if (emailInput || defaultEmail) {
        next.userEmail = emailInput || defaultEmail;
      }

      saveConfig(next, configPath);
      console.log(`\nConfiguration saved to ${path.basename(configPath)}`);
    });

  return program;
}

/**
 * Main CLI entry point.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error instanceof Error ? `Error: ${error.message}` : error);
    process.exit(1);
  });
}
