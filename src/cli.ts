#!/usr/bin/env node
/**
 * session-md — export an agent session JSONL file as conversation-first Markdown.
 */
import * as fs from 'fs';
import { Command, Option } from 'commander';
import { STDOUT, exportSession } from './commands/export.js';
import { inspectSession } from './commands/inspect.js';
import { applyCliFlags, resolveBaseConfig } from './config/index.js';
import type { CliFormatFlags } from './config/index.js';
import { logger, setLogLevel } from './logger.js';

interface LoggingFlags {
  verbose?: boolean;
  quiet?: boolean;
}

interface ExportCommandOptions extends CliFormatFlags, LoggingFlags {
  output: string;
}

interface InspectCommandOptions extends LoggingFlags {
  leaf?: string;
  includeBash?: boolean;
}

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (err) {
    logger.debug('cli: cannot read package version', err);
  }
  return '0.0.0';
}

function configureLogging(flags: LoggingFlags): void {
  if (flags.verbose) setLogLevel('debug');
  else if (flags.quiet) setLogLevel('error');
}

/** Run a command body; any failure becomes a one-line diagnostic and exit code 1. */
function run(body: () => void): void {
  try {
    body();
  } catch (err) {
    logger.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('session-md')
  .description('Convert a session JSONL file to conversation-first Markdown')
  .version(readVersion());

program
  .command('export', { isDefault: true })
  .description('Export a session file as Markdown (default command)')
  .argument('<input>', 'Path to session .jsonl')
  .option('-o, --output <path>', `Output file path (default: stdout). Use '${STDOUT}' for stdout.`, STDOUT)
  .addOption(new Option('--mode <mode>', 'Export the full file or a single parentId chain').choices(['all', 'branch']))
  .option('--leaf <id>', 'Leaf id for branch mode (defaults to last message id)')
  .option('--thinking', 'Include assistant thinking blocks (default)')
  .option('--no-thinking', 'Do not include assistant thinking blocks')
  .option('--include-bash', 'Include bashExecution entries as SYSTEM blocks')
  .option('--no-include-bash', 'Leave bashExecution entries out (default)')
  .option('--timestamps', 'Include timestamps')
  .option('--no-timestamps', 'Leave timestamps out (default)')
  .option('--group-turns', 'Merge consecutive messages by role (default)')
  .option('--no-group-turns', 'Do not merge consecutive messages by role')
  .addOption(new Option('--preset <name>', 'Start from a built-in preset instead of the defaults').choices(['conversation', 'minimal', 'full']))
  .option('--config <path>', 'Start from a YAML config file instead of the defaults')
  .option('--verbose', 'Log debug diagnostics to stderr')
  .option('--quiet', 'Only log errors')
  .action((input: string, opts: ExportCommandOptions) => {
    configureLogging(opts);
    run(() => {
      const settings = applyCliFlags(resolveBaseConfig(opts), opts);
      exportSession({ ...settings, input, output: opts.output });
    });
  });

program
  .command('inspect')
  .description('Show what a session file contains and what an export would keep')
  .argument('<input>', 'Path to session .jsonl')
  .option('--leaf <id>', 'Leaf id to resolve (defaults to last message id)')
  .option('--include-bash', 'Count bashExecution entries as export blocks')
  .option('--verbose', 'Log debug diagnostics to stderr')
  .option('--quiet', 'Only log errors')
  .action((input: string, opts: InspectCommandOptions) => {
    configureLogging(opts);
    run(() => {
      inspectSession(input, { leafId: opts.leaf, includeBash: opts.includeBash });
    });
  });

program.parse();
