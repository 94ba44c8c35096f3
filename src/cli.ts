#!/usr/bin/env node

/**
 * code-translator command line
 *
 * Translates comments and docstrings in a source tree in place. Use
 * --translate-all to include string literals, --dry-run to print a diff
 * instead of writing.
 */

import * as readline from 'readline';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { z } from 'zod';
import { BACKENDS, Settings, resolveSettings } from './config/settings';
import { ConfigError, toError } from './core/errors';
import { createGateway } from './gateway/factory';
import { describeFailure } from './pool/pipeline';
import { RunStats, exitCodeFor } from './pool/stats';
import { RunSummary, WorkerPool } from './pool/workerPool';
import { getLogFilePath, log } from './util/log';

export const VERSION = '0.1.0';

/** Exit status for bad options, a bad path or an invalid config file */
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_INTERRUPTED = 130;

const MAX_LISTED_FAILURES = 10;

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
  /** Whether a human can answer a confirmation prompt */
  interactive: boolean;
  confirm(question: string): Promise<boolean>;
  /** Supplied by callers that manage cancellation themselves */
  signal?: AbortSignal;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

const CliOptionsSchema = z.object({
  backend: z.enum(BACKENDS).optional(),
  model: z.string().optional(),
  sourceLang: z.string().optional(),
  targetLang: z.string().optional(),
  translateAll: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  workers: z.number().optional(),
  recursive: z.boolean().optional(),
  maxChunkSize: z.number().optional(),
  textFilter: z.enum(['any', 'non-ascii', 'cjk']).optional(),
  config: z.string().optional(),
  listModels: z.boolean().optional(),
  yes: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/** Options that map onto settings of the same name */
const SETTING_OPTIONS = [
  'backend',
  'model',
  'sourceLang',
  'targetLang',
  'translateAll',
  'dryRun',
  'workers',
  'recursive',
  'maxChunkSize',
  'textFilter',
] as const;

export function buildProgram(): Command {
  return new Command()
    .name('code-translator')
    .version(VERSION)
    .description('Translate comments and docstrings in source code with a local LLM')
    .argument('[path]', 'file or directory to translate', '.')
    .addOption(new Option('-b, --backend <name>', 'translation backend').choices(BACKENDS))
    .option('-m, --model <name>', 'model to use (default: qwen2.5:1.5b for ollama)')
    .option('-s, --source-lang <lang>', 'source language (default: zh)')
    .option('-t, --target-lang <lang>', 'target language (default: en)')
    .option('--translate-all', 'also translate string literals (may break code)')
    .option('-n, --dry-run', 'print a unified diff instead of modifying files')
    .option('-w, --workers <count>', 'number of files processed in parallel (default: 4)', parseInteger)
    .option('--no-recursive', 'only process the top-level directory')
    .option('--max-chunk-size <chars>', 'character budget per backend request (default: 5000)', parseInteger)
    .addOption(new Option('--text-filter <filter>', 'which comments to send').choices(['any', 'non-ascii', 'cjk']))
    .option('-c, --config <file>', 'config file (default: nearest .code-translator.json)')
    .option('--list-models', 'list the models the backend offers and exit')
    .option('-y, --yes', 'do not ask for confirmation');
}

/**
 * Typed view of the parsed options
 */
export function readCliOptions(program: Command): CliOptions {
  const parsed = CliOptionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    throw new ConfigError(`Invalid options: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
  }
  return parsed.data;
}

/**
 * Settings given explicitly on the command line. Defaults declared to
 * commander (such as `recursive` from --no-recursive) do not count, so a
 * config file can still set them.
 */
export function parseCliOptions(program: Command): Partial<Settings> {
  const options = readCliOptions(program);
  const overrides: Partial<Settings> = {};

  for (const key of SETTING_OPTIONS) {
    if (program.getOptionValueSource(key) !== 'cli') continue;
    switch (key) {
      case 'backend':
        overrides.backend = options.backend;
        break;
      case 'model':
        overrides.model = options.model;
        break;
      case 'sourceLang':
        overrides.sourceLang = options.sourceLang;
        break;
      case 'targetLang':
        overrides.targetLang = options.targetLang;
        break;
      case 'translateAll':
        overrides.translateAll = options.translateAll;
        break;
      case 'dryRun':
        overrides.dryRun = options.dryRun;
        break;
      case 'workers':
        overrides.workers = options.workers;
        break;
      case 'recursive':
        overrides.recursive = options.recursive;
        break;
      case 'maxChunkSize':
        overrides.maxChunkSize = options.maxChunkSize;
        break;
      case 'textFilter':
        overrides.textFilter = options.textFilter;
        break;
    }
  }

  return overrides;
}

function formatSize(bytes: number | undefined): string {
  return bytes === undefined ? '' : ` (${(bytes / 1024 ** 3).toFixed(1)} GB)`;
}

export function formatStats(stats: RunStats): string {
  const rows: Array<[string, number]> = [
    ['Files scanned', stats.processed],
    ['Supported files', stats.supportedFiles],
    ['Files translated', stats.translated],
    ['Spans translated', stats.spansTranslated],
    ['Files skipped', stats.skipped],
    ['Files failed', stats.failed],
    ['Chunks failed', stats.chunksFailed],
    ['Warnings', stats.warnings],
  ];
  const width = Math.max(...rows.map(([label]) => label.length));
  return ['Translation statistics', ...rows.map(([label, value]) => `  ${label.padEnd(width)}  ${value}`)].join('\n');
}

function printSummary(summary: RunSummary, settings: Settings, target: string, io: CliIO): void {
  io.out(formatStats(summary.stats));

  const failures = summary.outcomes.filter(outcome => outcome.status === 'failed');
  if (failures.length > 0) {
    io.out('\nFailures:');
    for (const outcome of failures.slice(0, MAX_LISTED_FAILURES)) {
      io.out(`  - ${outcome.path}: ${describeFailure(outcome)}`);
    }
    if (failures.length > MAX_LISTED_FAILURES) {
      io.out(`  ... and ${failures.length - MAX_LISTED_FAILURES} more (see ${getLogFilePath()})`);
    }
  }

  if (summary.stats.supportedFiles === 0) {
    io.out(`\nNo supported source files found under ${target}`);
  }
  if (summary.cancelled) {
    io.out('\nCancelled. Files already written are complete; the rest are untouched.');
  } else if (settings.dryRun) {
    io.out('\nDry run complete. No files were modified.');
  }
}

async function listModels(settings: Settings, io: CliIO): Promise<number> {
  const gateway = createGateway(settings);
  if (!gateway.listModels) {
    io.err(`The ${gateway.name} backend cannot list models`);
    return 1;
  }
  try {
    const models = await gateway.listModels();
    io.out(`Available ${gateway.name} models:`);
    for (const model of models) {
      io.out(`  - ${model.name}${formatSize(model.size)}`);
    }
    return 0;
  } catch (error) {
    io.err(`Error listing models: ${toError(error).message}`);
    return 1;
  }
}

/**
 * Cancel on the first Ctrl-C; exit at once on the second
 */
function installInterruptHandler(controller: AbortController, io: CliIO): () => void {
  const onInterrupt = () => {
    if (controller.signal.aborted) {
      process.exit(EXIT_INTERRUPTED);
    }
    io.err('\nCancelling... press Ctrl-C again to exit immediately');
    controller.abort();
  };
  process.on('SIGINT', onInterrupt);
  return () => {
    process.off('SIGINT', onInterrupt);
  };
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function main(argv: string[] = process.argv, io: CliIO = defaultIO()): Promise<number> {
  const program = buildProgram()
    .exitOverride()
    .configureOutput({
      writeOut: text => io.out(text),
      writeErr: text => io.err(text.trimEnd()),
    });

  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version end with exit code 0
      return error.exitCode === 0 ? 0 : EXIT_CONFIG_ERROR;
    }
    throw error;
  }

  const target = program.args[0] ?? '.';
  let settings: Settings;
  let options: CliOptions;

  try {
    options = readCliOptions(program);
    const resolved = resolveSettings({
      targetPath: target,
      configPath: options.config,
      overrides: parseCliOptions(program),
    });
    settings = resolved.settings;
  } catch (error) {
    io.err(`Error: ${toError(error).message}`);
    return EXIT_CONFIG_ERROR;
  }

  if (options.listModels) {
    return listModels(settings, io);
  }

  if (settings.translateAll && !settings.dryRun && !options.yes) {
    const warning = 'WARNING: --translate-all rewrites string literals and may break your code.';
    if (!io.interactive) {
      io.err(`${warning}\nRefusing to continue without confirmation; pass --yes to proceed.`);
      return 1;
    }
    io.err(warning);
    if (!(await io.confirm('Continue? [y/N] '))) {
      io.err('Aborted.');
      return 0;
    }
  }

  io.err(
    `Translating ${settings.sourceLang} -> ${settings.targetLang} with ${settings.backend}` +
    `${settings.model ? ` (${settings.model})` : ''}: ` +
    `${settings.translateAll ? 'comments, docstrings and strings' : 'comments and docstrings'}` +
    `${settings.dryRun ? ', dry run' : ''}`
  );

  const controller = new AbortController();
  const removeHandler = io.signal ? () => undefined : installInterruptHandler(controller, io);
  const signal = io.signal ?? controller.signal;

  const pool = new WorkerPool({
    settings,
    gateway: createGateway(settings),
    reportSink: report => io.out(report.patch),
  });

  try {
    const summary = await pool.run(target, signal);
    printSummary(summary, settings, target, io);
    return summary.cancelled ? EXIT_INTERRUPTED : exitCodeFor(summary.stats);
  } catch (error) {
    if (error instanceof ConfigError) {
      io.err(`Error: ${error.message}`);
      return EXIT_CONFIG_ERROR;
    }
    throw error;
  } finally {
    removeHandler();
  }
}

function confirmOnTerminal(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
  return new Promise(resolve => {
    rl.question(question, answer => {
      rl.close();
      resolve(/^y(es)?$/i.test(answer.trim()));
    });
  });
}

export function defaultIO(): CliIO {
  return {
    out: text => process.stdout.write(text.endsWith('\n') ? text : `${text}\n`),
    err: text => process.stderr.write(`${text}\n`),
    interactive: Boolean(process.stdin.isTTY && process.stderr.isTTY),
    confirm: confirmOnTerminal,
  };
}

if (require.main === module) {
  main().then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      log(`[CLI] Unexpected error: ${toError(error).stack ?? String(error)}`);
      process.exitCode = 1;
    }
  );
}
