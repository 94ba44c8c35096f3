/**
 * Worker pool
 *
 * Discovers candidate files, then runs `workers` async workers over one
 * shared queue. Each finished job reports its outcome to a single
 * StatsCollector. Aborting the signal stops dispatch; files that never
 * started are recorded as skipped (cancelled).
 */

import * as fs from 'fs';
import * as path from 'path';
import { Settings } from '../config/settings';
import { RetryOptions } from '../gateway/retry';
import { TranslationGateway } from '../gateway/types';
import { log } from '../util/log';
import { runBounded } from './concurrency';
import { discoverFiles } from './discovery';
import { CANCELLED_REASON, FilePipeline, ReportSink } from './pipeline';
import { FileOutcome, RunStats, StatsCollector } from './stats';

export type ProgressCallback = (info: { outcome: FileOutcome; done: number; total: number }) => void;

export interface WorkerPoolOptions {
  settings: Settings;
  gateway: TranslationGateway;
  reportSink?: ReportSink;
  onProgress?: ProgressCallback;
  retry?: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'onRetry'>;
}

export interface RunSummary {
  stats: RunStats;
  outcomes: FileOutcome[];
  cancelled: boolean;
}

function cancelledOutcome(filePath: string): FileOutcome {
  return {
    path: filePath,
    status: 'skipped',
    changed: false,
    supported: false,
    spansFound: 0,
    spansTranslated: 0,
    chunks: 0,
    chunksFailed: 0,
    warnings: [],
    reason: CANCELLED_REASON,
  };
}

export class WorkerPool {
  private readonly pipeline: FilePipeline;

  constructor(private readonly options: WorkerPoolOptions) {
    const { settings } = options;
    this.pipeline = new FilePipeline({
      gateway: options.gateway,
      sourceLang: settings.sourceLang,
      targetLang: settings.targetLang,
      model: settings.model,
      translateAll: settings.translateAll,
      dryRun: settings.dryRun,
      maxChunkSize: settings.maxChunkSize,
      chunkConcurrency: settings.chunkConcurrency,
      skipExtensions: settings.skipExtensions,
      maxFileSize: settings.maxFileSize,
      textFilter: settings.textFilter,
      timeoutMs: settings.timeoutMs,
      maxRetries: settings.maxRetries,
      retry: options.retry,
      reportSink: options.reportSink,
    });
  }

  /**
   * Translate every candidate file under `target`.
   * Throws ConfigError when the target does not exist.
   */
  async run(target: string, signal?: AbortSignal): Promise<RunSummary> {
    const { settings } = this.options;
    const files = discoverFiles(target, {
      recursive: settings.recursive,
      skipDirs: settings.skipDirs,
      skipExtensions: settings.skipExtensions,
    });

    const resolved = path.resolve(target);
    const base = fs.statSync(resolved).isDirectory() ? resolved : path.dirname(resolved);
    const collector = new StatsCollector();
    let done = 0;

    log(`[Pool] ${files.length} candidate file(s) under ${resolved}, ${settings.workers} worker(s)`);

    const outcomes = await runBounded(
      files,
      settings.workers,
      async filePath => {
        const outcome = await this.pipeline.process(filePath, signal, path.relative(base, filePath));
        collector.record(outcome);
        done++;
        this.options.onProgress?.({ outcome, done, total: files.length });
        return outcome;
      },
      signal
    );

    outcomes.forEach((outcome, index) => {
      if (!outcome) {
        collector.record(cancelledOutcome(files[index]));
      }
    });

    const stats = collector.snapshot();
    log(`[Pool] Done: ${stats.translated} translated, ${stats.skipped} skipped, ${stats.failed} failed`);

    return {
      stats,
      outcomes: collector.results(),
      cancelled: signal?.aborted ?? false,
    };
  }
}
