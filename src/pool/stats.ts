/**
 * Run statistics
 *
 * Workers never touch shared counters: each finished job hands an
 * immutable FileOutcome to the one collector, which does all the counting.
 */

import { DiffReport } from '../core/rewriter';
import { ExtractionWarning, FileStatus } from '../core/types';

export interface FileOutcome {
  readonly path: string;
  /** Final status: rewritten (or reported, in dry-run), skipped or failed */
  readonly status: FileStatus;
  /** True when the file's content changed (or would have, in dry-run) */
  readonly changed: boolean;
  readonly supported: boolean;
  readonly spansFound: number;
  readonly spansTranslated: number;
  readonly chunks: number;
  readonly chunksFailed: number;
  readonly warnings: readonly ExtractionWarning[];
  readonly reason?: string;
  readonly error?: Error;
  readonly report?: DiffReport;
}

export interface RunStats {
  processed: number;
  translated: number;
  skipped: number;
  failed: number;
  supportedFiles: number;
  spansTranslated: number;
  chunksFailed: number;
  warnings: number;
}

export class StatsCollector {
  private readonly stats: RunStats = {
    processed: 0,
    translated: 0,
    skipped: 0,
    failed: 0,
    supportedFiles: 0,
    spansTranslated: 0,
    chunksFailed: 0,
    warnings: 0,
  };
  private readonly outcomes: FileOutcome[] = [];

  record(outcome: FileOutcome): void {
    this.outcomes.push(outcome);
    this.stats.processed++;

    if (outcome.supported) this.stats.supportedFiles++;
    if (outcome.changed) this.stats.translated++;
    if (outcome.status === 'skipped') this.stats.skipped++;
    if (outcome.status === 'failed') this.stats.failed++;

    this.stats.spansTranslated += outcome.spansTranslated;
    this.stats.chunksFailed += outcome.chunksFailed;
    this.stats.warnings += outcome.warnings.length;
  }

  snapshot(): RunStats {
    return { ...this.stats };
  }

  /** Outcomes sorted by path */
  results(): FileOutcome[] {
    return [...this.outcomes].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }
}

/**
 * Non-zero when any file failed or nothing could be processed at all
 */
export function exitCodeFor(stats: RunStats): number {
  return stats.failed > 0 || stats.supportedFiles === 0 ? 1 : 0;
}
