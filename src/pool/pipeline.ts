/**
 * Per-file pipeline
 *
 * profile lookup -> read -> decode -> extract -> chunk -> translate -> rewrite
 * -> write (or diff report). Every failure is confined to the file: the job
 * ends skipped or failed and the file on disk is untouched.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Chunker } from '../core/chunker';
import { DecodeError, DiffError, GatewayError, TranslatorError, UnsupportedLanguageError, toError } from '../core/errors';
import { profileForPath } from '../core/profiles';
import { DiffReport, Replacement, applyDiffReport, createDiffReport, rewrite, toReplacement } from '../core/rewriter';
import { SpanExtractor } from '../core/spanExtractor';
import { Chunk, FileJob, TextFilter } from '../core/types';
import { RetryOptions, requestTranslation } from '../gateway/retry';
import { TranslationGateway, TranslationResponse } from '../gateway/types';
import { log } from '../util/log';
import { runBounded } from './concurrency';
import { writeFileAtomic } from './fileWriter';
import { FileOutcome } from './stats';

export const CANCELLED_REASON = 'cancelled';

export type ReportSink = (report: DiffReport) => void;

export interface PipelineOptions {
  gateway: TranslationGateway;
  sourceLang: string;
  targetLang: string;
  model?: string;
  translateAll: boolean;
  dryRun: boolean;
  maxChunkSize: number;
  chunkConcurrency: number;
  skipExtensions: readonly string[];
  maxFileSize: number;
  textFilter: TextFilter;
  timeoutMs: number;
  maxRetries: number;
  /** Backoff tuning, mostly for tests */
  retry?: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'onRetry'>;
  /** Receives dry-run reports */
  reportSink?: ReportSink;
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Decode bytes as strict UTF-8, keeping a byte-order mark as text so that
 * re-encoding reproduces the file exactly
 */
export function decodeUtf8(bytes: Uint8Array, filePath: string): string {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new DecodeError(`${filePath} is not valid UTF-8`, { cause: error });
  }
}

interface JobCounters {
  supported: boolean;
  chunks: number;
  chunksFailed: number;
  spansTranslated: number;
}

export class FilePipeline {
  private readonly extractor: SpanExtractor;
  private readonly chunker: Chunker;

  constructor(private readonly options: PipelineOptions) {
    this.extractor = new SpanExtractor({ translateAll: options.translateAll });
    this.chunker = new Chunker({ maxChunkSize: options.maxChunkSize, textFilter: options.textFilter });
  }

  /**
   * Run one file to completion. Never throws.
   */
  async process(filePath: string, signal?: AbortSignal, displayPath: string = filePath): Promise<FileOutcome> {
    const job: FileJob = { path: filePath, status: 'pending', spans: [], warnings: [] };
    const counters: JobCounters = { supported: false, chunks: 0, chunksFailed: 0, spansTranslated: 0 };

    try {
      return await this.run(job, counters, displayPath, signal);
    } catch (error) {
      job.status = 'failed';
      job.error = toError(error);
      log(`[Pipeline] ${filePath} failed: ${job.error.message}`);
      return this.outcome(job, counters);
    }
  }

  private async run(job: FileJob, counters: JobCounters, displayPath: string, signal?: AbortSignal): Promise<FileOutcome> {
    const filePath = job.path;
    const ext = path.extname(filePath).toLowerCase();

    if (signal?.aborted) {
      return this.skip(job, counters, CANCELLED_REASON);
    }

    if (this.options.skipExtensions.includes(ext)) {
      return this.skip(job, counters, 'binary/media file');
    }

    const profile = profileForPath(filePath);
    if (!profile) {
      const error = new UnsupportedLanguageError(ext);
      job.error = error;
      return this.skip(job, counters, error.message);
    }
    job.profile = profile;
    counters.supported = true;

    const { size } = await fs.promises.stat(filePath);
    if (size > this.options.maxFileSize) {
      return this.skip(job, counters, `file too large (${size} bytes, limit ${this.options.maxFileSize})`);
    }

    const bytes = await fs.promises.readFile(filePath);
    let source: string;
    try {
      source = decodeUtf8(bytes, filePath);
    } catch (error) {
      if (error instanceof DecodeError) {
        job.error = error;
        return this.skip(job, counters, error.message);
      }
      throw error;
    }

    // ExtractionError propagates and fails the file
    const extraction = this.extractor.extract(source, profile);
    job.spans = extraction.spans;
    job.warnings = extraction.warnings;
    job.status = 'extracted';
    for (const warning of extraction.warnings) {
      log(`[Pipeline] ${displayPath}: ${warning.message}`);
    }

    const chunks = this.chunker.chunk(job.spans);
    counters.chunks = chunks.length;
    if (chunks.length === 0) {
      return this.skip(job, counters, 'no translatable text');
    }

    const responses = await runBounded(
      chunks,
      this.options.chunkConcurrency,
      chunk => this.translateChunk(chunk, signal),
      signal
    );

    if (signal?.aborted) {
      return this.skip(job, counters, CANCELLED_REASON);
    }

    const replacements: Replacement[] = [];
    let firstFailure: GatewayError | undefined;

    for (const chunk of chunks) {
      const response = responses[chunk.index];
      if (!response) {
        counters.chunksFailed++;
        continue;
      }
      if (!response.ok) {
        counters.chunksFailed++;
        log(`[Pipeline] ${displayPath}: chunk ${chunk.index + 1}/${chunks.length} failed after ${response.attempts} attempt(s): ${response.failure.message}`);
        firstFailure = firstFailure ?? new GatewayError(response.failure.kind, response.failure.message);
        continue;
      }
      for (let i = 0; i < chunk.spans.length; i++) {
        const replacement = toReplacement(chunk.spans[i], response.translated[i], profile);
        if (replacement) {
          replacements.push(replacement);
        }
      }
    }

    if (counters.chunksFailed === chunks.length) {
      job.status = 'failed';
      job.error = firstFailure ?? new GatewayError('GatewayUnavailable', 'No chunk was translated');
      log(`[Pipeline] ${displayPath}: every chunk failed, file left unchanged`);
      return this.outcome(job, counters);
    }

    job.status = 'translated';
    counters.spansTranslated = replacements.length;

    if (replacements.length === 0) {
      return this.skip(job, counters, 'no changes');
    }

    const output = rewrite(source, replacements);

    if (this.options.dryRun) {
      const report = createDiffReport(displayPath, source, output);
      if (applyDiffReport(source, report) !== output) {
        job.status = 'failed';
        job.error = new DiffError(displayPath);
        log(`[Pipeline] ${job.error.message}`);
        return this.outcome(job, counters);
      }
      this.options.reportSink?.(report);
      job.status = 'rewritten';
      return this.outcome(job, counters, { changed: true, report });
    }

    if (signal?.aborted) {
      return this.skip(job, counters, CANCELLED_REASON);
    }

    writeFileAtomic(filePath, Buffer.from(output, 'utf-8'));
    job.status = 'rewritten';
    log(`[Pipeline] ${displayPath}: ${replacements.length} span(s) translated`);
    return this.outcome(job, counters, { changed: true });
  }

  private translateChunk(chunk: Chunk, signal?: AbortSignal): Promise<TranslationResponse> {
    return requestTranslation(
      this.options.gateway,
      {
        texts: chunk.payloads,
        kinds: chunk.spans.map(span => span.kind),
        sourceLang: this.options.sourceLang,
        targetLang: this.options.targetLang,
        model: this.options.model,
      },
      {
        ...this.options.retry,
        maxRetries: this.options.maxRetries,
        timeoutMs: this.options.timeoutMs,
        signal,
      }
    );
  }

  private skip(job: FileJob, counters: JobCounters, reason: string): FileOutcome {
    job.status = 'skipped';
    job.reason = reason;
    return this.outcome(job, counters);
  }

  private outcome(job: FileJob, counters: JobCounters, extra: { changed?: boolean; report?: DiffReport } = {}): FileOutcome {
    return {
      path: job.path,
      status: job.status,
      changed: extra.changed ?? false,
      supported: counters.supported,
      spansFound: job.spans.length,
      spansTranslated: counters.spansTranslated,
      chunks: counters.chunks,
      chunksFailed: counters.chunksFailed,
      warnings: job.warnings,
      reason: job.reason,
      error: job.error,
      report: extra.report,
    };
  }
}

/**
 * Short description of why a job failed, for summaries
 */
export function describeFailure(outcome: FileOutcome): string {
  if (outcome.error instanceof TranslatorError) {
    return `${outcome.error.code}: ${outcome.error.message}`;
  }
  if (outcome.error) {
    return outcome.error.message;
  }
  return outcome.reason ?? outcome.status;
}
