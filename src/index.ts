/**
 * code-translator
 *
 * Finds comments, docstrings and (optionally) string literals in source
 * files, translates them through a pluggable backend and writes them back
 * at their original offsets, leaving the code itself untouched.
 */

export * from './core/types';
export * from './core/errors';
export { PROFILES, profileFor, profileForPath, supportedExtensions } from './core/profiles';
export { SpanExtractor, extractSpans, ExtractOptions, DEFAULT_MAX_NESTING_DEPTH } from './core/spanExtractor';
export {
  Chunker,
  chunkSpans,
  joinPayloads,
  splitTranslation,
  ChunkOptions,
  DEFAULT_MAX_CHUNK_SIZE,
  SPAN_SEPARATOR,
} from './core/chunker';
export {
  rewrite,
  toReplacement,
  encodeForSpan,
  createDiffReport,
  applyDiffReport,
  Replacement,
  DiffReport,
} from './core/rewriter';
export * from './gateway';
export { Settings, BackendName, DEFAULT_SETTINGS, resolveSettings, findConfigFile, loadConfigFile } from './config/settings';
export { WorkerPool, WorkerPoolOptions, RunSummary, ProgressCallback } from './pool/workerPool';
export { FilePipeline, PipelineOptions, ReportSink } from './pool/pipeline';
export { FileOutcome, RunStats, StatsCollector, exitCodeFor } from './pool/stats';
export { discoverFiles } from './pool/discovery';
export { runBounded } from './pool/concurrency';
