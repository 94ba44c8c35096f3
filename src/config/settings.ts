/**
 * Configuration Settings
 *
 * Precedence: built-in defaults < OLLAMA_HOST < `.code-translator.json`
 * (found by searching up from the target path, or given with --config)
 * < command-line options.
 *
 * The file may be flat or grouped into `translation`, `processing` and
 * `filters` sections; grouped keys win over flat ones.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from '../core/errors';
import { DEFAULT_MAX_CHUNK_SIZE } from '../core/chunker';
import { DEFAULT_OLLAMA_URL } from '../gateway/ollama';
import { log } from '../util/log';

export const CONFIG_FILE_NAME = '.code-translator.json';

export const BACKENDS = ['ollama', 'claude-cli'] as const;
export type BackendName = (typeof BACKENDS)[number];

const SettingsSchema = z.object({
  backend: z.enum(BACKENDS),
  /** Backend default when unset (qwen2.5:1.5b for ollama, the CLI's own for claude) */
  model: z.string().min(1).optional(),
  sourceLang: z.string().min(1),
  targetLang: z.string().min(1),
  temperature: z.number().min(0).max(2),
  translateAll: z.boolean(),
  dryRun: z.boolean(),
  maxChunkSize: z.number().int().positive(),
  workers: z.number().int().min(1).max(64),
  chunkConcurrency: z.number().int().min(1).max(16),
  recursive: z.boolean(),
  skipDirs: z.array(z.string()),
  skipExtensions: z.array(z.string()),
  maxFileSize: z.number().int().positive(),
  textFilter: z.enum(['any', 'non-ascii', 'cjk']),
  timeoutMs: z.number().int().positive(),
  maxRetries: z.number().int().min(0).max(10),
  ollamaUrl: z.string().min(1),
});

export type Settings = z.infer<typeof SettingsSchema>;

const PartialSettingsSchema = SettingsSchema.partial();

const ConfigFileSchema = PartialSettingsSchema.extend({
  translation: PartialSettingsSchema.optional(),
  processing: PartialSettingsSchema.optional(),
  filters: PartialSettingsSchema.optional(),
});

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  backend: 'ollama',
  sourceLang: 'zh',
  targetLang: 'en',
  temperature: 0.3,
  translateAll: false,
  dryRun: false,
  maxChunkSize: DEFAULT_MAX_CHUNK_SIZE,
  workers: 4,
  chunkConcurrency: 2,
  recursive: true,
  skipDirs: ['.git', '.svn', '.hg', '__pycache__', 'node_modules', 'venv', '.venv', 'dist', 'build', 'target'],
  skipExtensions: [
    '.pyc', '.pyo', '.so', '.dll', '.exe', '.bin',
    '.jpg', '.jpeg', '.png', '.gif', '.svg',
    '.mp3', '.mp4', '.zip', '.tar', '.gz',
  ],
  maxFileSize: 1024 * 1024,
  textFilter: 'any',
  timeoutMs: 120_000,
  maxRetries: 3,
  ollamaUrl: DEFAULT_OLLAMA_URL,
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Copy the defined values of `patch` over `base`
 */
function mergeDefined<T extends object>(base: T, patch: Partial<T>): T {
  const defined = Object.fromEntries(Object.entries(patch).filter(([, value]) => value !== undefined));
  return { ...base, ...defined };
}

/**
 * Search for the config file starting at `startPath` (a file or directory)
 * and walking up to the filesystem root.
 */
export function findConfigFile(startPath: string): string | null {
  let current = path.resolve(startPath);

  try {
    if (!fs.statSync(current).isDirectory()) {
      current = path.dirname(current);
    }
  } catch {
    current = path.dirname(current);
  }

  for (;;) {
    const candidate = path.join(current, CONFIG_FILE_NAME);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/**
 * Load and validate a config file. Any problem with it is fatal.
 */
export function loadConfigFile(configPath: string): Partial<Settings> {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${configPath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`, { cause: error });
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${configPath}: ${formatIssues(parsed.error)}`);
  }

  const { translation, processing, filters, ...flat } = parsed.data;
  let merged: Partial<Settings> = flat;
  for (const section of [translation, processing, filters]) {
    if (section) {
      merged = mergeDefined(merged, section);
    }
  }
  return merged;
}

export interface ResolveOptions {
  /** File or directory being translated; the config search starts here */
  targetPath: string;
  /** Explicit config file; disables the upward search */
  configPath?: string;
  /** Values given on the command line */
  overrides?: Partial<Settings>;
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedSettings {
  settings: Settings;
  /** Config file that was applied, if any */
  configFile: string | null;
}

/**
 * Merge defaults, environment, config file and overrides, then validate
 * the result as a whole.
 */
export function resolveSettings(options: ResolveOptions): ResolvedSettings {
  const env = options.env ?? process.env;
  let merged: Settings = { ...DEFAULT_SETTINGS };

  if (env.OLLAMA_HOST) {
    merged.ollamaUrl = env.OLLAMA_HOST;
  }

  let configFile: string | null = null;
  if (options.configPath) {
    configFile = path.resolve(options.configPath);
    if (!fs.existsSync(configFile)) {
      throw new ConfigError(`Config file not found: ${configFile}`);
    }
  } else {
    configFile = findConfigFile(options.targetPath);
  }

  if (configFile) {
    log(`[Config] Using ${configFile}`);
    merged = mergeDefined(merged, loadConfigFile(configFile));
  }

  if (options.overrides) {
    merged = mergeDefined(merged, options.overrides);
  }

  const parsed = SettingsSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid settings: ${formatIssues(parsed.error)}`);
  }

  return { settings: parsed.data, configFile };
}
