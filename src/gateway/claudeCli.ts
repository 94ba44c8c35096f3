/**
 * Claude CLI gateway
 *
 * Spawns the `claude` CLI as a subprocess and feeds it the chunk prompt on
 * stdin. Nothing leaves the machine except through the CLI itself.
 */

import { spawn, ChildProcess } from 'child_process';
import { GatewayError } from '../core/errors';
import { splitTranslation } from '../core/chunker';
import { log } from '../util/log';
import { buildChunkPrompt, stripCodeFence } from './prompts';
import { ModelInfo, TranslationGateway, TranslationRequest } from './types';

/** Response structure from claude CLI with --output-format json */
interface ClaudeJsonResponse {
  type?: string;
  subtype?: string;
  is_error?: boolean;
  result?: string;
}

/** Default timeout for one claude CLI process (5 minutes) */
const DEFAULT_PROCESS_TIMEOUT_MS = 300_000;

/** Maximum prompt size (1MB) */
const MAX_PROMPT_SIZE = 1_000_000;

/** Aliases accepted by `claude --model` */
const CLAUDE_MODELS: ModelInfo[] = [{ name: 'sonnet' }, { name: 'opus' }, { name: 'haiku' }];

/** Stderr/result fragments that mean "try again later" */
const TRANSIENT_PATTERNS = ['overwhelmed', 'overloaded', 'rate limit', '429', '503', 'timed out', 'econnreset', 'etimedout'];

export interface ClaudeCallOptions {
  model?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** Runs one prompt and returns the model's text */
export type ClaudeRunner = (prompt: string, options: ClaudeCallOptions) => Promise<string>;

/**
 * Classify a CLI failure message: transient ones become GatewayUnavailable
 * (retried), anything else is reported without retry.
 */
export function classifyCliFailure(message: string): GatewayError {
  const lower = message.toLowerCase();
  if (lower.includes('timed out')) {
    return new GatewayError('GatewayTimeout', message);
  }
  const transient = TRANSIENT_PATTERNS.some(pattern => lower.includes(pattern));
  return new GatewayError('GatewayUnavailable', message, { retryable: transient });
}

/**
 * Parse the JSON envelope printed by `claude --print --output-format json`.
 * The translated text is in the `result` field.
 */
export function parseClaudeResponse(stdout: string): string {
  const trimmed = stdout.trim();

  if (!trimmed) {
    throw new GatewayError('GatewayProtocolError', 'Empty response from claude CLI');
  }

  let response: ClaudeJsonResponse;
  try {
    response = JSON.parse(trimmed) as ClaudeJsonResponse;
  } catch (error) {
    throw new GatewayError('GatewayProtocolError', 'claude CLI did not print a JSON response', { cause: error });
  }

  if (response.is_error) {
    throw classifyCliFailure(`Claude CLI error: ${response.result || 'Unknown error'}`);
  }

  if (typeof response.result !== 'string' || response.result.length === 0) {
    throw new GatewayError('GatewayProtocolError', 'No result in claude CLI response');
  }

  return response.result;
}

/**
 * Call the claude CLI with a prompt and return the response text.
 *
 * Uses --print --output-format json for structured output and kills the
 * process when the timeout elapses or the signal aborts.
 */
export async function callClaude(prompt: string, options: ClaudeCallOptions = {}): Promise<string> {
  if (prompt.length > MAX_PROMPT_SIZE) {
    throw new GatewayError('GatewayProtocolError', `Prompt too large: ${prompt.length} bytes (max ${MAX_PROMPT_SIZE})`);
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_PROCESS_TIMEOUT_MS;

  return new Promise((resolve, reject) => {
    let child: ChildProcess;
    let stdout = '';
    let stderr = '';
    let settled = false;

    const finish = (error: GatewayError | null, value?: string) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onAbort);
      if (error) {
        reject(error);
      } else {
        resolve(value ?? '');
      }
    };

    const terminate = () => {
      child.kill('SIGTERM');
      // SIGKILL if it is still running after SIGTERM
      setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill('SIGKILL');
        }
      }, 1000).unref();
    };

    const onAbort = () => {
      terminate();
      finish(new GatewayError('GatewayUnavailable', 'claude CLI call cancelled', { retryable: false }));
    };

    const args = ['--print', '--output-format', 'json'];
    if (options.model) {
      args.push('--model', options.model);
    }

    try {
      child = spawn('claude', args, {
        stdio: ['pipe', 'pipe', 'pipe'],
        env: {
          ...process.env,
          // Ensure consistent behavior
          TERM: 'dumb',
        },
      });
    } catch (error) {
      reject(new GatewayError('GatewayUnavailable', `Failed to spawn claude CLI: ${String(error)}`, { cause: error, retryable: false }));
      return;
    }

    const timeoutId = setTimeout(() => {
      log(`[Claude CLI] Timeout after ${timeoutMs}ms, killing process`);
      terminate();
      finish(new GatewayError('GatewayTimeout', `Claude CLI timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    options.signal?.addEventListener('abort', onAbort, { once: true });

    // Handle spawn error (e.g., claude not installed)
    child.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        finish(new GatewayError(
          'GatewayUnavailable',
          'Claude CLI not found. Install it and make sure `claude` is on your PATH.',
          { cause: error, retryable: false }
        ));
      } else {
        finish(new GatewayError('GatewayUnavailable', `Failed to spawn claude CLI: ${error.message}`, { cause: error }));
      }
    });

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code: number | null) => {
      if (settled) return;

      if (code !== 0) {
        log(`[Claude CLI] Process exited with code ${code}`);
        if (stderr) {
          log(`[Claude CLI] stderr: ${stderr}`);
        }
        finish(classifyCliFailure(`Claude CLI exited with code ${code}: ${stderr || 'Unknown error'}`));
        return;
      }

      try {
        finish(null, parseClaudeResponse(stdout));
      } catch (error) {
        log(`[Claude CLI] Failed to parse response: ${String(error)}`);
        log(`[Claude CLI] Raw stdout: ${stdout.substring(0, 500)}...`);
        finish(error instanceof GatewayError ? error : new GatewayError('GatewayProtocolError', String(error)));
      }
    });

    // Write prompt to stdin and close it (signals EOF)
    if (child.stdin) {
      child.stdin.on('error', (error: Error) => {
        log(`[Claude CLI] stdin error: ${error.message}`);
      });
      child.stdin.write(prompt);
      child.stdin.end();
    } else {
      terminate();
      finish(new GatewayError('GatewayUnavailable', 'Failed to write to claude CLI stdin'));
    }
  });
}

/**
 * Check if claude CLI is available on the system
 */
export async function isClaudeCliAvailable(): Promise<boolean> {
  return new Promise((resolve) => {
    const child = spawn('claude', ['--version'], {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    child.on('error', () => {
      resolve(false);
    });

    child.on('close', (code) => {
      resolve(code === 0);
    });
  });
}

export interface ClaudeCliGatewayOptions {
  model?: string;
  timeoutMs?: number;
  /** Replaces the subprocess call, e.g. in tests */
  runner?: ClaudeRunner;
}

export class ClaudeCliGateway implements TranslationGateway {
  readonly name = 'claude-cli';
  private readonly model?: string;
  private readonly timeoutMs?: number;
  private readonly runner: ClaudeRunner;

  constructor(options: ClaudeCliGatewayOptions = {}) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.runner = options.runner ?? callClaude;
  }

  async translate(request: TranslationRequest, signal?: AbortSignal): Promise<string[]> {
    const prompt = buildChunkPrompt(request);
    const response = await this.runner(prompt, {
      model: request.model ?? this.model,
      timeoutMs: this.timeoutMs,
      signal,
    });
    return splitTranslation(stripCodeFence(response), request.texts.length);
  }

  async listModels(): Promise<ModelInfo[]> {
    if (!(await isClaudeCliAvailable())) {
      throw new GatewayError('GatewayUnavailable', 'Claude CLI not found', { retryable: false });
    }
    return CLAUDE_MODELS;
  }
}
