/**
 * Tests for the Claude CLI gateway
 *
 * These tests cover response parsing and failure classification, and drive
 * the gateway through an injected runner instead of spawning the CLI.
 */

import { GatewayError } from '../core/errors';
import { ClaudeCallOptions, ClaudeCliGateway, classifyCliFailure, parseClaudeResponse } from '../gateway/claudeCli';

jest.mock('../util/log', () => ({ log: jest.fn(), getLogFilePath: () => 'translator.log' }));

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('Claude CLI', () => {
  describe('parseClaudeResponse', () => {
    it('should return the result field', () => {
      const stdout = '{"type":"result","subtype":"success","is_error":false,"result":"hello"}\n';

      expect(parseClaudeResponse(stdout)).toBe('hello');
    });

    it('should reject empty output as a protocol error', () => {
      const error = caught(() => parseClaudeResponse('  \n'));

      expect(error).toBeInstanceOf(GatewayError);
      expect(error).toMatchObject({ code: 'GatewayProtocolError', message: 'Empty response from claude CLI' });
    });

    it('should reject output that is not JSON', () => {
      expect(caught(() => parseClaudeResponse('Error: something'))).toMatchObject({ code: 'GatewayProtocolError' });
    });

    it('should reject a response without a result', () => {
      expect(caught(() => parseClaudeResponse('{"type":"result","is_error":false}'))).toMatchObject({
        code: 'GatewayProtocolError',
        message: 'No result in claude CLI response',
      });
    });

    it('should classify an error response', () => {
      const error = caught(() => parseClaudeResponse('{"is_error":true,"result":"Overloaded"}'));

      expect(error).toMatchObject({
        code: 'GatewayUnavailable',
        retryable: true,
        message: 'Claude CLI error: Overloaded',
      });
    });
  });

  describe('classifyCliFailure', () => {
    it('should retry transient failures', () => {
      expect(classifyCliFailure('API rate limit reached').retryable).toBe(true);
      expect(classifyCliFailure('HTTP 503 from upstream').retryable).toBe(true);
    });

    it('should not retry other failures', () => {
      const error = classifyCliFailure('Claude CLI exited with code 1: unknown option');

      expect(error.code).toBe('GatewayUnavailable');
      expect(error.retryable).toBe(false);
    });

    it('should report timeouts as GatewayTimeout', () => {
      expect(classifyCliFailure('request timed out').code).toBe('GatewayTimeout');
    });
  });

  describe('ClaudeCliGateway', () => {
    it('should send the chunk prompt and split the reply', async () => {
      const runner = jest.fn<Promise<string>, [string, ClaudeCallOptions]>(async () => '```\nOne\n<<<#>>>\nTwo\n```');
      const gateway = new ClaudeCliGateway({ model: 'sonnet', timeoutMs: 5000, runner });

      const translated = await gateway.translate({ texts: ['一', '二'], sourceLang: 'zh', targetLang: 'en' });

      expect(translated).toEqual(['One', 'Two']);
      expect(runner).toHaveBeenCalledTimes(1);
      const [prompt, options] = runner.mock.calls[0];
      expect(prompt).toContain('一\n<<<#>>>\n二');
      expect(options).toEqual({ model: 'sonnet', timeoutMs: 5000, signal: undefined });
    });

    it('should prefer the model named in the request', async () => {
      const runner = jest.fn<Promise<string>, [string, ClaudeCallOptions]>(async () => 'One');
      const gateway = new ClaudeCliGateway({ model: 'sonnet', runner });

      await gateway.translate({ texts: ['一'], sourceLang: 'zh', targetLang: 'en', model: 'haiku' });

      expect(runner.mock.calls[0][1].model).toBe('haiku');
    });

    it('should fail with a protocol error when segments go missing', async () => {
      const gateway = new ClaudeCliGateway({ runner: async () => 'only one' });

      await expect(
        gateway.translate({ texts: ['一', '二'], sourceLang: 'zh', targetLang: 'en' })
      ).rejects.toMatchObject({ code: 'GatewayProtocolError' });
    });
  });
});
