import { Settings } from '../config/settings';
import { ClaudeCliGateway } from './claudeCli';
import { OllamaGateway } from './ollama';
import { TranslationGateway } from './types';

export const DEFAULT_OLLAMA_MODEL = 'qwen2.5:1.5b';

/**
 * Build the backend named by the settings
 */
export function createGateway(settings: Settings): TranslationGateway {
  switch (settings.backend) {
    case 'ollama':
      return new OllamaGateway({
        model: settings.model ?? DEFAULT_OLLAMA_MODEL,
        baseUrl: settings.ollamaUrl,
        temperature: settings.temperature,
        timeoutMs: settings.timeoutMs,
      });
    case 'claude-cli':
      return new ClaudeCliGateway({
        model: settings.model,
        timeoutMs: settings.timeoutMs,
      });
  }
}
