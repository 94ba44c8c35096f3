/**
 * Translation backends
 *
 * Everything outside this directory sees a backend only through the
 * TranslationGateway interface and requestTranslation().
 */

export * from './types';
export { requestTranslation, RetryOptions } from './retry';
export { createGateway, DEFAULT_OLLAMA_MODEL } from './factory';
export { OllamaGateway, OllamaGatewayOptions, HttpClient, DEFAULT_OLLAMA_URL } from './ollama';
export { ClaudeCliGateway, ClaudeCliGatewayOptions, ClaudeRunner, isClaudeCliAvailable } from './claudeCli';
export { buildChunkPrompt, getLanguageName } from './prompts';
