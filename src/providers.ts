/**
 * Chat-completion clients for the supported providers
 *
 * - GitHub Models (OpenAI-compatible endpoint, free with a GitHub token)
 * - OpenAI
 * - Anthropic
 */

import { getActiveProvider, getDefaultModel, getGenerationSettings, getProviderApiKey, type LLMProvider } from './config.js';
import { ConfigError, ProviderError } from './errors.js';
import { logger } from './logger.js';

export interface ChatOptions {
  systemPrompt?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeout?: number;       // Request timeout in ms
  provider?: LLMProvider;
  apiKey?: string;
  maxRetries?: number;
  retryBaseMs?: number;   // Backoff unit: waits 2x, 4x, 8x this
}

export interface ChatResponse {
  content: string;
  provider: LLMProvider;
  model: string;
  inputTokens?: number;
  outputTokens?: number;
}

const PROVIDER_CONFIGS = {
  github: {
    url: 'https://models.inference.ai.azure.com/chat/completions',
    authHeader: 'Authorization',
    authPrefix: 'Bearer ',
  },
  openai: {
    url: 'https://api.openai.com/v1/chat/completions',
    authHeader: 'Authorization',
    authPrefix: 'Bearer ',
  },
  anthropic: {
    url: 'https://api.anthropic.com/v1/messages',
    authHeader: 'x-api-key',
    defaultModel: 'claude-sonnet-4-20250514',
  },
} as const;

/**
 * Friendly model names → GitHub Models inference ids. The inference API
 * takes ids without a publisher prefix.
 */
export const GITHUB_MODELS: Record<string, string> = {
  'gpt-5': 'gpt-5',
  'gpt-5-chat': 'gpt-5-chat',
  'gpt-5-mini': 'gpt-5-mini',
  'gpt-5-nano': 'gpt-5-nano',
  'gpt-4.1': 'gpt-4.1',
  'gpt-4.1-mini': 'gpt-4.1-mini',
  'gpt-4.1-nano': 'gpt-4.1-nano',
  'gpt-4o': 'gpt-4o',
  'gpt-4o-mini': 'gpt-4o-mini',
  'o1': 'o1',
  'o1-mini': 'o1-mini',
  'o1-preview': 'o1-preview',
  'o3': 'o3',
  'o3-mini': 'o3-mini',
  'o4-mini': 'o4-mini',
  'phi-4': 'Phi-4',
  'phi-4-reasoning': 'Phi-4-reasoning',
  'phi-4-mini-instruct': 'Phi-4-mini-instruct',
  'deepseek-r1': 'DeepSeek-R1',
  'deepseek-v3': 'DeepSeek-V3-0324',
  'llama-3.3-70b': 'Llama-3.3-70B-Instruct',
  'mistral-small': 'Mistral-small-2503',
  'codestral': 'Codestral-2501',
  'grok-3': 'grok-3',
  'grok-3-mini': 'grok-3-mini',
};

// Reasoning models only accept the default temperature
const O_SERIES_MODELS = new Set(['o1', 'o1-mini', 'o1-preview', 'o3', 'o3-mini', 'o4-mini']);

export function isOSeriesModel(model: string): boolean {
  return O_SERIES_MODELS.has(model);
}

export function resolveProviderModelId(provider: LLMProvider, model: string): string {
  switch (provider) {
    case 'github':
      return GITHUB_MODELS[model] ?? model;
    case 'openai':
      return model;
    case 'anthropic':
      if (model.startsWith('claude')) return model;
      logger.debug(`Model ${model} is not an Anthropic model, using default`, {
        model: PROVIDER_CONFIGS.anthropic.defaultModel,
      });
      return PROVIDER_CONFIGS.anthropic.defaultModel;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

interface ResolvedRequest {
  provider: LLMProvider;
  apiKey: string;
  model: string;
  prompt: string;
  systemPrompt?: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Send one prompt to the configured provider.
 * Retries rate limits (429) and overload (529/503) with exponential backoff.
 */
export async function chat(prompt: string, options: ChatOptions = {}): Promise<ChatResponse> {
  const provider = options.provider ?? getActiveProvider();
  const apiKey = options.apiKey ?? getProviderApiKey(provider);

  if (!apiKey) {
    throw new ConfigError(`No API key configured for ${provider}. Run 'crewsmith check-config' for setup help.`);
  }

  const settings = getGenerationSettings();
  const request: ResolvedRequest = {
    provider,
    apiKey,
    model: resolveProviderModelId(provider, options.model ?? getDefaultModel()),
    prompt,
    systemPrompt: options.systemPrompt,
    maxTokens: options.maxTokens ?? settings.maxTokens,
    temperature: options.temperature ?? settings.temperature,
  };

  const timeout = options.timeout ?? 120_000;
  const maxRetries = options.maxRetries ?? 3;
  const retryBaseMs = options.retryBaseMs ?? 1000;
  let lastError: Error | null = null;

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const result = provider === 'anthropic'
        ? await chatAnthropic(request, controller.signal)
        : await chatOpenAICompatible(request, controller.signal);
      return result;
    } catch (error) {
      lastError = toProviderError(error, provider, timeout);

      const retryable = lastError instanceof ProviderError && lastError.retryable;
      if (retryable && attempt < maxRetries - 1) {
        const backoffMs = Math.pow(2, attempt + 1) * retryBaseMs;
        logger.info(`Rate limited, retrying in ${backoffMs / 1000}s (attempt ${attempt + 1}/${maxRetries})`);
        await sleep(backoffMs);
        continue;
      }

      throw lastError;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  throw lastError ?? new ProviderError('Chat failed after retries', provider);
}

function toProviderError(error: unknown, provider: LLMProvider, timeout: number): Error {
  if (error instanceof ProviderError) return error;
  if (error instanceof Error && error.name === 'AbortError') {
    return new ProviderError(`Request to ${provider} timed out after ${timeout}ms`, provider);
  }
  return error instanceof Error ? error : new Error(String(error));
}

async function failedResponse(provider: LLMProvider, response: Response): Promise<ProviderError> {
  const detail = (await response.text()).slice(0, 200);
  switch (response.status) {
    case 401:
    case 403:
      return new ProviderError(`Invalid or unauthorised API key for ${provider}`, provider, response.status);
    case 413:
      return new ProviderError(`Request too large for ${provider}: ${detail}`, provider, 413);
    case 429:
      return new ProviderError(`Rate limited by ${provider}: ${detail}`, provider, 429, true);
    case 503:
    case 529:
      return new ProviderError(`${provider} is overloaded`, provider, response.status, true);
    default:
      return new ProviderError(`${provider} API error (${response.status}): ${detail}`, provider, response.status);
  }
}

/**
 * OpenAI chat completions format, used by GitHub Models and OpenAI
 */
async function chatOpenAICompatible(request: ResolvedRequest, signal: AbortSignal): Promise<ChatResponse> {
  const config = PROVIDER_CONFIGS[request.provider === 'openai' ? 'openai' : 'github'];
  const reasoning = isOSeriesModel(request.model);

  const messages: Array<{ role: string; content: string }> = [];
  if (request.systemPrompt) {
    messages.push({ role: 'system', content: request.systemPrompt });
  }
  messages.push({ role: 'user', content: request.prompt });

  const body: Record<string, unknown> = { model: request.model, messages };
  if (reasoning) {
    body.max_completion_tokens = request.maxTokens;
  } else {
    body.max_tokens = request.maxTokens;
    body.temperature = request.temperature;
  }

  const response = await fetch(config.url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      [config.authHeader]: `${config.authPrefix}${request.apiKey}`,
    },
    body: JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    throw await failedResponse(request.provider, response);
  }

  const data = await response.json() as {
    choices?: Array<{ message?: { content?: string | null } }>;
    usage?: { prompt_tokens?: number; completion_tokens?: number };
  };

  return {
    content: data.choices?.[0]?.message?.content ?? '',
    provider: request.provider,
    model: request.model,
    inputTokens: data.usage?.prompt_tokens,
    outputTokens: data.usage?.completion_tokens,
  };
}

/**
 * Anthropic messages API
 */
async function chatAnthropic(request: ResolvedRequest, signal: AbortSignal): Promise<ChatResponse> {
  const config = PROVIDER_CONFIGS.anthropic;

  const body: Record<string, unknown> = {
    model: request.model,
    max_tokens: request.maxTokens,
    temperature: request.temperature,
    messages: [{ role: 'user', content: request.prompt }],
  };
  if (request.systemPrompt) {
    body.system = request.systemPrompt;
  }

  const response = await fetch(config.url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      [config.authHeader]: request.apiKey,
      'anthropic-version': '2023-06-01',
    },
    body: JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    throw await failedResponse('anthropic', response);
  }

  const data = await response.json() as {
    content?: Array<{ type: string; text?: string }>;
    usage?: { input_tokens?: number; output_tokens?: number };
  };

  const content = (data.content ?? [])
    .filter(block => block.type === 'text')
    .map(block => block.text ?? '')
    .join('');

  return {
    content,
    provider: 'anthropic',
    model: request.model,
    inputTokens: data.usage?.input_tokens,
    outputTokens: data.usage?.output_tokens,
  };
}

export function listAvailableModels(): string[] {
  return Object.keys(GITHUB_MODELS);
}
