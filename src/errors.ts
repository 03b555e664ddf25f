import type { LLMProvider } from './config.js';

/** Missing or invalid provider configuration */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A chat-completion call that failed at the provider or in transit */
export class ProviderError extends Error {
  constructor(
    message: string,
    readonly provider: LLMProvider,
    readonly status?: number,
    readonly retryable = false,
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/** An agent task that could not complete; the run stops at this task */
export class PipelineError extends Error {
  constructor(
    message: string,
    readonly taskId: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}
