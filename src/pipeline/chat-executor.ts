import type { LLMProvider } from '../config.js';
import { logger } from '../logger.js';
import { chat, type ChatOptions } from '../providers.js';
import type { AgentExecutor, AgentInvocation } from './types.js';

export interface ChatExecutorOptions {
  provider?: LLMProvider;
  timeout?: number;
  temperature?: number;
}

/** Runs each agent turn as a single chat completion */
export class ChatExecutor implements AgentExecutor {
  constructor(private readonly options: ChatExecutorOptions = {}) {}

  async run(invocation: AgentInvocation): Promise<string> {
    const chatOptions: ChatOptions = {
      systemPrompt: invocation.systemPrompt,
      model: invocation.model,
      maxTokens: invocation.maxTokens,
      provider: this.options.provider,
      timeout: this.options.timeout,
      temperature: this.options.temperature,
    };

    const response = await chat(invocation.prompt, chatOptions);
    logger.debug(`Agent ${invocation.agent.key} answered`, {
      task: invocation.task.id,
      model: response.model,
      inputTokens: response.inputTokens,
      outputTokens: response.outputTokens,
    });
    return response.content;
  }
}
