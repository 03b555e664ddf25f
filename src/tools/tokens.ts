import { z } from 'zod';
import {
  DEFAULT_MODEL,
  DEFAULT_SUMMARY_TOKENS,
  countTokens as count,
  getSafeTokenLimit,
  resolveModelProfile,
  summarizeTaskOutput,
  truncateToTokenLimit,
  type TokenBudget,
} from '../tokens/index.js';
import { limitLength, LIMITS } from '../security.js';

const modelField = z.string().max(100).optional().describe(`Model id (default ${DEFAULT_MODEL})`);

export const countTokensSchema = z.object({
  text: z.string().describe('Text to measure'),
  model: modelField,
});

export type CountTokensInput = z.infer<typeof countTokensSchema>;

export function countTokens(input: CountTokensInput): { model: string; encoding: string; tokens: number } {
  const model = input.model ?? DEFAULT_MODEL;
  return {
    model,
    encoding: resolveModelProfile(model).encoding,
    tokens: count(limitLength(input.text, LIMITS.TEXT_MAX_LENGTH), model),
  };
}

export const tokenBudgetSchema = z.object({
  model: modelField,
});

export type TokenBudgetInput = z.infer<typeof tokenBudgetSchema>;

export function tokenBudget(input: TokenBudgetInput): TokenBudget & { model: string; known: boolean } {
  const model = input.model ?? DEFAULT_MODEL;
  return {
    model,
    known: resolveModelProfile(model).known,
    ...getSafeTokenLimit(model),
  };
}

export const truncateSchema = z.object({
  text: z.string().describe('Text to shorten'),
  maxTokens: z.number().int().describe('Token budget for the result'),
  model: modelField,
});

export type TruncateInput = z.infer<typeof truncateSchema>;

export function truncate(input: TruncateInput): { text: string; tokens: number; truncated: boolean } {
  const model = input.model ?? DEFAULT_MODEL;
  const source = limitLength(input.text, LIMITS.TEXT_MAX_LENGTH);
  const text = truncateToTokenLimit(source, input.maxTokens, model);
  return { text, tokens: count(text, model), truncated: text !== source };
}

export const summarizeSchema = z.object({
  output: z.string().describe('Task output to reduce, typically markdown'),
  maxTokens: z.number().int().optional().describe(`Token budget (default ${DEFAULT_SUMMARY_TOKENS})`),
  model: modelField,
});

export type SummarizeInput = z.infer<typeof summarizeSchema>;

export function summarize(input: SummarizeInput): { text: string; tokens: number; truncated: boolean } {
  const model = input.model ?? DEFAULT_MODEL;
  const source = limitLength(input.output, LIMITS.TEXT_MAX_LENGTH);
  const text = summarizeTaskOutput(source, input.maxTokens ?? DEFAULT_SUMMARY_TOKENS, model);
  return { text, tokens: count(text, model), truncated: text !== source };
}
