import { z } from 'zod';
import { resolveModelProfile } from './models.js';

export const budgetRatiosSchema = z.object({
  /** Share of the total limit forwarded as prior-task context */
  context: z.number().min(0).max(1),
  /** Share of the total limit requested for the agent's response */
  response: z.number().min(0).max(1),
}).refine(r => r.context + r.response <= 1, {
  message: 'context and response ratios must not exceed 1 together',
});

export type BudgetRatios = z.infer<typeof budgetRatiosSchema>;

// The remaining 20% is left for system prompts and task text, which are never measured here
export const DEFAULT_BUDGET_RATIOS: BudgetRatios = { context: 0.5, response: 0.3 };

export interface TokenBudget {
  total: number;
  context: number;
  response: number;
}

/**
 * Split a model's request limit into a context budget and a response
 * budget. Throws a ZodError for ratios that could overrun the total.
 */
export function getSafeTokenLimit(model: string, ratios: BudgetRatios = DEFAULT_BUDGET_RATIOS): TokenBudget {
  const { context, response } = budgetRatiosSchema.parse(ratios);
  const total = resolveModelProfile(model).totalLimit;

  return {
    total,
    context: Math.floor(total * context),
    response: Math.floor(total * response),
  };
}
