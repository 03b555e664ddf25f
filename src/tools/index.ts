// Token budget tools
export {
  countTokens,
  countTokensSchema,
  tokenBudget,
  tokenBudgetSchema,
  truncate,
  truncateSchema,
  summarize,
  summarizeSchema,
} from './tokens.js';

// Project templates
export { listProjectTemplates, listTemplatesSchema } from './templates.js';
