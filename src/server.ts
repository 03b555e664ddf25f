import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  countTokens,
  countTokensSchema,
  tokenBudget,
  tokenBudgetSchema,
  truncate,
  truncateSchema,
  summarize,
  summarizeSchema,
  listProjectTemplates,
  listTemplatesSchema,
} from './tools/index.js';
import { logger } from './logger.js';
import { VERSION } from './version.js';

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

/**
 * Run a tool handler and turn its value, or its failure, into MCP text content.
 */
export function wrapTool<T, R>(name: string, fn: (args: T) => R): (args: T) => Promise<ToolResult> {
  return async (args: T) => {
    logger.debug(`Tool called: ${name}`);

    try {
      const result = fn(args);
      logger.debug(`Tool ${name} completed`);
      return {
        content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
      };
    } catch (error) {
      logger.error(`Tool ${name} failed`, error);
      return {
        content: [{ type: 'text' as const, text: JSON.stringify({ error: String(error) }) }],
        isError: true,
      };
    }
  };
}

export function createServer(): McpServer {
  logger.info('Creating crewsmith MCP server');

  const server = new McpServer({
    name: 'crewsmith',
    version: VERSION,
  });

  server.tool(
    'crewsmith_count_tokens',
    'Count the tokens of a text under a model\'s tokenizer',
    countTokensSchema.shape,
    wrapTool('crewsmith_count_tokens', countTokens)
  );

  server.tool(
    'crewsmith_token_budget',
    'Get the total, context and response token budgets for a model',
    tokenBudgetSchema.shape,
    wrapTool('crewsmith_token_budget', tokenBudget)
  );

  server.tool(
    'crewsmith_truncate',
    'Shorten a text to a token budget, keeping its beginning and end',
    truncateSchema.shape,
    wrapTool('crewsmith_truncate', truncate)
  );

  server.tool(
    'crewsmith_summarize',
    'Reduce a markdown task output to a token budget by dropping middle lines',
    summarizeSchema.shape,
    wrapTool('crewsmith_summarize', summarize)
  );

  server.tool(
    'crewsmith_list_templates',
    'List the project types the crew can scaffold',
    listTemplatesSchema.shape,
    wrapTool('crewsmith_list_templates', listProjectTemplates)
  );

  return server;
}
