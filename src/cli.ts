import { isAgentRole, AGENT_PROFILES, AGENT_ROLES, getBestModelForAgent, modelOverrideVar } from './agents/index.js';
import {
  getActiveProvider,
  getConfigPath,
  getDefaultModel,
  getProviderInfo,
  listConfiguredProviders,
  hasAnyProvider,
  isLLMProvider,
  PROVIDERS,
  setProviderApiKey,
} from './config.js';
import { PipelineError } from './errors.js';
import { logger, setLogLevel } from './logger.js';
import { createProject } from './pipeline/driver.js';
import { chat, listAvailableModels } from './providers.js';
import { isProjectType, listTemplates, PROJECT_TYPES } from './templates.js';
import { getSafeTokenLimit, resolveModelProfile } from './tokens/index.js';
import { VERSION } from './version.js';

// ANSI colors
const reset = '\x1b[0m';
const bold = '\x1b[1m';
const dim = '\x1b[2m';
const red = '\x1b[31m';
const green = '\x1b[32m';
const yellow = '\x1b[33m';
const cyan = '\x1b[36m';

function box(content: string, width = 56): string {
  const lines = content.split('\n');
  const top = `┌${'─'.repeat(width - 2)}┐`;
  const bottom = `└${'─'.repeat(width - 2)}┘`;
  const padded = lines.map(l => {
    const stripped = l.replace(/\x1b\[[0-9;]*m/g, '');
    const padding = width - 4 - stripped.length;
    return `│ ${l}${' '.repeat(Math.max(0, padding))} │`;
  });
  return [top, ...padded, bottom].join('\n');
}

function progressBar(current: number, total: number, width = 20): string {
  const filled = Math.round((current / total) * width);
  const empty = width - filled;
  return `${green}${'█'.repeat(filled)}${dim}${'░'.repeat(empty)}${reset}`;
}

export interface ParsedArgs {
  positionals: string[];
  flags: Map<string, string | true>;
}

const BOOLEAN_FLAGS = new Set(['verbose', 'debug', 'help']);

/**
 * Parse `--name value`, `--name=value` and bare boolean flags.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq >= 0) {
      flags.set(body.slice(0, eq), body.slice(eq + 1));
      continue;
    }

    const next = args[i + 1];
    if (!BOOLEAN_FLAGS.has(body) && next !== undefined && !next.startsWith('--')) {
      flags.set(body, next);
      i++;
    } else {
      flags.set(body, true);
    }
  }

  return { positionals, flags };
}

function stringFlag(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

export function showHelp(): void {
  console.log(`
${bold}${cyan}CREWSMITH${reset} - A crew of AI agents that scaffolds your web project

${bold}Usage:${reset}
  crewsmith create --project <type> --name <name>   Run the crew on a new project
      [--description <text>]   What the client needs
      [--output <dir>]         Output directory (default: ./output)
      [--model <id>]           Use one model for every agent
      [--verbose] [--debug]    More logging
  crewsmith list-templates     Show the project types
  crewsmith check-config       Show provider, keys and per-agent models
  crewsmith set-key <provider> <key>   Store an API key (${PROVIDERS.join(', ')})
  crewsmith budget <model>     Show the token budget for a model
  crewsmith test-llm           Send a test prompt [--model <id>] [--prompt <text>]
  crewsmith server             Start MCP server exposing the token tools
  crewsmith help               Show this help

${bold}Project types:${reset}
  ${PROJECT_TYPES.join(', ')}

${bold}Examples:${reset}
  crewsmith create --project ecommerce --name "Clothing Store"
  crewsmith create --project landing --name "ABC Consulting" --description "Landing page for a consultancy"
`);
}

export function showTemplates(): void {
  console.log(`\n${bold}${cyan}Available templates${reset}\n`);
  for (const template of listTemplates()) {
    console.log(`${bold}${template.name}${reset} (${template.type})`);
    console.log(`  ${template.description}`);
    console.log(`  Estimated time: ${template.estimatedTime}`);
    console.log('  Features:');
    for (const feature of template.features) {
      console.log(`    • ${feature}`);
    }
    console.log('');
  }
}

function showSetupHelp(): void {
  console.log(`\n${red}${bold}No AI provider configured${reset}\n`);
  console.log('Set ONE of the following:');
  for (const provider of PROVIDERS) {
    const info = getProviderInfo(provider);
    console.log(`  • ${info.envVar.padEnd(18)} ${dim}${info.name} - ${info.url}${reset}`);
  }
  console.log(`\nOr store a key with: crewsmith set-key <provider> <key>\n`);
}

export function showBudget(model: string): void {
  const profile = resolveModelProfile(model);
  const budget = getSafeTokenLimit(model);
  console.log(box([
    `${bold}${model}${reset}${profile.known ? '' : ` ${yellow}(unknown, defaults)${reset}`}`,
    `Encoding:  ${profile.encoding}`,
    `Total:     ${budget.total}`,
    `Context:   ${budget.context}`,
    `Response:  ${budget.response}`,
  ].join('\n')));
}

export function showConfig(): void {
  const provider = getActiveProvider();
  const info = getProviderInfo(provider);
  const configured = listConfiguredProviders();

  console.log(`\n${bold}${cyan}AI configuration${reset}\n`);
  console.log(box([
    `Provider:  ${info.name}`,
    `Key:       ${configured.includes(provider) ? `${green}set${reset}` : `${red}missing${reset} (${info.envVar})`}`,
    `Default:   ${getDefaultModel()}`,
    `Config:    ${getConfigPath()}`,
  ].join('\n')));

  console.log(`\n${bold}Models per agent:${reset}\n`);
  for (const role of AGENT_ROLES) {
    const model = getBestModelForAgent(role);
    const budget = getSafeTokenLimit(model);
    console.log(`  • ${cyan}${AGENT_PROFILES[role].name.padEnd(20)}${reset} → ${model} ${dim}(context ${budget.context}, response ${budget.response}; override with ${modelOverrideVar(role)})${reset}`);
  }

  console.log(`\n${bold}Available models:${reset} ${dim}${listAvailableModels().join(', ')}${reset}\n`);

  if (configured.length === 0) {
    showSetupHelp();
    process.exitCode = 1;
  }
}

export function runSetKey(parsed: ParsedArgs): void {
  const [provider, apiKey] = parsed.positionals;

  if (!provider || !isLLMProvider(provider)) {
    console.error(`${red}Provider must be one of: ${PROVIDERS.join(', ')}${reset}`);
    process.exitCode = 1;
    return;
  }
  if (!apiKey || !apiKey.trim()) {
    console.error(`${red}Usage: crewsmith set-key <provider> <key>${reset}`);
    process.exitCode = 1;
    return;
  }

  setProviderApiKey(provider, apiKey.trim());
  const info = getProviderInfo(provider);
  console.log(`${green}✓${reset} ${info.name} key saved to ${getConfigPath()}`);
  if (process.env[info.envVar]) {
    console.log(`${yellow}${info.envVar} is set and takes precedence over the saved key${reset}`);
  }
}

function applyLogFlags(parsed: ParsedArgs): void {
  if (parsed.flags.has('debug')) {
    setLogLevel('debug');
  } else if (parsed.flags.has('verbose')) {
    setLogLevel('info');
  } else {
    setLogLevel('warn');
  }
}

export async function runCreate(parsed: ParsedArgs): Promise<void> {
  const type = stringFlag(parsed, 'project');
  const name = stringFlag(parsed, 'name');

  if (!type || !isProjectType(type)) {
    console.error(`${red}--project must be one of: ${PROJECT_TYPES.join(', ')}${reset}`);
    process.exitCode = 1;
    return;
  }
  if (!name || !name.trim()) {
    console.error(`${red}--name is required${reset}`);
    process.exitCode = 1;
    return;
  }
  if (!hasAnyProvider()) {
    showSetupHelp();
    process.exitCode = 1;
    return;
  }

  applyLogFlags(parsed);
  const outputDir = stringFlag(parsed, 'output') ?? './output';
  const model = stringFlag(parsed, 'model');

  console.log(`\n${bold}${green}Creating project: ${name}${reset}`);
  console.log(`Type: ${type}`);
  console.log(`Output: ${outputDir}\n`);

  try {
    const result = await createProject({
      project: { name: name.trim(), type, description: stringFlag(parsed, 'description') ?? '' },
      outputDir,
      model,
      onTaskStart: (task, index, total) => {
        const agent = isAgentRole(task.agent) ? AGENT_PROFILES[task.agent].name : task.agent;
        console.log(`${progressBar(index, total)} ${bold}${task.title}${reset} ${dim}(${agent})${reset}`);
      },
      onTaskComplete: record => {
        const note = record.truncated ? ` ${yellow}context trimmed to ${record.storedTokens} tokens${reset}` : '';
        console.log(`  ${green}✓${reset} ${record.files.length} file(s) in ${(record.durationMs / 1000).toFixed(1)}s${note}`);
      },
    });

    console.log(`\n${progressBar(1, 1)} ${bold}${green}Project created${reset}\n`);
    console.log(`Location: ${result.projectDir}`);
    console.log(`Files written: ${result.files.length}`);
    console.log(`\nNext steps:`);
    console.log(`  1. Read ${cyan}README.md${reset} in the project directory`);
    console.log('  2. Follow the installation guide and set the environment variables');
    console.log('  3. Run the project locally, then follow docs/DEPLOYMENT.md\n');
  } catch (error) {
    const where = error instanceof PipelineError ? ` during ${error.taskId}` : '';
    logger.error(`Project creation failed${where}`, error);
    console.error(`\n${red}${bold}Project creation failed${where}:${reset} ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  }
}

export async function runTestLLM(parsed: ParsedArgs): Promise<void> {
  const model = stringFlag(parsed, 'model') ?? getDefaultModel();
  const prompt = stringFlag(parsed, 'prompt') ?? 'Hello, are you working correctly?';
  const provider = getActiveProvider();

  console.log(`\n${bold}${cyan}Testing LLM connection${reset}\n`);
  console.log(`Provider: ${getProviderInfo(provider).name}`);
  console.log(`Model:    ${model}`);
  console.log(`Prompt:   ${prompt}\n`);

  try {
    const response = await chat(prompt, { model, provider, maxTokens: getSafeTokenLimit(model).response });
    console.log(`${green}${bold}LLM is working${reset}\n`);
    console.log(box(response.content.trim() || `${dim}(empty response)${reset}`, 72));
    console.log('');
  } catch (error) {
    console.error(`${red}${bold}LLM call failed:${reset} ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  }
}

export function runCLI(args: string[]): 'server' | 'handled' | Promise<'handled'> {
  const command = args[0];
  const parsed = parseArgs(args.slice(1));

  switch (command) {
    case 'create':
      return runCreate(parsed).then(() => 'handled' as const);

    case 'list-templates':
    case 'templates':
      showTemplates();
      return 'handled';

    case 'check-config':
    case 'config':
      showConfig();
      return 'handled';

    case 'set-key':
      runSetKey(parsed);
      return 'handled';

    case 'budget': {
      const model = parsed.positionals[0] ?? getDefaultModel();
      showBudget(model);
      return 'handled';
    }

    case 'test-llm':
      return runTestLLM(parsed).then(() => 'handled' as const);

    case 'server':
      return 'server';

    case 'version':
    case '--version':
    case '-v':
      console.log(VERSION);
      return 'handled';

    case undefined:
    case 'help':
    case '--help':
    case '-h':
      showHelp();
      return 'handled';

    default:
      console.error(`${red}Unknown command: ${command}${reset}`);
      showHelp();
      process.exitCode = 1;
      return 'handled';
  }
}
