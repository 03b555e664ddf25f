/**
 * Sequential crew runner.
 *
 * One agent acts at a time. Before each task the outputs it depends on are
 * pulled from the task output store (already cut to the context budget),
 * and after it the new output is stored, cut again, for later tasks. The
 * full, uncut output is what gets written to disk.
 */

import { join } from 'path';
import {
  buildSystemPrompt,
  getAgentProfile,
  getBestModelForAgent,
  type AgentRole,
} from '../agents/index.js';
import { PipelineError } from '../errors.js';
import { logger } from '../logger.js';
import { ProjectWriter } from '../output/writer.js';
import {
  TaskOutputStore,
  defaultAccountant,
  getSafeTokenLimit,
  resolveModelProfile,
  type TokenAccountant,
} from '../tokens/index.js';
import { ChatExecutor } from './chat-executor.js';
import { buildTaskPlan, toProjectSlug, type PlannedTask, type ProjectBrief, type TaskKey } from './plan.js';
import type { AgentExecutor, RunManifest, TaskRunRecord } from './types.js';

export interface PipelineOptions {
  project: ProjectBrief;
  executor: AgentExecutor;
  store: TaskOutputStore;
  plan?: PlannedTask[];
  writer?: ProjectWriter;
  resolveModel?: (role: AgentRole) => string;
  accountant?: TokenAccountant;
  onTaskStart?: (task: PlannedTask, index: number, total: number) => void;
  onTaskComplete?: (record: TaskRunRecord) => void;
}

export interface PipelineResult {
  manifest: RunManifest;
  /** Full agent outputs by task */
  outputs: Map<TaskKey, string>;
  files: string[];
}

export function buildTaskPrompt(task: PlannedTask, context: string): string {
  const sections = [
    `# ${task.title}`,
    task.description.trim(),
    `Expected output: ${task.expectedOutput}`,
  ];
  if (context) {
    sections.push(`## Context from previous tasks\n\n${context}`);
  }
  return sections.join('\n\n');
}

/**
 * The model with the smallest request limit among the plan's agents, so
 * forwarded context fits whichever agent receives it.
 */
export function pickContextModel(plan: readonly PlannedTask[], resolveModel: (role: AgentRole) => string): string {
  const models = plan.map(task => resolveModel(task.agent));
  let best = models[0] ?? resolveModel('project_manager');
  for (const model of models) {
    if (resolveModelProfile(model).totalLimit < resolveModelProfile(best).totalLimit) {
      best = model;
    }
  }
  return best;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Mark the run failed at `task` and record it. A manifest that cannot be
 * written is logged; the returned error always carries the original cause.
 */
function failRun(manifest: RunManifest, task: PlannedTask, error: unknown, writer?: ProjectWriter): PipelineError {
  manifest.status = 'failed';
  manifest.failedTask = task.id;
  manifest.error = errorMessage(error);
  manifest.finishedAt = new Date().toISOString();
  try {
    writer?.writeManifest(manifest);
  } catch (writeError) {
    logger.error('Could not record the failed run', writeError, { taskId: String(task.id) });
  }
  return new PipelineError(`Task ${task.id} failed: ${errorMessage(error)}`, task.id, { cause: error });
}

export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const { project, executor, store, writer } = options;
  const plan = options.plan ?? buildTaskPlan(project);
  const resolveModel = options.resolveModel ?? ((role: AgentRole) => getBestModelForAgent(role));
  const accountant = options.accountant ?? defaultAccountant;

  const manifest: RunManifest = {
    project,
    contextModel: store.model,
    status: 'running',
    startedAt: new Date().toISOString(),
    tasks: [],
  };
  const outputs = new Map<TaskKey, string>();
  const files: string[] = [];

  logger.info(`Running ${plan.length} tasks for ${project.name}`, {
    type: project.type,
    contextModel: store.model,
    contextBudget: store.limits.context,
  });

  for (const [index, task] of plan.entries()) {
    const agent = getAgentProfile(task.agent);
    const model = resolveModel(task.agent);
    options.onTaskStart?.(task, index, plan.length);
    logger.task(task.id, agent.name);

    const started = Date.now();
    const context = store.getCombinedContext(task.contextIds);

    let output: string;
    try {
      output = await executor.run({
        task,
        agent,
        model,
        systemPrompt: buildSystemPrompt(agent),
        prompt: buildTaskPrompt(task, context),
        maxTokens: getSafeTokenLimit(model).response,
      });
    } catch (error) {
      throw failRun(manifest, task, error, writer);
    }

    const stored = store.storeOutput(task.id, output);
    outputs.set(task.id, output);

    let written: string[] = [];
    try {
      written = writer ? writer.writeTaskOutput(task, output) : [];
    } catch (error) {
      throw failRun(manifest, task, error, writer);
    }
    files.push(...written);

    const record: TaskRunRecord = {
      taskId: task.id,
      agent: agent.key,
      model,
      contextTokens: accountant.countTokens(context, store.model),
      outputTokens: accountant.countTokens(output, store.model),
      storedTokens: accountant.countTokens(stored, store.model),
      truncated: stored !== output,
      files: written,
      durationMs: Date.now() - started,
    };
    manifest.tasks.push(record);
    try {
      writer?.writeManifest(manifest);
    } catch (error) {
      throw failRun(manifest, task, error, writer);
    }
    options.onTaskComplete?.(record);
  }

  manifest.status = 'completed';
  manifest.finishedAt = new Date().toISOString();
  try {
    writer?.writeManifest(manifest);
  } catch (error) {
    const last = plan.at(-1);
    if (!last) throw error;
    throw failRun(manifest, last, error, writer);
  }

  return { manifest, outputs, files };
}

export interface CreateProjectOptions {
  project: ProjectBrief;
  outputDir: string;
  /** Use this model for every agent instead of the per-role recommendations */
  model?: string;
  executor?: AgentExecutor;
  onTaskStart?: PipelineOptions['onTaskStart'];
  onTaskComplete?: PipelineOptions['onTaskComplete'];
}

export interface CreateProjectResult extends PipelineResult {
  projectDir: string;
}

/**
 * Run the whole crew for a project and write everything under
 * `<outputDir>/<project slug>`.
 */
export async function createProject(options: CreateProjectOptions): Promise<CreateProjectResult> {
  const { project, model } = options;
  const plan = buildTaskPlan(project);
  const resolveModel = (role: AgentRole): string => model ?? getBestModelForAgent(role);
  const contextModel = pickContextModel(plan, resolveModel);

  const projectDir = join(options.outputDir, toProjectSlug(project.name));
  const writer = new ProjectWriter(projectDir);
  const store = new TaskOutputStore(contextModel, {
    onTruncate: event => logger.truncation(String(event.taskId), event.originalTokens, event.storedTokens, event.budget),
  });

  const result = await runPipeline({
    project,
    plan,
    executor: options.executor ?? new ChatExecutor(),
    store,
    writer,
    resolveModel,
    onTaskStart: options.onTaskStart,
    onTaskComplete: options.onTaskComplete,
  });

  return { ...result, projectDir: writer.projectDir };
}
