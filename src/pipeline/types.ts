import type { AgentProfile } from '../agents/index.js';
import type { PlannedTask, ProjectBrief, TaskKey } from './plan.js';

export interface AgentInvocation {
  task: PlannedTask;
  agent: AgentProfile;
  model: string;
  systemPrompt: string;
  prompt: string;
  /** Response budget for the agent's model */
  maxTokens: number;
}

/** Runs one agent turn and returns its text output */
export interface AgentExecutor {
  run(invocation: AgentInvocation): Promise<string>;
}

export interface TaskRunRecord {
  taskId: TaskKey;
  agent: string;
  model: string;
  contextTokens: number;
  outputTokens: number;
  storedTokens: number;
  truncated: boolean;
  files: string[];
  durationMs: number;
}

export type RunStatus = 'running' | 'completed' | 'failed';

export interface RunManifest {
  project: ProjectBrief;
  contextModel: string;
  status: RunStatus;
  startedAt: string;
  finishedAt?: string;
  failedTask?: TaskKey;
  error?: string;
  tasks: TaskRunRecord[];
}
