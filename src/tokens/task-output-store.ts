/**
 * Per-run storage of agent task outputs.
 *
 * Every output is cut to the model's context budget on the way in, and the
 * combined context handed to a later task is cut again after joining, since
 * several outputs that each fit can still overflow together.
 *
 * One store belongs to one pipeline run. It is not safe to mutate from
 * concurrent agent calls.
 */

import { DEFAULT_BUDGET_RATIOS, getSafeTokenLimit, type BudgetRatios, type TokenBudget } from './budget.js';
import { defaultAccountant } from './counter.js';
import { DEFAULT_MODEL } from './models.js';
import { summarizeTaskOutput, truncateToTokenLimit, type SummarizeOptions } from './truncate.js';

/** Task keys compare by identity: 1 and "1" are different tasks */
export type TaskId = string | number;

export const CONTEXT_SEPARATOR = '\n\n---\n\n';

export interface TruncationEvent {
  taskId: TaskId;
  originalTokens: number;
  storedTokens: number;
  budget: number;
}

export interface TaskOutputStoreOptions extends SummarizeOptions {
  budgetRatios?: BudgetRatios;
  separator?: string;
  /** Called whenever a stored output had to be shortened */
  onTruncate?: (event: TruncationEvent) => void;
}

export class TaskOutputStore {
  readonly model: string;
  readonly limits: Readonly<TokenBudget>;
  private readonly outputs = new Map<TaskId, string>();
  private readonly separator: string;

  constructor(model: string = DEFAULT_MODEL, private readonly options: TaskOutputStoreOptions = {}) {
    this.model = model;
    this.limits = Object.freeze(getSafeTokenLimit(model, options.budgetRatios ?? DEFAULT_BUDGET_RATIOS));
    this.separator = options.separator ?? CONTEXT_SEPARATOR;
  }

  /**
   * Store a task's output, shortened to the context budget, and return
   * exactly what was stored. Reusing a task id overwrites the old value.
   */
  storeOutput(taskId: TaskId, output: string): string {
    const stored = summarizeTaskOutput(output, this.limits.context, this.model, this.options);
    this.outputs.set(taskId, stored);

    if (stored !== output && this.options.onTruncate) {
      const accountant = this.options.accountant ?? defaultAccountant;
      this.options.onTruncate({
        taskId,
        originalTokens: accountant.countTokens(output, this.model),
        storedTokens: accountant.countTokens(stored, this.model),
        budget: this.limits.context,
      });
    }

    return stored;
  }

  getOutput(taskId: TaskId): string {
    return this.outputs.get(taskId) ?? '';
  }

  has(taskId: TaskId): boolean {
    return this.outputs.has(taskId);
  }

  get size(): number {
    return this.outputs.size;
  }

  taskIds(): TaskId[] {
    return [...this.outputs.keys()];
  }

  /**
   * Join the outputs of the given tasks, in the order given, skipping ids
   * that were never stored, and fit the result to the context budget.
   */
  getCombinedContext(taskIds: readonly TaskId[]): string {
    const contexts = taskIds
      .filter(id => this.outputs.has(id))
      .map(id => this.getOutput(id));

    return truncateToTokenLimit(contexts.join(this.separator), this.limits.context, this.model, this.options);
  }
}
