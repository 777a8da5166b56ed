import { TaskError } from '../errors/TaskError.js';
import { SimulationTask } from './SimulationTask.js';
import type { TaskDefinition } from '../types/task.js';
import type { TaskLogger } from '../types/plugin.js';

export interface LoaderOptions {
  /** Reject definitions whose query is empty or whitespace only (default: false). */
  rejectEmptyQuery?: boolean;
  /** Optional logger for diagnostic events. */
  logger?: TaskLogger;
}

/** Builds task records from untrusted definition data. */
export class TaskLoader {
  private readonly options: Required<Omit<LoaderOptions, 'logger'>> & { logger?: TaskLogger };

  constructor(options?: LoaderOptions) {
    this.options = {
      rejectEmptyQuery: options?.rejectEmptyQuery ?? false,
      logger: options?.logger,
    };
  }

  /**
   * Check the shape of a single definition. Never throws.
   * Extra keys are allowed and ignored.
   */
  static validateDefinition(value: unknown): value is TaskDefinition {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;

    const def = value as Record<string, unknown>;

    if (
      def.id !== null &&
      typeof def.id !== 'string' &&
      !(typeof def.id === 'number' && Number.isFinite(def.id))
    )
      return false;
    if (typeof def.id === 'number' && Number.isInteger(def.id) && !Number.isSafeInteger(def.id))
      return false;
    if (typeof def.query !== 'string') return false;

    return true;
  }

  static fromDefinition(definition: TaskDefinition): SimulationTask<string | number | null> {
    return new SimulationTask(definition.id, definition.query);
  }

  /**
   * Load an array of definitions, one record per element in input order.
   * @throws TaskError on the first element that fails validation.
   */
  load(input: unknown): SimulationTask<string | number | null>[] {
    if (!Array.isArray(input)) {
      this.options.logger?.('warn', 'Task definitions are not an array', { type: typeof input });
      throw TaskError.notAnArray();
    }

    const tasks: SimulationTask<string | number | null>[] = [];
    for (const [index, entry] of input.entries()) {
      if (!TaskLoader.validateDefinition(entry)) {
        this.options.logger?.('warn', 'Rejected task definition', { index });
        throw TaskError.invalidDefinition(index);
      }
      if (this.options.rejectEmptyQuery && entry.query.trim() === '') {
        this.options.logger?.('warn', 'Rejected empty query', { index, id: entry.id });
        throw TaskError.emptyQuery(index, entry.id);
      }
      tasks.push(TaskLoader.fromDefinition(entry));
    }

    this.options.logger?.('debug', 'Loaded task definitions', { count: tasks.length });
    return tasks;
  }

  /**
   * Parse JSON text and load the definitions it holds.
   * @throws TaskError with MALFORMED_JSON when the text does not parse.
   */
  parse(json: string): SimulationTask<string | number | null>[] {
    let input: unknown;
    try {
      input = JSON.parse(json);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.options.logger?.('error', 'Failed to parse task definitions', { reason });
      throw TaskError.malformedJson(reason);
    }
    return this.load(input);
  }
}
