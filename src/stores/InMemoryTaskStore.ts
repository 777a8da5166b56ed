import type { SimulationTask } from '../task/SimulationTask.js';
import type { TaskStore } from '../types/plugin.js';

/** In-memory task store backed by a Map. Keys are independent of task ids. */
export class InMemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, SimulationTask>();

  async get(key: string): Promise<SimulationTask | undefined> {
    return this.tasks.get(key);
  }

  async set(key: string, task: SimulationTask): Promise<void> {
    this.tasks.set(key, task);
  }

  async delete(key: string): Promise<void> {
    this.tasks.delete(key);
  }

  /** Returns the number of tasks currently stored. */
  get size(): number {
    return this.tasks.size;
  }

  /** Stored tasks in insertion order. */
  values(): SimulationTask[] {
    return [...this.tasks.values()];
  }

  /** Remove all tasks. */
  clear(): void {
    this.tasks.clear();
  }
}
