import type { SimulationTask } from '../task/SimulationTask.js';

// ---------- Logger ----------

/** Logger callback for diagnostic events. */
export type TaskLogger = (level: 'debug' | 'warn' | 'error', message: string, data?: unknown) => void;

// ---------- Storage Plugin ----------

export interface TaskStore {
  get(key: string): Promise<SimulationTask | undefined>;
  set(key: string, task: SimulationTask): Promise<void>;
  delete(key: string): Promise<void>;
}
