import type { TaskId } from '../types/task.js';

/**
 * A query paired with the identifier it was submitted under.
 *
 * Neither value is inspected: the identifier may repeat across records and
 * the query is kept as given, empty string included.
 */
export class SimulationTask<TId extends TaskId = TaskId> {
  readonly id: TId;
  readonly query: string;

  constructor(id: TId, query: string) {
    this.id = id;
    this.query = query;
  }
}
