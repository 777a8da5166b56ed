import { ErrorCodes, type TaskErrorData } from '../types/errors.js';

export class TaskError extends Error {
  readonly code: number;
  readonly data?: Record<string, unknown>;

  constructor(code: number, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'TaskError';
    this.code = code;
    this.data = data;
  }

  toJSON(): TaskErrorData {
    return {
      code: this.code,
      message: this.message,
      ...(this.data !== undefined ? { data: this.data } : {}),
    };
  }

  static notAnArray(): TaskError {
    return new TaskError(ErrorCodes.INVALID_DEFINITION, 'Task definitions must be an array');
  }

  static invalidDefinition(index: number): TaskError {
    return new TaskError(ErrorCodes.INVALID_DEFINITION, `Invalid task definition at index ${index}`, {
      index,
    });
  }

  static emptyQuery(index: number, id: string | number | null): TaskError {
    return new TaskError(ErrorCodes.EMPTY_QUERY, `Empty query at index ${index}`, { index, id });
  }

  static malformedJson(reason: string): TaskError {
    return new TaskError(ErrorCodes.MALFORMED_JSON, 'Task definitions are not valid JSON', { reason });
  }
}
