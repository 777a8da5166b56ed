// Task record
export { SimulationTask } from './task/SimulationTask.js';

// Loading
export { TaskLoader } from './task/TaskLoader.js';
export type { LoaderOptions } from './task/TaskLoader.js';

// Errors
export { TaskError } from './errors/TaskError.js';

// Types
export type { TaskId, TaskDefinition } from './types/task.js';

export type { TaskErrorData, ErrorCode } from './types/errors.js';
export { ErrorCodes } from './types/errors.js';

export type { TaskLogger, TaskStore } from './types/plugin.js';

// Stores
export { InMemoryTaskStore } from './stores/InMemoryTaskStore.js';
