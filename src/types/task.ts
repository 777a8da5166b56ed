/**
 * Identifier a task record carries. Opaque to the library: any scalar
 * token is accepted, including the absent-identifier sentinels.
 */
export type TaskId = string | number | bigint | boolean | symbol | null | undefined;

/**
 * JSON-compatible shape a task record is loaded from. Integer ids beyond
 * Number.MAX_SAFE_INTEGER do not survive JSON.parse and must be written as strings.
 */
export interface TaskDefinition {
  id: string | number | null;
  query: string;
}
