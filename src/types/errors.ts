export const ErrorCodes = {
  // Loading (1xxx)
  INVALID_DEFINITION: 1001,
  EMPTY_QUERY: 1002,
  MALFORMED_JSON: 1003,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** JSON form of a TaskError. */
export interface TaskErrorData {
  code: number;
  message: string;
  data?: Record<string, unknown>;
}
