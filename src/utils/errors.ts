export enum ErrorCode {
  RESOLUTION_FAILED = 'RESOLUTION_FAILED',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  PROCESS_FAILED = 'PROCESS_FAILED',
}

export class JUnitLaunchError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'JUnitLaunchError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Classpath elements could not be obtained, so no process may be started.
 */
export class ResolutionError extends JUnitLaunchError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.RESOLUTION_FAILED, message, context);
    this.name = 'ResolutionError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
