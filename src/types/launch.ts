import type { Logger } from '../utils/logger';
import type { VersionLookup } from '../world/VersionLookup';

/**
 * Everything a run shares: created once, handed to each component
 */
export interface LaunchContext {
  readonly logger: Logger;
  readonly versions: VersionLookup;
}

export interface LaunchConfiguration {
  readonly buildDirectory: string;
  readonly timeoutSeconds: number;
  readonly reportsPath?: string;
  readonly strict: boolean;
  readonly tags: readonly string[];
  readonly parameters: Readonly<Record<string, string>>;
  readonly testModuleName?: string;
  readonly javaExecutable: string;
  readonly terminationGraceSeconds: number;
}

export interface ClasspathMode {
  kind: 'classpath';
  path: string;
}

export interface ModuleMode {
  kind: 'module';
  path: string;
  moduleName: string;
}

export type ExecutionMode = ClasspathMode | ModuleMode;

export type CommandLine = readonly string[];

export interface ExitResult {
  kind: 'exit';
  exitCode: number;
}

export interface TimedOutResult {
  kind: 'timed-out';
  /** Whether the child actually exited after being signalled */
  terminated: boolean;
  signal?: NodeJS.Signals;
}

export interface ProcessErrorResult {
  kind: 'process-error';
  error: Error;
}

export type LaunchResult = ExitResult | TimedOutResult | ProcessErrorResult;

export type LaunchStatus = 'success' | 'test-failure' | 'launcher-error' | 'timed-out';

export const PROCESS_ERROR_CODE = -1;
export const TIMED_OUT_CODE = -2;

export function toResultCode(result: LaunchResult): number {
  switch (result.kind) {
    case 'exit': return result.exitCode;
    case 'process-error': return PROCESS_ERROR_CODE;
    case 'timed-out': return TIMED_OUT_CODE;
  }
}

export function interpretResultCode(code: number): LaunchStatus {
  if (code === 0) return 'success';
  if (code > 0) return 'test-failure';
  if (code === TIMED_OUT_CODE) return 'timed-out';
  return 'launcher-error';
}
