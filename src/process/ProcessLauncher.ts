import { constants, promises as fs } from 'fs';
import type { Writable } from 'stream';
import { finished } from 'stream/promises';
import path from 'path';
import { $, ProcessOutput, which } from 'zx';
import type { ProcessPromise } from 'zx';
import type { CommandLine, LaunchContext, LaunchResult } from '../types/launch';
import { ErrorCode, JUnitLaunchError, describeError } from '../utils/errors';
import type { Logger } from '../utils/logger';

$.verbose = false;

export const OUT_FILE_NAME = 'junit-console-launcher.out.txt';
export const ERR_FILE_NAME = 'junit-console-launcher.err.txt';

const DEFAULT_GRACE_SECONDS = 5;
export const MAX_TIMER_MS = 2 ** 31 - 1;

export interface ProcessLauncherOptions {
  /** Time between SIGTERM and SIGKILL once the timeout has elapsed */
  terminationGraceSeconds?: number;
}

type Settled =
  | { state: 'exited'; output: ProcessOutput }
  | { state: 'failed'; error: unknown }
  | { state: 'pending' };

export class ProcessLauncher {
  private logger: Logger;
  private graceMs: number;

  constructor(context: LaunchContext, options: ProcessLauncherOptions = {}) {
    this.logger = context.logger.child('process-launcher');
    this.graceMs = (options.terminationGraceSeconds ?? DEFAULT_GRACE_SECONDS) * 1000;
  }

  async launch(commandLine: CommandLine, target: string, timeoutSeconds: number): Promise<LaunchResult> {
    const [executable, ...args] = commandLine;
    if (executable === undefined) {
      return this.processError(new JUnitLaunchError(ErrorCode.PROCESS_FAILED, 'Empty command line'));
    }

    this.logger.debug(`Starting process (timeout=${timeoutSeconds})...`);
    commandLine.forEach(token => this.logger.debug(token));

    const missing = await this.checkExecutable(executable);
    if (missing) {
      return this.processError(missing);
    }

    let out: Writable;
    try {
      await fs.mkdir(target, { recursive: true });
      out = (await fs.open(path.join(target, OUT_FILE_NAME), 'w')).createWriteStream();
    } catch (error) {
      return this.processError(error);
    }
    let err: Writable;
    try {
      err = (await fs.open(path.join(target, ERR_FILE_NAME), 'w')).createWriteStream();
    } catch (error) {
      await this.closeSinks(out);
      return this.processError(error);
    }
    for (const sink of [out, err]) {
      sink.on('error', error => this.logger.error('Writing process output failed', error));
    }

    let proc: ProcessPromise;
    try {
      this.logger.command(executable, args);
      proc = $({ nothrow: true, quiet: true })`${executable} ${args}`.stdio('inherit', 'pipe', 'pipe');
      proc.stdout.pipe(out);
      proc.stderr.pipe(err);
    } catch (error) {
      await this.closeSinks(out, err);
      return this.processError(error);
    }

    const completion = proc.then(
      (output): Settled => ({ state: 'exited', output }),
      (reason: unknown): Settled => {
        if (reason instanceof ProcessOutput) {
          return { state: 'exited', output: reason };
        }
        return { state: 'failed', error: reason };
      }
    );

    const settled = await withTimeout(completion, timeoutSeconds * 1000);
    const result = settled.state === 'pending'
      ? await this.onTimeout(proc, completion, timeoutSeconds)
      : this.fromSettled(settled);

    if (!(result.kind === 'timed-out' && !result.terminated)) {
      proc.stdout.unpipe(out);
      proc.stderr.unpipe(err);
      await this.closeSinks(out, err);
    }

    this.logger.lifecycle('Process finished', { result: result.kind });
    return result;
  }

  private async onTimeout(proc: ProcessPromise, completion: Promise<Settled>, timeoutSeconds: number): Promise<LaunchResult> {
    this.logger.error(`Global timeout reached: ${timeoutSeconds} second(s)`);
    return this.terminate(proc, completion);
  }

  private fromSettled(settled: Exclude<Settled, { state: 'pending' }>): LaunchResult {
    if (settled.state === 'failed') {
      return this.processError(settled.error);
    }
    const { output } = settled;
    if (output.exitCode === null) {
      return this.processError(new JUnitLaunchError(
        ErrorCode.PROCESS_FAILED,
        `Process terminated by signal ${output.signal ?? 'unknown'}`
      ));
    }
    this.logger.info('Process exited', { exitCode: output.exitCode });
    return { kind: 'exit', exitCode: output.exitCode };
  }

  /**
   * SIGTERM, wait for the grace period, then SIGKILL.
   */
  private async terminate(proc: ProcessPromise, completion: Promise<Settled>): Promise<LaunchResult> {
    for (const signal of ['SIGTERM', 'SIGKILL'] as const) {
      this.logger.warn(`Sending ${signal} to timed out process`);
      await this.signal(proc, signal);
      const settled = await withTimeout(completion, this.graceMs);
      if (settled.state !== 'pending') {
        this.logger.info('Timed out process terminated', { signal });
        return { kind: 'timed-out', terminated: true, signal };
      }
    }
    this.logger.error('Timed out process could not be terminated', undefined, { pid: proc.child?.pid });
    return { kind: 'timed-out', terminated: false };
  }

  private async signal(proc: ProcessPromise, signal: NodeJS.Signals): Promise<void> {
    try {
      await proc.kill(signal);
    } catch (error) {
      // Tree kill relies on `ps`; fall back to signalling the direct child
      this.logger.warn('Process tree kill failed, signalling child directly', { error: describeError(error) });
      proc.child?.kill(signal);
    }
  }

  private async checkExecutable(executable: string): Promise<Error | null> {
    if (path.isAbsolute(executable)) {
      try {
        await fs.access(executable, constants.X_OK);
        return null;
      } catch (error) {
        return new JUnitLaunchError(ErrorCode.PROCESS_FAILED,
          `Executable is missing or not executable: ${executable}`, { cause: describeError(error) });
      }
    }
    const found = await which(executable, { nothrow: true });
    return found ? null : new JUnitLaunchError(ErrorCode.PROCESS_FAILED,
      `Executable not found on PATH: ${executable}`);
  }

  private async closeSinks(...sinks: Writable[]): Promise<void> {
    try {
      await Promise.all(sinks.map(sink => {
        sink.end();
        return finished(sink);
      }));
    } catch (error) {
      this.logger.warn('Closing process output files failed', { error: describeError(error) });
    }
  }

  private processError(error: unknown): LaunchResult {
    this.logger.error('Executing process failed', error);
    return { kind: 'process-error', error: toError(error) };
  }
}

/**
 * Settles with `pending` once `ms` have passed. Delays beyond the 32-bit
 * limit of setTimeout are covered by a chain of shorter timers.
 */
async function withTimeout(completion: Promise<Settled>, ms: number): Promise<Settled> {
  let timer: NodeJS.Timeout | undefined;
  let remaining = ms;
  const pending = new Promise<Settled>(resolve => {
    const arm = (): void => {
      const step = Math.min(remaining, MAX_TIMER_MS);
      remaining -= step;
      timer = setTimeout(() => (remaining > 0 ? arm() : resolve({ state: 'pending' })), step);
    };
    arm();
  });
  try {
    return await Promise.race([completion, pending]);
  } finally {
    clearTimeout(timer);
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
