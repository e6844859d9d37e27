import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { JUnitPlatformLauncher } from '../../src/JUnitPlatformLauncher';
import { CONSOLE_LAUNCHER_CLASS, CONSOLE_LAUNCHER_MODULE } from '../../src/command/ArgumentBuilder';
import { loadConfig } from '../../src/config';
import type { CliOptions } from '../../src/config';
import { OUT_FILE_NAME } from '../../src/process/ProcessLauncher';
import { ResolutionError } from '../../src/utils/errors';
import { Logger } from '../../src/utils/logger';

// Stands in for java: echoes one argument per line and fails like a test run with failures
const FAKE_JAVA = '#!/bin/sh\nfor arg in "$@"; do printf \'%s\\n\' "$arg"; done\nexit 3\n';

describe('Full flow', () => {
  let tempDir: string;
  let java: string;
  let logger: Logger;

  beforeEach(async () => {
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'junit-launch-flow-')));
    java = path.join(tempDir, 'bin', 'java');
    await fs.mkdir(path.dirname(java), { recursive: true });
    await fs.writeFile(java, FAKE_JAVA, { mode: 0o755 });
    await fs.mkdir(path.join(tempDir, 'target', 'test-classes'), { recursive: true });
    await fs.mkdir(path.join(tempDir, 'lib'), { recursive: true });
    await fs.writeFile(path.join(tempDir, 'lib', 'a.jar'), '');
    logger = new Logger('test', { logPath: path.join(tempDir, 'debug.log'), debug: true });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function createLauncher(cli: CliOptions = {}): Promise<JUnitPlatformLauncher> {
    const config = await loadConfig({
      cwd: tempDir,
      env: {},
      cli: {
        java,
        classpath: ['lib/a.jar', 'lib/missing.jar', 'target/test-classes'],
        tag: ['fast'],
        config: ['k=v'],
        timeout: '10',
        ...cli
      }
    });
    return new JUnitPlatformLauncher(config, logger);
  }

  async function readOutLines(): Promise<string[]> {
    const content = await fs.readFile(path.join(tempDir, 'target', OUT_FILE_NAME), 'utf8');
    return content.split('\n').filter(line => line.length > 0);
  }

  it('should launch the console launcher on the class path and report its exit code', async () => {
    const outcome = await (await createLauncher()).execute();

    const expectedPath = [
      path.join(tempDir, 'lib', 'a.jar'),
      path.join(tempDir, 'target', 'test-classes')
    ].join(path.delimiter);
    const expectedCommand = [
      java,
      '--class-path', expectedPath,
      CONSOLE_LAUNCHER_CLASS,
      '--disable-ansi-colors',
      'fast',
      '--config="k"="v"',
      '--scan-class-path'
    ];

    expect(outcome).toMatchObject({
      kind: 'launched',
      commandLine: expectedCommand,
      result: { kind: 'exit', exitCode: 3 },
      resultCode: 3,
      status: 'test-failure'
    });
    expect(await readOutLines()).toEqual(expectedCommand.slice(1));
  });

  it('should switch to module mode when the tests declare a module', async () => {
    const sources = path.join(tempDir, 'src', 'test', 'java');
    await fs.mkdir(sources, { recursive: true });
    await fs.writeFile(path.join(sources, 'module-info.java'), 'open module com.example.tests {\n}\n');

    const outcome = await (await createLauncher({ tag: [], config: [], strict: true })).execute();

    expect(outcome.kind).toBe('launched');
    expect(await readOutLines()).toEqual([
      '--module-path',
      [path.join(tempDir, 'lib', 'a.jar'), path.join(tempDir, 'target', 'test-classes')].join(path.delimiter),
      '--add-modules', 'ALL-MODULE-PATH,ALL-DEFAULT',
      '--module', CONSOLE_LAUNCHER_MODULE,
      '--disable-ansi-colors',
      '--fail-if-no-tests',
      '--select-module', 'com.example.tests'
    ]);
  });

  it('should log the platform version found on the class path', async () => {
    await fs.writeFile(path.join(tempDir, 'lib', 'junit-platform-console-standalone-1.10.2.jar'), '');

    await (await createLauncher({
      classpath: ['lib/junit-platform-console-standalone-1.10.2.jar', 'target/test-classes']
    })).execute();

    const log = await fs.readFile(path.join(tempDir, 'debug.log'), 'utf8');
    expect(log).toContain('[junit-platform-launcher] Launching JUnit Platform 1.10.2...');
  });

  it('should skip when asked to', async () => {
    const outcome = await (await createLauncher({ skip: true })).execute();

    expect(outcome).toEqual({ kind: 'skipped', reason: 'JUnit Platform Plugin execution skipped.' });
    await expect(fs.access(path.join(tempDir, 'target', OUT_FILE_NAME))).rejects.toThrow();
  });

  it('should skip when there are no compiled tests', async () => {
    await fs.rm(path.join(tempDir, 'target', 'test-classes'), { recursive: true });

    const outcome = await (await createLauncher()).execute();

    expect(outcome).toEqual({ kind: 'skipped', reason: 'Test output directory does not exist.' });
  });

  it('should fail before launching when the class path cannot be resolved', async () => {
    const launcher = await createLauncher({ classpathFile: 'target/classpath.txt' });

    await expect(launcher.execute()).rejects.toBeInstanceOf(ResolutionError);
    await expect(fs.access(path.join(tempDir, 'target', OUT_FILE_NAME))).rejects.toThrow();
  });

  it('should append entries from a class path file', async () => {
    await fs.writeFile(path.join(tempDir, 'target', 'classpath.txt'), `${path.join(tempDir, 'lib', 'a.jar')}\n`);

    const outcome = await (await createLauncher({
      classpath: ['target/test-classes'],
      classpathFile: 'target/classpath.txt'
    })).execute();

    expect(outcome).toMatchObject({
      kind: 'launched',
      commandLine: expect.arrayContaining([
        [path.join(tempDir, 'target', 'test-classes'), path.join(tempDir, 'lib', 'a.jar')].join(path.delimiter)
      ])
    });
  });
});
