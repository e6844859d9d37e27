import { promises as fs } from 'fs';
import path from 'path';
import { ArgumentBuilder } from './command/ArgumentBuilder';
import {
  ClasspathFileSource,
  CompositeClasspathSource,
  StaticClasspathSource
} from './classpath/ClasspathSource';
import type { ClasspathSource } from './classpath/ClasspathSource';
import { PathResolver } from './classpath/PathResolver';
import type { JUnitLaunchConfig } from './config';
import { locateJavaExecutable } from './process/JavaExecutable';
import { ProcessLauncher } from './process/ProcessLauncher';
import { interpretResultCode, toResultCode } from './types/launch';
import type { CommandLine, LaunchConfiguration, LaunchContext, LaunchResult, LaunchStatus } from './types/launch';
import { Logger } from './utils/logger';
import { TestModuleDetector } from './world/TestModuleDetector';
import { JUNIT_PLATFORM_VERSION, VersionLookup } from './world/VersionLookup';

export type GoalOutcome =
  | { kind: 'skipped'; reason: string }
  | {
      kind: 'launched';
      commandLine: CommandLine;
      result: LaunchResult;
      resultCode: number;
      status: LaunchStatus;
    };

export function createClasspathSource(config: JUnitLaunchConfig): ClasspathSource {
  const sources: ClasspathSource[] = [];
  if (config.classpath.length > 0) {
    sources.push(new StaticClasspathSource(config.classpath));
  }
  if (config.classpathFile) {
    sources.push(new ClasspathFileSource(config.classpathFile));
  }
  if (sources.length === 0) {
    // Without any declared dependencies, only the compiled tests are on the path
    sources.push(new StaticClasspathSource([config.testOutputDirectory]));
  }
  return sources.length === 1 ? sources[0] : new CompositeClasspathSource(sources);
}

/**
 * The test-phase goal: resolve the test classpath, assemble the java command
 * line and run the JUnit Platform Console Launcher in a separate process.
 */
export class JUnitPlatformLauncher {
  private logger: Logger;
  private source: ClasspathSource;

  constructor(private readonly config: JUnitLaunchConfig, logger: Logger, source?: ClasspathSource) {
    this.logger = logger.child('junit-platform-launcher');
    this.source = source ?? createClasspathSource(config);
  }

  async execute(): Promise<GoalOutcome> {
    this.logger.lifecycle('Executing JUnit Platform launcher');

    if (this.config.skip) {
      this.logger.info('JUnit Platform Plugin execution skipped.');
      return { kind: 'skipped', reason: 'JUnit Platform Plugin execution skipped.' };
    }

    if (!(await exists(this.config.testOutputDirectory))) {
      this.logger.info('Test output directory does not exist.', { path: this.config.testOutputDirectory });
      return { kind: 'skipped', reason: 'Test output directory does not exist.' };
    }

    const resolver = new PathResolver(this.logger);
    const resolvedPath = await resolver.resolveFrom(this.source);
    const context: LaunchContext = {
      logger: this.logger,
      versions: VersionLookup.fromClasspath(splitPath(resolvedPath), this.config.versions)
    };
    this.logVersions(context);

    const launchConfiguration = await this.createLaunchConfiguration(context);
    const commandLine = new ArgumentBuilder(context).build(launchConfiguration, resolvedPath);

    const launcher = new ProcessLauncher(context, {
      terminationGraceSeconds: launchConfiguration.terminationGraceSeconds
    });
    const result = await launcher.launch(
      commandLine,
      launchConfiguration.buildDirectory,
      launchConfiguration.timeoutSeconds
    );

    const resultCode = toResultCode(result);
    const status = interpretResultCode(resultCode);
    this.logger.info('Console launcher returned', { resultCode, status });
    return { kind: 'launched', commandLine, result, resultCode, status };
  }

  private async createLaunchConfiguration(context: LaunchContext): Promise<LaunchConfiguration> {
    const testModuleName = this.config.testModuleName
      ?? await new TestModuleDetector(context).detect(this.config.testSourceDirectory);

    return {
      buildDirectory: this.config.buildDirectory,
      timeoutSeconds: this.config.timeoutSeconds,
      reportsPath: this.config.reportsDirectory,
      strict: this.config.strict,
      tags: this.config.tags,
      parameters: this.config.parameters,
      testModuleName,
      javaExecutable: await locateJavaExecutable({
        explicit: this.config.javaExecutable,
        javaHome: this.config.javaHome
      }),
      terminationGraceSeconds: this.config.terminationGraceSeconds
    };
  }

  private logVersions(context: LaunchContext): void {
    const platform = context.versions.version(JUNIT_PLATFORM_VERSION) ?? 'unknown version';
    this.logger.info(`Launching JUnit Platform ${platform}...`);
    for (const [key, value] of context.versions.entries()) {
      this.logger.debug(`  ${key} = ${value}`);
    }
  }
}

/**
 * Process exit status for a goal outcome. Launcher-level failures (negative
 * result codes) cannot be expressed as exit statuses and become 1.
 */
export function exitStatusOf(outcome: GoalOutcome): number {
  if (outcome.kind === 'skipped') return 0;
  return outcome.resultCode >= 0 ? outcome.resultCode : 1;
}

function splitPath(resolvedPath: string): string[] {
  return resolvedPath.length === 0 ? [] : resolvedPath.split(path.delimiter);
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
