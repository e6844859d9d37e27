import type { CommandLine, ExecutionMode, LaunchConfiguration, LaunchContext } from '../types/launch';
import type { Logger } from '../utils/logger';

export const CONSOLE_LAUNCHER_CLASS = 'org.junit.platform.console.ConsoleLauncher';
export const CONSOLE_LAUNCHER_MODULE = 'org.junit.platform.console';

export function executionModeOf(config: LaunchConfiguration, resolvedPath: string): ExecutionMode {
  if (config.testModuleName) {
    return { kind: 'module', path: resolvedPath, moduleName: config.testModuleName };
  }
  return { kind: 'classpath', path: resolvedPath };
}

/**
 * Renders one configuration parameter. Key and value are wrapped in double
 * quotes as they are; embedded quotes are not escaped.
 */
export function createConfigArgument(key: string, value: string): string {
  return `--config="${key}"="${value}"`;
}

/**
 * Builds the java command line that starts the JUnit Platform Console Launcher.
 * See https://junit.org/junit5/docs/current/user-guide/#running-tests-console-launcher-options
 */
export class ArgumentBuilder {
  private logger?: Logger;

  constructor(context?: LaunchContext) {
    this.logger = context?.logger.child('argument-builder');
  }

  build(config: LaunchConfiguration, resolvedPath: string): CommandLine {
    const mode = executionModeOf(config, resolvedPath);
    this.logger?.decision('Execution mode', mode.kind,
      mode.kind === 'module' ? `test module ${mode.moduleName} is present` : 'no test module present');

    const command: string[] = [config.javaExecutable];
    command.push(...this.modeArguments(mode));

    command.push('--disable-ansi-colors');
    if (config.strict) {
      command.push('--fail-if-no-tests');
    }
    command.push(...config.tags);
    for (const [key, value] of Object.entries(config.parameters)) {
      command.push(createConfigArgument(key, value));
    }
    if (config.reportsPath) {
      command.push('--reports-dir', config.reportsPath);
    }

    command.push(...this.selectionArguments(mode));
    return command;
  }

  private modeArguments(mode: ExecutionMode): string[] {
    switch (mode.kind) {
      case 'classpath':
        return ['--class-path', mode.path, CONSOLE_LAUNCHER_CLASS];
      case 'module':
        return [
          '--module-path', mode.path,
          '--add-modules', 'ALL-MODULE-PATH,ALL-DEFAULT',
          '--module', CONSOLE_LAUNCHER_MODULE
        ];
      default:
        return assertNever(mode);
    }
  }

  private selectionArguments(mode: ExecutionMode): string[] {
    switch (mode.kind) {
      case 'classpath':
        return ['--scan-class-path'];
      case 'module':
        return ['--select-module', mode.moduleName];
      default:
        return assertNever(mode);
    }
  }
}

function assertNever(mode: never): never {
  throw new Error(`Unknown execution mode: ${JSON.stringify(mode)}`);
}
