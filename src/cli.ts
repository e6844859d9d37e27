#!/usr/bin/env node

import { Command } from 'commander';
import path from 'path';
import { loadConfig } from './config';
import type { CliOptions, JUnitLaunchConfig } from './config';
import { JUnitPlatformLauncher, exitStatusOf } from './JUnitPlatformLauncher';
import type { GoalOutcome } from './JUnitPlatformLauncher';
import { ERR_FILE_NAME, OUT_FILE_NAME } from './process/ProcessLauncher';
import { JUnitLaunchError, describeError } from './utils/errors';
import { Logger } from './utils/logger';

class CLIOrchestrator {
  async run(options: CliOptions): Promise<number> {
    let config: JUnitLaunchConfig;
    try {
      config = await loadConfig({ cli: options });
    } catch (error) {
      console.error(describeError(error));
      return 1;
    }

    const logger = new Logger('cli', { debug: config.debug });
    logger.lifecycle('Starting junit-launch', { buildDirectory: config.buildDirectory });

    try {
      const outcome = await new JUnitPlatformLauncher(config, logger).execute();
      this.printOutcome(outcome, config);
      return exitStatusOf(outcome);
    } catch (error) {
      logger.error('Launch failed', error);
      const code = error instanceof JUnitLaunchError ? ` [${error.code}]` : '';
      console.error(`Launch failed${code}: ${describeError(error)}`);
      return 1;
    }
  }

  private printOutcome(outcome: GoalOutcome, config: JUnitLaunchConfig): void {
    if (outcome.kind === 'skipped') {
      console.log(outcome.reason);
      return;
    }

    console.log('Console launcher command line:');
    outcome.commandLine.forEach(token => console.log(`  ${token}`));
    console.log();
    console.log(`Output: ${path.join(config.buildDirectory, OUT_FILE_NAME)}`);
    console.log(`Errors: ${path.join(config.buildDirectory, ERR_FILE_NAME)}`);
    console.log();

    switch (outcome.result.kind) {
      case 'exit':
        console.log(`Console launcher exited with code ${outcome.result.exitCode} (${outcome.status})`);
        break;
      case 'timed-out':
        console.error(`Global timeout reached: ${config.timeoutSeconds} second(s)`);
        if (!outcome.result.terminated) {
          console.error('The console launcher could not be terminated and may still be running.');
        }
        break;
      case 'process-error':
        console.error(`Executing process failed: ${outcome.result.error.message}`);
        break;
    }
  }
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

// Main entry point
const program = new Command();

program
  .name('junit-launch')
  .description('Run the JUnit Platform Console Launcher in a separate java process')
  .version('0.1.0');

program
  .command('run')
  .description('Resolve the test classpath and launch the console launcher')
  .option('--build-dir <dir>', 'build output directory (default: target)')
  .option('--test-output-dir <dir>', 'compiled test classes (default: <build-dir>/test-classes)')
  .option('--test-source-dir <dir>', 'test sources holding module-info.java (default: src/test/java)')
  .option('--timeout <seconds>', 'global timeout in seconds (default: 300)')
  .option('--grace <seconds>', 'seconds between SIGTERM and SIGKILL after a timeout (default: 5)')
  .option('--reports-dir <dir>', 'directory for XML reports')
  .option('--strict', 'fail when no tests are found')
  .option('--tag <expression>', 'tag or tag expression, repeatable', collect)
  .option('--config <key=value>', 'configuration parameter, repeatable', collect)
  .option('--module <name>', 'test module name; switches to module path mode')
  .option('--classpath <entry>', 'test classpath element, repeatable', collect)
  .option('--classpath-file <file>', 'file listing the test classpath')
  .option('--java <path>', 'java executable')
  .option('--skip', 'skip execution')
  .option('--config-file <file>', 'JSON configuration file (default: junit-launch.json)')
  .option('--debug', 'write debug lines to .junit-launch/debug.log')
  .action(async (options: CliOptions) => {
    const orchestrator = new CLIOrchestrator();
    const exitCode = await orchestrator.run(options);
    process.exit(exitCode);
  });

// Parse arguments
program.parse(process.argv);

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
}
