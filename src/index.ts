export { ArgumentBuilder, executionModeOf, createConfigArgument, CONSOLE_LAUNCHER_CLASS, CONSOLE_LAUNCHER_MODULE } from './command/ArgumentBuilder';
export { StaticClasspathSource, ClasspathFileSource, CompositeClasspathSource } from './classpath/ClasspathSource';
export type { ClasspathSource } from './classpath/ClasspathSource';
export { PathResolver } from './classpath/PathResolver';
export { ProcessLauncher, OUT_FILE_NAME, ERR_FILE_NAME } from './process/ProcessLauncher';
export type { ProcessLauncherOptions } from './process/ProcessLauncher';
export { locateJavaExecutable } from './process/JavaExecutable';
export { JUnitPlatformLauncher, createClasspathSource, exitStatusOf } from './JUnitPlatformLauncher';
export type { GoalOutcome } from './JUnitPlatformLauncher';
export { loadConfig, validateConfig } from './config';
export type { JUnitLaunchConfig, CliOptions } from './config';
export { TestModuleDetector, parseModuleName } from './world/TestModuleDetector';
export { VersionLookup, JUNIT_PLATFORM_VERSION, JUNIT_JUPITER_VERSION } from './world/VersionLookup';
export * from './types/launch';
export { JUnitLaunchError, ResolutionError, ErrorCode } from './utils/errors';
export { Logger } from './utils/logger';
