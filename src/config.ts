/**
 * Configuration loading for junit-launch
 *
 * Priority (lowest first):
 * 1. Default values
 * 2. Config file (junit-launch.json in the working directory, or --config-file)
 * 3. Environment variables
 * 4. Command line options
 */

import { promises as fs } from 'fs';
import path from 'path';
import { ErrorCode, JUnitLaunchError, describeError } from './utils/errors';

export const CONFIG_FILE_NAME = 'junit-launch.json';

export interface JUnitLaunchConfig {
  skip: boolean;
  buildDirectory: string;
  testOutputDirectory: string;
  testSourceDirectory: string;
  timeoutSeconds: number;
  terminationGraceSeconds: number;
  reportsDirectory?: string;
  strict: boolean;
  tags: string[];
  parameters: Record<string, string>;
  testModuleName?: string;
  classpath: string[];
  classpathFile?: string;
  javaExecutable?: string;
  javaHome?: string;
  versions: Record<string, string>;
  debug: boolean;
}

type ConfigLayer = Partial<JUnitLaunchConfig>;

/**
 * Options as commander hands them over; numbers are still strings here
 */
export interface CliOptions {
  buildDir?: string;
  testOutputDir?: string;
  testSourceDir?: string;
  timeout?: string;
  grace?: string;
  reportsDir?: string;
  strict?: boolean;
  tag?: string[];
  config?: string[];
  module?: string;
  classpath?: string[];
  classpathFile?: string;
  java?: string;
  skip?: boolean;
  configFile?: string;
  debug?: boolean;
}

export interface LoadConfigOptions {
  cwd?: string;
  cli?: CliOptions;
  env?: NodeJS.ProcessEnv;
}

const DEFAULT_CONFIG: Omit<JUnitLaunchConfig, 'testOutputDirectory'> = {
  skip: false,
  buildDirectory: 'target',
  testSourceDirectory: path.join('src', 'test', 'java'),
  timeoutSeconds: 300,
  terminationGraceSeconds: 5,
  strict: false,
  tags: [],
  parameters: {},
  classpath: [],
  versions: {},
  debug: false
};

const STRING_KEYS = [
  'buildDirectory', 'testOutputDirectory', 'testSourceDirectory', 'reportsDirectory',
  'testModuleName', 'classpathFile', 'javaExecutable', 'javaHome'
] as const;
const NUMBER_KEYS = ['timeoutSeconds', 'terminationGraceSeconds'] as const;
const BOOLEAN_KEYS = ['skip', 'strict', 'debug'] as const;
const STRING_ARRAY_KEYS = ['tags', 'classpath'] as const;
const STRING_MAP_KEYS = ['parameters', 'versions'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isStringMap(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every(item => typeof item === 'string');
}

/**
 * Check the shape of a parsed config file and keep the known keys
 */
export function parseConfigFile(content: unknown, errors: string[]): ConfigLayer {
  if (!isRecord(content)) {
    errors.push('Config file must contain a JSON object');
    return {};
  }

  const layer: ConfigLayer = {};
  for (const key of STRING_KEYS) {
    const value = content[key];
    if (value === undefined) continue;
    if (typeof value === 'string') layer[key] = value;
    else errors.push(`"${key}" must be a string`);
  }
  for (const key of NUMBER_KEYS) {
    const value = content[key];
    if (value === undefined) continue;
    if (typeof value === 'number') layer[key] = value;
    else errors.push(`"${key}" must be a number`);
  }
  for (const key of BOOLEAN_KEYS) {
    const value = content[key];
    if (value === undefined) continue;
    if (typeof value === 'boolean') layer[key] = value;
    else errors.push(`"${key}" must be a boolean`);
  }
  for (const key of STRING_ARRAY_KEYS) {
    const value = content[key];
    if (value === undefined) continue;
    if (isStringArray(value)) layer[key] = value;
    else errors.push(`"${key}" must be an array of strings`);
  }
  for (const key of STRING_MAP_KEYS) {
    const value = content[key];
    if (value === undefined) continue;
    if (isStringMap(value)) layer[key] = value;
    else errors.push(`"${key}" must map strings to strings`);
  }
  return layer;
}

async function loadConfigFile(cwd: string, explicit: string | undefined, errors: string[]): Promise<ConfigLayer> {
  const file = path.resolve(cwd, explicit ?? CONFIG_FILE_NAME);
  let content: string;
  try {
    content = await fs.readFile(file, 'utf8');
  } catch (error) {
    if (explicit) {
      errors.push(`Cannot read config file ${file}: ${describeError(error)}`);
    }
    // The default config file is optional
    return {};
  }

  try {
    return parseConfigFile(JSON.parse(content), errors);
  } catch (error) {
    errors.push(`Invalid JSON in config file ${file}: ${describeError(error)}`);
    return {};
  }
}

function parseInteger(raw: string | undefined, name: string, errors: string[]): number | undefined {
  if (raw === undefined) return undefined;
  if (!/^-?\d+$/.test(raw.trim())) {
    errors.push(`${name} must be an integer, got "${raw}"`);
    return undefined;
  }
  return Number.parseInt(raw, 10);
}

function loadEnvConfig(env: NodeJS.ProcessEnv, errors: string[]): ConfigLayer {
  const layer: ConfigLayer = {};
  const timeout = parseInteger(env.JUNIT_LAUNCH_TIMEOUT, 'JUNIT_LAUNCH_TIMEOUT', errors);
  if (timeout !== undefined) layer.timeoutSeconds = timeout;
  if (env.JAVA_HOME) layer.javaHome = env.JAVA_HOME;
  if (env.JUNIT_LAUNCH_DEBUG === '1') layer.debug = true;
  return layer;
}

/**
 * Split `key=value` pairs at the first equals sign
 */
export function parseParameters(pairs: readonly string[], errors: string[]): Record<string, string> {
  const parameters: Record<string, string> = {};
  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index === -1) {
      errors.push(`Configuration parameter must look like key=value, got "${pair}"`);
      continue;
    }
    parameters[pair.slice(0, index)] = pair.slice(index + 1);
  }
  return parameters;
}

function loadCliConfig(cli: CliOptions, errors: string[]): ConfigLayer {
  return {
    buildDirectory: cli.buildDir,
    testOutputDirectory: cli.testOutputDir,
    testSourceDirectory: cli.testSourceDir,
    timeoutSeconds: parseInteger(cli.timeout, '--timeout', errors),
    terminationGraceSeconds: parseInteger(cli.grace, '--grace', errors),
    reportsDirectory: cli.reportsDir,
    strict: cli.strict,
    tags: cli.tag,
    parameters: cli.config ? parseParameters(cli.config, errors) : undefined,
    testModuleName: cli.module,
    classpath: cli.classpath,
    classpathFile: cli.classpathFile,
    javaExecutable: cli.java,
    skip: cli.skip,
    debug: cli.debug
  };
}

const ALL_KEYS = [...STRING_KEYS, ...NUMBER_KEYS, ...BOOLEAN_KEYS, ...STRING_ARRAY_KEYS, ...STRING_MAP_KEYS];

function assignDefined<K extends keyof JUnitLaunchConfig>(target: ConfigLayer, source: ConfigLayer, key: K): void {
  const value = source[key];
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Later layers win; undefined values never override
 */
function mergeLayers(...layers: ConfigLayer[]): ConfigLayer {
  const result: ConfigLayer = {};
  for (const layer of layers) {
    for (const key of ALL_KEYS) {
      assignDefined(result, layer, key);
    }
  }
  return result;
}

/**
 * Validate configuration
 */
export function validateConfig(config: JUnitLaunchConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.timeoutSeconds) || config.timeoutSeconds <= 0) {
    errors.push(`Timeout must be a positive number of seconds, got ${config.timeoutSeconds}`);
  }
  if (!Number.isInteger(config.terminationGraceSeconds) || config.terminationGraceSeconds < 0) {
    errors.push(`Termination grace period must be zero or more seconds, got ${config.terminationGraceSeconds}`);
  }
  if (Object.keys(config.parameters).some(key => key.length === 0)) {
    errors.push('Configuration parameter keys must not be empty');
  }
  if (config.testModuleName !== undefined && config.testModuleName.trim().length === 0) {
    errors.push('Test module name must not be empty');
  }
  if (config.tags.some(tag => tag.trim().length === 0)) {
    errors.push('Tags must not be empty');
  }

  return errors;
}

function isPathLike(value: string): boolean {
  return value.includes('/') || value.includes(path.sep);
}

/**
 * Load, merge and validate all configuration sources
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<JUnitLaunchConfig> {
  const cwd = options.cwd ?? process.cwd();
  const cli = options.cli ?? {};
  const errors: string[] = [];

  const fileConfig = await loadConfigFile(cwd, cli.configFile, errors);
  const envConfig = loadEnvConfig(options.env ?? process.env, errors);
  const cliConfig = loadCliConfig(cli, errors);

  const merged = { ...DEFAULT_CONFIG, ...mergeLayers(fileConfig, envConfig, cliConfig) };
  const buildDirectory = path.resolve(cwd, merged.buildDirectory);
  const config: JUnitLaunchConfig = {
    ...merged,
    buildDirectory,
    testOutputDirectory: merged.testOutputDirectory
      ? path.resolve(cwd, merged.testOutputDirectory)
      : path.join(buildDirectory, 'test-classes'),
    testSourceDirectory: path.resolve(cwd, merged.testSourceDirectory),
    reportsDirectory: merged.reportsDirectory ? path.resolve(cwd, merged.reportsDirectory) : undefined,
    classpath: merged.classpath.map(element => path.resolve(cwd, element)),
    classpathFile: merged.classpathFile ? path.resolve(cwd, merged.classpathFile) : undefined,
    javaExecutable: merged.javaExecutable && isPathLike(merged.javaExecutable)
      ? path.resolve(cwd, merged.javaExecutable)
      : merged.javaExecutable
  };

  errors.push(...validateConfig(config));
  if (errors.length > 0) {
    throw new JUnitLaunchError(ErrorCode.INVALID_CONFIGURATION,
      `Invalid configuration:\n${errors.map(error => `  - ${error}`).join('\n')}`, { errors });
  }
  return config;
}
