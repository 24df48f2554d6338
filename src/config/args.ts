/**
 * command-line options, corresponding environment variables, default values and types
 * Contains also the typescript declaration of config
 */
import {
  parseConfig,
  type ConfigTemplate,
  type ConfigValue,
  type RawConfig,
} from '../lib/parseConfig';

export const LOG_LEVELS = ['error', 'warn', 'notice', 'info', 'debug'] as const;
export const LOGGERS = ['console', 'file', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LoggerKind = (typeof LOGGERS)[number];

/**
 * Typescript declaration of config
 */
export interface Config {
  log_level: LogLevel;
  logger: LoggerKind;
  log_file: string;
  theme: string;
  default_project: string;
  project: string[];
  max_title_length: number;
  max_description_length: number;
  autoload: boolean;
}

/**
 * Config arguments
 *
 * Format:
 * [ command-line-option, env-variable, default-value, type?, plural? ]
 *
 * type can be one of:
 * - string (default value)
 * - boolean:
 *    * --option is enough
 *    * env variable must be set to "true" to be considered as truthy
 * - number
 * - array: comma (or semicolon) separated in env, repeatable on command line
 * - json: parameter is a string that will be converted into an object during configuration parsing
 */
const configArgs: ConfigTemplate = [
  // Logging
  ['--log-level', 'TODO_LOG_LEVEL', 'notice'],
  ['--logger', 'TODO_LOGGER', 'console'],
  ['--log-file', 'TODO_LOG_FILE', 'todo.log'],

  // Appearance
  ['--theme', 'TODO_THEME', 'dark'],

  // Storage
  ['--default-project', 'TODO_DEFAULT_PROJECT', 'Inbox'],
  ['--project', 'TODO_PROJECTS', [], 'array', '--projects'],
  ['--max-title-length', 'TODO_MAX_TITLE_LENGTH', 100, 'number'],
  ['--max-description-length', 'TODO_MAX_DESCRIPTION_LENGTH', 500, 'number'],
  ['--autoload', 'TODO_AUTOLOAD', false, 'boolean'],
];

export default configArgs;

const oneOf = <T extends string>(
  key: string,
  value: ConfigValue | undefined,
  allowed: readonly T[]
): T => {
  const found = allowed.find(item => item === value);
  if (found === undefined) {
    throw new Error(
      `Invalid value for ${key}: expected one of ${allowed.join(', ')}`
    );
  }
  return found;
};

const str = (key: string, value: ConfigValue | undefined): string => {
  if (typeof value !== 'string') throw new Error(`${key} must be a string`);
  return value;
};

const num = (key: string, value: ConfigValue | undefined): number => {
  if (typeof value !== 'number' || value < 1) {
    throw new Error(`${key} must be a positive number`);
  }
  return value;
};

const list = (key: string, value: ConfigValue | undefined): string[] => {
  if (!Array.isArray(value)) throw new Error(`${key} must be a list`);
  return value;
};

export const toConfig = (raw: RawConfig): Config => ({
  log_level: oneOf('log_level', raw.log_level, LOG_LEVELS),
  logger: oneOf('logger', raw.logger, LOGGERS),
  log_file: str('log_file', raw.log_file),
  theme: str('theme', raw.theme),
  default_project: str('default_project', raw.default_project),
  project: list('project', raw.project),
  max_title_length: num('max_title_length', raw.max_title_length),
  max_description_length: num(
    'max_description_length',
    raw.max_description_length
  ),
  autoload: raw.autoload === true,
});

export const loadConfig = (argv: string[] = process.argv): Config =>
  toConfig(parseConfig(configArgs, argv));
