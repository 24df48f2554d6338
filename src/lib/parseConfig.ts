/**
 * Configuration parser
 * Order: default < env < cli
 */

export type JsonObject = { [key: string]: unknown };

export type ConfigValue = string | string[] | boolean | number | JsonObject;

export type RawConfig = Record<string, ConfigValue>;

export type ConfigType = 'string' | 'number' | 'boolean' | 'array' | 'json';

export type ConfigEntry = [
  string, // arg
  string, // env value
  ConfigValue, // default value
  ConfigType?, // type
  string?, // for array type, the plural form of cliArg (e.g. --project / --projects)
];

export type ConfigTemplate = ConfigEntry[];

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseJson = (raw: string, source: string): JsonObject => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Error parsing JSON from ${source}: ${String(e)}`);
  }
  if (!isJsonObject(parsed)) {
    throw new Error(`Error parsing JSON from ${source}: not an object`);
  }
  return parsed;
};

const parseNumber = (raw: string, source: string): number => {
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Error in ${source}: "${raw}" is not a number`);
  }
  return value;
};

const splitList = (raw: string): string[] => {
  const sep = raw.indexOf(';') > 0 ? ';' : ',';
  return raw
    .split(new RegExp(`[${sep}\\s]+`))
    .map(v => v.trim())
    .filter(v => v.length > 0);
};

export class ConfigParser {
  private config: ConfigTemplate;

  constructor(config: ConfigTemplate) {
    this.config = config;
  }

  parse(argv: string[] = process.argv): RawConfig {
    const result: RawConfig = {};
    const cliArgs = this.parseCliArgs(argv);
    for (const [cliArg, envVar, defaultValue, type, plural] of this.config) {
      const key = this.getKeyFromCliArg(cliArg);
      let value: ConfigValue = defaultValue;

      // Override with env value if exists
      const envValue = process.env[envVar];
      if (envValue !== undefined) {
        value = this.fromString(envValue, type, `environment variable ${envVar}`);
      }

      // Override with CLI arg if exists
      const cliValues = cliArgs.get(cliArg);
      if (cliValues !== undefined) {
        if (type === 'boolean') {
          value = true;
        } else if (type === 'array') {
          value = [...this.asList(value), ...cliValues];
        } else {
          value = this.fromString(
            cliValues[cliValues.length - 1],
            type,
            `command line argument ${cliArg}`
          );
        }
        cliArgs.delete(cliArg);
      }
      if (type === 'array' && plural) {
        const pluralValues = cliArgs.get(plural);
        if (pluralValues !== undefined) {
          value = [
            ...this.asList(value),
            ...pluralValues.flatMap(v =>
              v.split(/[,\s]+/).filter(s => s.length > 0)
            ),
          ];
          cliArgs.delete(plural);
        }
      }

      result[key] = value;
    }

    // Store additional arguments
    cliArgs.forEach((v, k) => {
      const key = this.getKeyFromCliArg(k);
      if (key in result) {
        throw new Error(`Error in command line: ${k} redefined`);
      }
      result[key] = v[v.length - 1];
    });

    return result;
  }

  private asList(value: ConfigValue): string[] {
    return Array.isArray(value) ? value : [];
  }

  private fromString(
    raw: string,
    type: ConfigType | undefined,
    source: string
  ): ConfigValue {
    switch (type) {
      case 'boolean':
        return raw.toLowerCase() === 'true';
      case 'number':
        return parseNumber(raw, source);
      case 'array':
        return splitList(raw);
      case 'json':
        return parseJson(raw, source);
      default:
        return raw;
    }
  }

  // Command-line parser: every option keeps the list of values it was given
  private parseCliArgs(argv: string[]): Map<string, string[]> {
    const args = new Map<string, string[]>();

    for (let i = 2; i < argv.length; i++) {
      const arg = argv[i];

      if (arg.startsWith('-')) {
        const configEntry = this.config.find(entry => entry[0] === arg);
        const values = args.get(arg) ?? [];
        if (configEntry && configEntry[3] === 'boolean') {
          values.push('true');
        } else {
          values.push(argv[i + 1] ?? '');
          i++; // Skip the value we just consumed
        }
        args.set(arg, values);
      }
    }

    return args;
  }

  private getKeyFromCliArg(cliArg: string): string {
    return cliArg.replace(/^-+/, '').replace(/-/g, '_');
  }
}

export function parseConfig(
  config: ConfigTemplate,
  argv: string[] = process.argv
): RawConfig {
  const parser = new ConfigParser(config);
  return parser.parse(argv);
}
