import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import {
  ConfigError,
  ConfigSchema,
  expandPath,
  type CloneConfig,
  type Config,
  type InspectConfig,
  type ScanConfig,
  type UploadConfig,
} from '@pplaces/shared';

/** Partial configuration supplied by command-line flags. */
export type ConfigOverrides = {
  scan?: Partial<ScanConfig>;
  inspect?: Partial<InspectConfig>;
  clone?: Partial<CloneConfig>;
  upload?: Partial<UploadConfig>;
};

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: ConfigOverrides;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const ENV_ROOT = 'PPLACES_ROOT';
export const ENV_DAYS_TO_SHOW = 'PPLACES_DAYS_TO_SHOW';

export class ConfigLoader {
  /**
   * Path of the per-user config file, following the XDG base directory layout.
   */
  static userConfigPath(env: NodeJS.ProcessEnv, homeDir: string): string {
    const xdg = env.XDG_CONFIG_HOME;
    const base = xdg && path.isAbsolute(xdg) ? xdg : path.join(homeDir, '.config');
    return path.join(base, 'pplaces', 'config.yaml');
  }

  static loadYaml(filePath: string): PlainObject {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  /**
   * Deep-merges `source` into a copy of `target`. Objects merge, arrays and
   * primitives replace, undefined values are skipped.
   */
  static mergeConfigs(target: PlainObject, source: PlainObject): PlainObject {
    const output: PlainObject = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      output[key] =
        isPlainObject(sourceValue) && isPlainObject(targetValue)
          ? this.mergeConfigs(targetValue, sourceValue)
          : sourceValue;
    }
    return output;
  }

  /**
   * Maps recognised environment variables onto config keys.
   */
  static fromEnv(env: NodeJS.ProcessEnv): PlainObject {
    const scan: PlainObject = {};
    const root = env[ENV_ROOT];
    if (root) {
      scan.root = root;
    }
    const days = env[ENV_DAYS_TO_SHOW];
    if (days !== undefined && days !== '') {
      if (!/^\d+$/.test(days)) {
        throw new ConfigError(`${ENV_DAYS_TO_SHOW} must be a non-negative integer, got "${days}"`);
      }
      scan.daysToShow = Number(days);
    }
    return Object.keys(scan).length > 0 ? { scan } : {};
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;
    const homeDir = options.homeDir || os.homedir();

    // 1. User config: $XDG_CONFIG_HOME/pplaces/config.yaml
    const userConfig = this.loadYaml(this.userConfigPath(env, homeDir));

    // 2. Explicit --config file (if provided)
    let explicitConfig: PlainObject = {};
    if (options.configPath) {
      const configPath = expandPath(options.configPath, cwd, homeDir);
      if (!fs.existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${configPath}`);
      }
      explicitConfig = this.loadYaml(configPath);
    }

    // 3. Environment, 4. CLI flags
    const envConfig = this.fromEnv(env);
    const flagConfig: PlainObject = options.flags ?? {};

    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, envConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const config = result.data;
    if (config.scan.root) {
      config.scan.root = expandPath(config.scan.root, cwd, homeDir);
    }
    if (config.clone.searchRoot) {
      config.clone.searchRoot = expandPath(config.clone.searchRoot, cwd, homeDir);
    }
    return config;
  }
}
