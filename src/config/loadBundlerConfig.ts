import Ajv, { type JSONSchemaType } from 'ajv';
import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from '../errors';

export const CONFIG_FILE_NAME = 'pyinline.config.json';

/** Shape of `pyinline.config.json`. */
export type BundlerConfigFile = {
  includePaths?: string[];
  python?: string;
  dependencyTimeoutMs?: number;
  exclude?: string[];
};

export type BundlerConfig = {
  basedir: string;
  /** Path of the file the values came from, when one was read. */
  configPath?: string;
  /** Absolute extra search roots, probed after basedir. */
  includePaths: string[];
  python: string;
  dependencyTimeoutMs?: number;
  exclude: string[];
};

const configSchema: JSONSchemaType<BundlerConfigFile> = {
  type: 'object',
  properties: {
    includePaths: { type: 'array', items: { type: 'string' }, nullable: true },
    python: { type: 'string', minLength: 1, nullable: true },
    dependencyTimeoutMs: { type: 'integer', minimum: 0, nullable: true },
    exclude: { type: 'array', items: { type: 'string' }, nullable: true },
  },
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile(configSchema);

export const DEFAULT_PYTHON = 'python3';

function readConfigFile(configPath: string): BundlerConfigFile {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf8');
  } catch (e: unknown) {
    throw new ConfigError(`Failed to read config: ${configPath}`, { cause: e });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Failed to parse config: ${configPath}\n${msg}`, { cause: e });
  }

  if (!validateConfig(parsed)) {
    throw new ConfigError(`Invalid config: ${configPath}\n${ajv.errorsText(validateConfig.errors, { separator: '\n' })}`);
  }
  return parsed;
}

/**
 * Loads `pyinline.config.json` from `basedir` (or an explicit `configPath`) and resolves its
 * include paths against the config file's directory. A missing default file yields defaults;
 * a missing explicit file is an error.
 */
export function loadBundlerConfig(basedir: string, configPath?: string): BundlerConfig {
  const root = path.resolve(basedir);
  const resolvedConfigPath = configPath
    ? path.isAbsolute(configPath)
      ? configPath
      : path.resolve(root, configPath)
    : path.join(root, CONFIG_FILE_NAME);

  if (!configPath && !fs.existsSync(resolvedConfigPath)) {
    return { basedir: root, includePaths: [], python: DEFAULT_PYTHON, exclude: [] };
  }

  const file = readConfigFile(resolvedConfigPath);
  const configDir = path.dirname(resolvedConfigPath);
  return {
    basedir: root,
    configPath: resolvedConfigPath,
    includePaths: (file.includePaths ?? []).map((p) => path.resolve(configDir, p)),
    python: file.python ?? DEFAULT_PYTHON,
    dependencyTimeoutMs: file.dependencyTimeoutMs,
    exclude: file.exclude ?? [],
  };
}
