// packages/core/src/config/loader.ts

import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ProjectConfig } from '../types/config.js';
import { CONFIG_FILENAME, DATA_DIRNAME } from '../utils/constants.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

/** Section-level partial config, as accepted by `loadConfig({ overrides })`. */
export type ConfigOverrides = {
  [K in keyof ProjectConfig]?: Partial<ProjectConfig[K]>;
};

export interface LoadConfigOptions {
  projectDir?: string;
  overrides?: ConfigOverrides;
  skipFile?: boolean;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged. `undefined` in source is ignored.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];
    if (srcVal === undefined) continue;
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }
  return result;
}

/**
 * Load config with precedence: overrides > .threefold.yml > defaults.
 */
export function loadConfig(options?: LoadConfigOptions): ProjectConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: Record<string, unknown> = { ...structuredClone(DEFAULT_CONFIG) };

  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${CONFIG_FILENAME}: ${errorMessage(err)}`);
    }
    if (isPlainObject(fileConfig)) {
      merged = deepMerge(merged, fileConfig);
    }
  }

  if (options?.overrides) {
    merged = deepMerge(merged, { ...options.overrides });
  }

  return validateConfig(merged);
}

/**
 * Write a ProjectConfig to .threefold.yml in the given directory, create the
 * data directory and keep it out of git.
 */
export function writeConfig(config: ProjectConfig, dir: string): string {
  const configPath = join(dir, CONFIG_FILENAME);
  writeFileSync(configPath, stringifyYaml(config, { lineWidth: 100 }), 'utf-8');

  mkdirSync(join(dir, DATA_DIRNAME), { recursive: true });

  const ignoreEntry = `${DATA_DIRNAME}/`;
  const gitignorePath = join(dir, '.gitignore');
  if (existsSync(gitignorePath)) {
    const content = readFileSync(gitignorePath, 'utf-8');
    if (!content.split(/\r?\n/).includes(ignoreEntry)) {
      appendFileSync(gitignorePath, `${content.endsWith('\n') ? '' : '\n'}${ignoreEntry}\n`);
    }
  } else {
    writeFileSync(gitignorePath, `${ignoreEntry}\n`, 'utf-8');
  }
  return configPath;
}

export { deepMerge };
