/**
 * Optional per-project defaults, kept in snapdbg.config.json in the working
 * directory and written by `snapdbg init`. Command line options win over it.
 */

import * as fs from 'fs';
import * as path from 'path';
import { isOutputFormat, type OutputFormat } from './format';

export const CONFIG_FILE_NAME = 'snapdbg.config.json';

export interface SnapdbgConfig {
  maxLevel?: number;
  format?: OutputFormat;
  userEmail?: string;
}

export function getConfigPath(dir: string = process.cwd()): string {
  return path.join(dir, CONFIG_FILE_NAME);
}

/**
 * Keeps only the recognised, well-typed settings of a parsed config file.
 */
export function parseConfig(raw: unknown): SnapdbgConfig {
  const config: SnapdbgConfig = {};

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return config;
  }

  const maxLevel = 'maxLevel' in raw ? raw.maxLevel : undefined;
  const format = 'format' in raw ? raw.format : undefined;
  const userEmail = 'userEmail' in raw ? raw.userEmail : undefined;

  if (typeof maxLevel === 'number' && Number.isInteger(maxLevel) && maxLevel >= 0) {
    config.maxLevel = maxLevel;
  }
  if (typeof format === 'string' && isOutputFormat(format)) {
    config.format = format;
  }
  if (typeof userEmail === 'string' && userEmail) {
    config.userEmail = userEmail;
  }

  return config;
}

/**
 * Loads the config file if there is one. A missing or unreadable file gives
 * an empty config.
 */
export function loadConfig(configPath: string = getConfigPath()): SnapdbgConfig {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  try {
    return parseConfig(JSON.parse(fs.readFileSync(configPath, 'utf-8')));
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.warn(`Warning: Ignoring ${configPath}: ${errorMessage}`);
    return {};
  }
}

export function saveConfig(config: SnapdbgConfig, configPath: string = getConfigPath()): void {
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n');
}
