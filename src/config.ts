import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import type { LeftoverPolicy } from './parser/index';

export const CONFIG_FILE = 'srk.config.json';

export interface SrkConfig {
  color: boolean;
  leftover: LeftoverPolicy;
  trace: boolean;
  appendNewline: boolean;
}

export const defaultConfig: SrkConfig = {
  color: true,
  leftover: 'permissive',
  trace: false,
  appendNewline: true,
};

export interface ConfigValidation {
  config: SrkConfig;
  errors: string[];
}

/**
 * Check a parsed config file against {@link SrkConfig}. Valid keys override
 * the defaults; each invalid one adds a message and keeps its default.
 */
export function validateConfig(raw: unknown): ConfigValidation {
  const errors: string[] = [];
  const config: SrkConfig = { ...defaultConfig };

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { config, errors: [`${CONFIG_FILE} must contain a JSON object`] };
  }
  const entries = new Map<string, unknown>(Object.entries(raw));

  const color = entries.get('color');
  if (color !== undefined) {
    if (typeof color === 'boolean') config.color = color;
    else errors.push('color must be a boolean');
  }
  const leftover = entries.get('leftover');
  if (leftover !== undefined) {
    if (leftover === 'permissive' || leftover === 'strict') config.leftover = leftover;
    else errors.push('leftover must be "permissive" or "strict"');
  }
  const trace = entries.get('trace');
  if (trace !== undefined) {
    if (typeof trace === 'boolean') config.trace = trace;
    else errors.push('trace must be a boolean');
  }
  const appendNewline = entries.get('appendNewline');
  if (appendNewline !== undefined) {
    if (typeof appendNewline === 'boolean') config.appendNewline = appendNewline;
    else errors.push('appendNewline must be a boolean');
  }

  for (const key of entries.keys()) {
    if (!Object.prototype.hasOwnProperty.call(defaultConfig, key)) {
      errors.push(`Unknown option: ${key}`);
    }
  }

  return { config, errors };
}

// Defaults when there is no config file in `cwd`
export function loadConfig(cwd: string = process.cwd()): ConfigValidation {
  const configPath = path.join(cwd, CONFIG_FILE);
  if (!existsSync(configPath)) {
    return { config: { ...defaultConfig }, errors: [] };
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { config: { ...defaultConfig }, errors: [`Could not read ${CONFIG_FILE}: ${message}`] };
  }
  return validateConfig(raw);
}
