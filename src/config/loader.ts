import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import yaml from 'js-yaml';
import { HotdropConfigSchema, type HotdropConfig } from './schema.js';
import { ConfigurationError } from '../engine/errors.js';

export function parseConfig(raw: string): HotdropConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (e) {
    throw new ConfigurationError(`Config file is not valid YAML: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!parsed || typeof parsed !== 'object') {
    throw new ConfigurationError('Config file is empty or invalid');
  }
  const result = HotdropConfigSchema.safeParse(parsed);
  if (!result.success) {
    const msg = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ConfigurationError(`Invalid hotdrop config: ${msg}`);
  }
  return result.data;
}

export function loadConfig(configPath: string): HotdropConfig {
  const resolved = resolve(process.cwd(), configPath);
  if (!existsSync(resolved)) {
    throw new ConfigurationError(`Config file not found: ${resolved}`);
  }
  return parseConfig(readFileSync(resolved, 'utf-8'));
}
