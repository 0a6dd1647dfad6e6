/**
 * Environment Registry — ordered, frozen environment definitions.
 *
 * Loaded once from configuration and shared read-only by the router,
 * renderer and executor. Each environment's mode (single / batch) is
 * derived here from the placeholders its chain references.
 */

import type { EnvironmentConfig } from '../config/schema.js';
import type { Logger } from '../utils/logger.js';

export type Placeholder = 'in_file' | 'in_files' | 'out_file';
export const PLACEHOLDERS: readonly Placeholder[] = ['in_file', 'in_files', 'out_file'];

export type EnvironmentMode = 'single' | 'batch';

export interface Environment {
  readonly name: string;
  readonly patterns: readonly string[];
  readonly command: readonly string[];
  readonly mode: EnvironmentMode;
  /** Placeholders referenced anywhere in the chain. */
  readonly variables: ReadonlySet<Placeholder>;
}

export function referencedPlaceholders(template: string): Set<Placeholder> {
  const found = new Set<Placeholder>();
  for (const name of PLACEHOLDERS) {
    if (template.includes(`{${name}}`)) found.add(name);
  }
  return found;
}

/** A chain referencing `in_files` anywhere is batch mode. */
export function detectMode(command: readonly string[]): EnvironmentMode {
  return command.some((t) => referencedPlaceholders(t).has('in_files')) ? 'batch' : 'single';
}

export class EnvironmentRegistry {
  private readonly environments: readonly Environment[];
  private readonly byName: ReadonlyMap<string, Environment>;

  constructor(configs: readonly EnvironmentConfig[], logger?: Logger) {
    const list: Environment[] = [];
    const byName = new Map<string, Environment>();
    for (const cfg of configs) {
      if (byName.has(cfg.name)) {
        throw new Error(`environment '${cfg.name}' already registered`);
      }
      const variables = new Set<Placeholder>();
      for (const template of cfg.trigger) {
        for (const v of referencedPlaceholders(template)) variables.add(v);
      }
      if (variables.has('in_file') && variables.has('in_files')) {
        logger?.warn(`${cfg.name}: chain mixes {in_file} and {in_files}; treating as batch, {in_file} cannot be rendered`);
      }
      const env: Environment = Object.freeze({
        name: cfg.name,
        patterns: Object.freeze([...cfg.patterns]),
        command: Object.freeze([...cfg.trigger]),
        mode: detectMode(cfg.trigger),
        variables,
      });
      list.push(env);
      byName.set(env.name, env);
    }
    this.environments = Object.freeze(list);
    this.byName = byName;
  }

  get(name: string): Environment | undefined {
    return this.byName.get(name);
  }

  list(): readonly Environment[] {
    return this.environments;
  }

  get size(): number {
    return this.environments.length;
  }
}
