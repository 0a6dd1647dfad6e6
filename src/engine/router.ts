/**
 * Pattern Router — maps a file to the environment that owns it.
 *
 * Matches the file's base name (case-insensitive) against each
 * environment's globs in declaration order; the first hit wins.
 */

import path from 'node:path';
import picomatch from 'picomatch';
import type { Environment, EnvironmentRegistry } from './registry.js';

export const UNMATCHED = Symbol('unmatched');
export type RouteResult = Environment | typeof UNMATCHED;

export class PatternRouter {
  private readonly matchers: ReadonlyArray<{ env: Environment; isMatch: picomatch.Matcher }>;

  constructor(private readonly registry: EnvironmentRegistry) {
    this.matchers = registry.list().map((env) => ({
      env,
      isMatch: picomatch([...env.patterns], { nocase: true }),
    }));
  }

  /**
   * When `hotFolder` is an environment's own folder only that environment
   * is considered.
   */
  route(filePath: string, hotFolder?: string): RouteResult {
    const base = path.basename(filePath);
    const owner = hotFolder ? this.registry.get(path.basename(hotFolder)) : undefined;
    for (const { env, isMatch } of this.matchers) {
      if (owner && env !== owner) continue;
      if (isMatch(base)) return env;
    }
    return UNMATCHED;
  }
}
