/**
 * Template Renderer — substitutes {in_file}, {in_files} and {out_file}
 * into every template of an environment's chain.
 *
 * Rendering is pure: the same environment and context always give the
 * same commands. Any other `{...}` token is left as written.
 *
 * A bare placeholder is shell-quoted. Inside a quoted span of the template
 * (`"{in_file}"`, `'{out_file}'`) the path goes in as is, with only the
 * characters that would end or expand that span escaped; `{in_files}`
 * closes and reopens the quote between paths.
 */

import path from 'node:path';
import * as shellQuote from 'shell-quote';
import { ConfigurationError } from './errors.js';
import { PLACEHOLDERS, type Environment, type Placeholder } from './registry.js';

export interface RenderContext {
  in_file?: string;
  in_files?: readonly string[];
  out_file?: string;
}

export interface CommandInvocation {
  /** Serialization key; invocations sharing it never overlap. */
  readonly key: string;
  readonly environment: Environment;
  readonly commands: readonly string[];
  readonly consumedInputs: readonly string[];
  readonly producedOutput?: string;
}

type QuoteSpan = 'none' | 'single' | 'double';

export const BATCH_OUTPUT_PREFIX = 'multiple--';

/**
 * `<outputFolder>/<name of in_file>` for a single file,
 * `<outputFolder>/multiple--<name of first in_files entry>` for a batch.
 */
export function deriveOutFile(outputFolder: string, context: RenderContext): string | undefined {
  const first = context.in_files?.[0];
  if (first !== undefined) {
    return path.resolve(outputFolder, `${BATCH_OUTPUT_PREFIX}${path.basename(first)}`);
  }
  if (context.in_file !== undefined) {
    return path.resolve(outputFolder, path.basename(context.in_file));
  }
  return undefined;
}

export class TemplateRenderer {
  constructor(private readonly outputFolder: string) {}

  render(environment: Environment, context: RenderContext, key: string = environment.name): CommandInvocation {
    const bindings: RenderContext = {
      in_file: context.in_file !== undefined ? path.resolve(context.in_file) : undefined,
      in_files: context.in_files?.map((f) => path.resolve(f)),
      out_file: context.out_file,
    };
    if (bindings.out_file === undefined && environment.variables.has('out_file')) {
      bindings.out_file = deriveOutFile(this.outputFolder, bindings);
    }

    const commands = environment.command.map((template, step) =>
      expandTemplate(template, (name) => this.resolve(environment, step, name, bindings)),
    );

    const consumedInputs = bindings.in_files ?? (bindings.in_file !== undefined ? [bindings.in_file] : []);
    return Object.freeze({
      key,
      environment,
      commands: Object.freeze(commands),
      consumedInputs: Object.freeze([...consumedInputs]),
      producedOutput: bindings.out_file,
    });
  }

  private resolve(environment: Environment, step: number, name: Placeholder, bindings: RenderContext): readonly string[] {
    if (name === 'in_file' && environment.mode === 'batch') {
      throw new ConfigurationError(
        `step ${step} references {in_file} in a batch chain ({in_files} elsewhere); cardinality is ambiguous`,
        environment.name,
      );
    }
    if (name === 'in_files') {
      if (bindings.in_files === undefined) {
        throw new ConfigurationError(`step ${step} references {in_files} but no files were supplied`, environment.name);
      }
      return bindings.in_files;
    }
    const value = bindings[name];
    if (value === undefined) {
      throw new ConfigurationError(`step ${step} references {${name}} but it could not be resolved`, environment.name);
    }
    return [value];
  }
}

function formatPaths(paths: readonly string[], span: QuoteSpan): string {
  switch (span) {
    case 'none':
      return shellQuote.quote([...paths]);
    case 'double':
      return paths.map((p) => p.replace(/(["\\$`])/g, '\\$1')).join('" "');
    case 'single':
      return paths.map((p) => p.replace(/'/g, `'\\''`)).join("' '");
  }
}

/**
 * Substitute placeholders left to right, tracking which shell quote the
 * scanner is inside so each value is formatted for its span.
 */
export function expandTemplate(template: string, valuesOf: (name: Placeholder) => readonly string[]): string {
  let out = '';
  let span: QuoteSpan = 'none';
  let i = 0;
  while (i < template.length) {
    const ch = template[i];
    if (ch === '{') {
      const name = PLACEHOLDERS.find((p) => template.startsWith(`{${p}}`, i));
      if (name) {
        out += formatPaths(valuesOf(name), span);
        i += name.length + 2;
        continue;
      }
    }
    if (ch === '\\' && span !== 'single' && i + 1 < template.length) {
      out += template.slice(i, i + 2);
      i += 2;
      continue;
    }
    if (ch === "'" && span !== 'double') span = span === 'single' ? 'none' : 'single';
    else if (ch === '"' && span !== 'single') span = span === 'double' ? 'none' : 'double';
    out += ch;
    i++;
  }
  return out;
}
