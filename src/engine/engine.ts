/**
 * HotFolderEngine — the dispatcher between file events and commands.
 *
 * event → router → (single) render + execute
 *                → (batch)  debouncer → render + execute on settle
 */

import { PatternRouter, UNMATCHED } from './router.js';
import { BatchDebouncer, instanceKey, type CompletedBatch } from './debouncer.js';
import { TemplateRenderer, type CommandInvocation, type RenderContext } from './render.js';
import { CommandExecutor, type ExecutionResult, type TransitionListener } from './executor.js';
import { ConfigurationError, HotdropError, UnmatchedFileError, toError } from './errors.js';
import type { Environment, EnvironmentRegistry } from './registry.js';
import type { PendingBatchPolicy } from '../config/schema.js';
import type { Logger } from '../utils/logger.js';

export interface InputEvent {
  path: string;
  hotFolder: string;
}

export type DispatchOutcome =
  | { kind: 'unmatched'; error: UnmatchedFileError }
  | { kind: 'batched'; environment: string; key: string }
  | { kind: 'render-error'; environment: string; error: ConfigurationError }
  | { kind: 'executed'; invocation: CommandInvocation; result: ExecutionResult }
  | { kind: 'ignored'; reason: string };

export interface HotFolderEngineOptions {
  registry: EnvironmentRegistry;
  outputFolder: string;
  batchDelaySeconds: number;
  cleanInputs: boolean;
  pendingBatchesOnExit: PendingBatchPolicy;
  /** Working directory for spawned commands. */
  cwd?: string;
  logger?: Logger;
  onTransition?: TransitionListener;
  /** Called for every outcome except `batched`, once it is final. */
  onOutcome?: (outcome: DispatchOutcome) => void;
}

export class HotFolderEngine {
  readonly router: PatternRouter;
  readonly renderer: TemplateRenderer;
  private readonly debouncer: BatchDebouncer;
  private readonly executor: CommandExecutor;
  private readonly pendingDispatches = new Set<Promise<DispatchOutcome>>();
  private closed = false;

  constructor(private readonly options: HotFolderEngineOptions) {
    this.router = new PatternRouter(options.registry);
    this.renderer = new TemplateRenderer(options.outputFolder);
    this.executor = new CommandExecutor({
      cleanInputs: options.cleanInputs,
      cwd: options.cwd,
      logger: options.logger,
      onTransition: options.onTransition,
    });
    this.debouncer = new BatchDebouncer({
      delayMs: options.batchDelaySeconds * 1000,
      logger: options.logger,
      onBatch: (batch) => {
        this.track(this.dispatchBatch(batch));
      },
    });
  }

  /**
   * Route one event. Single-file environments resolve once the command has
   * run; batch environments resolve as soon as the file is queued.
   */
  handle(event: InputEvent): Promise<DispatchOutcome> {
    const { logger } = this.options;
    if (this.closed) {
      return Promise.resolve(this.report({ kind: 'ignored', reason: `engine closed, ignoring ${event.path}` }));
    }
    const env = this.router.route(event.path, event.hotFolder);
    if (env === UNMATCHED) {
      const error = new UnmatchedFileError(event.path);
      logger?.warn(error.message);
      return Promise.resolve(this.report({ kind: 'unmatched', error }));
    }

    const key = instanceKey(env.name, event.hotFolder);
    if (env.mode === 'batch') {
      logger?.info(`${env.name}: queued ${event.path}`);
      this.debouncer.add(env, event.hotFolder, event.path);
      const outcome: DispatchOutcome = { kind: 'batched', environment: env.name, key };
      return Promise.resolve(outcome);
    }

    logger?.info(`${env.name}: triggered by ${event.path}`);
    return this.track(this.dispatch(env, { in_file: event.path }, key));
  }

  /** Render without executing. */
  preview(environmentName: string, files: readonly string[]): CommandInvocation {
    const env = this.options.registry.get(environmentName);
    if (!env) throw new ConfigurationError(`unknown environment '${environmentName}'`);
    const context: RenderContext = env.mode === 'batch' ? { in_files: files } : { in_file: files[0] };
    return this.renderer.render(env, context);
  }

  /** Files waiting in the batch for this environment folder. */
  pendingFiles(environment: string, hotFolder: string): readonly string[] {
    return this.debouncer.pendingFiles(instanceKey(environment, hotFolder));
  }

  /**
   * Stop accepting events, settle pending batches by policy and wait for
   * every invocation already started.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.debouncer.shutdown(this.options.pendingBatchesOnExit);
    while (this.pendingDispatches.size > 0) {
      await Promise.all([...this.pendingDispatches]);
    }
    await this.executor.drain();
  }

  private dispatchBatch(batch: CompletedBatch): Promise<DispatchOutcome> {
    this.options.logger?.info(`${batch.environment.name}: batch settled with ${batch.files.length} file(s)`);
    return this.dispatch(batch.environment, { in_files: batch.files }, batch.key);
  }

  private async dispatch(env: Environment, context: RenderContext, key: string): Promise<DispatchOutcome> {
    const notify = this.options.onTransition;
    notify?.(key, env.name, { state: 'pending' });
    notify?.(key, env.name, { state: 'rendering' });
    let invocation: CommandInvocation;
    try {
      invocation = this.renderer.render(env, context, key);
    } catch (e) {
      const error = e instanceof ConfigurationError ? e : new ConfigurationError(toError(e).message, env.name);
      this.options.logger?.error(error.message);
      return this.report({ kind: 'render-error', environment: env.name, error });
    }
    try {
      const result = await this.executor.execute(invocation);
      return this.report({ kind: 'executed', invocation, result });
    } catch (e) {
      // runChain turns every process failure into a result; anything here is a bug in a listener
      const error = toError(e);
      this.options.logger?.error(`${env.name}: ${error instanceof HotdropError ? error.code : 'UNEXPECTED'} ${error.message}`);
      return this.report({ kind: 'ignored', reason: error.message });
    }
  }

  private track(p: Promise<DispatchOutcome>): Promise<DispatchOutcome> {
    this.pendingDispatches.add(p);
    const done = () => {
      this.pendingDispatches.delete(p);
    };
    p.then(done, done);
    return p;
  }

  private report(outcome: DispatchOutcome): DispatchOutcome {
    this.options.onOutcome?.(outcome);
    return outcome;
  }
}
