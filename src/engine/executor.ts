/**
 * Command Executor — runs a rendered chain step by step.
 *
 * State per invocation:
 *   pending → rendering → executing(i) → succeeded | failed(i) → cleaned
 *
 * The first non-zero exit or spawn failure stops the chain; inputs are
 * then left in place. Cleanup failures are reported but never turn a
 * success into a failure.
 */

import { unlink } from 'node:fs/promises';
import { runShellCommand, type ShellResult } from '../utils/spawn.js';
import { KeyedQueue } from './keyed-queue.js';
import { CleanupError, ProcessExitError, ProcessSpawnError, toError } from './errors.js';
import type { CommandInvocation } from './render.js';
import type { Logger } from '../utils/logger.js';

export type InvocationState =
  | { state: 'pending' }
  | { state: 'rendering' }
  | { state: 'executing'; step: number }
  | { state: 'succeeded' }
  | { state: 'failed'; step: number }
  | { state: 'cleaned' };

export type TransitionListener = (key: string, environment: string, state: InvocationState) => void;

export interface StepResult {
  step: number;
  command: string;
  exitCode: number | null;
  durationMs: number;
}

export interface ExecutionSuccess {
  ok: true;
  producedOutput?: string;
  steps: StepResult[];
  /** Inputs removed by cleanup. */
  removed: string[];
  cleanupErrors: CleanupError[];
}

export interface ExecutionFailure {
  ok: false;
  failedStep: number;
  reason: ProcessExitError | ProcessSpawnError;
  /** Tail of the failed step's stdout/stderr. */
  output: string;
  steps: StepResult[];
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

export interface CommandExecutorOptions {
  cleanInputs: boolean;
  cwd?: string;
  logger?: Logger;
  onTransition?: TransitionListener;
}

export class CommandExecutor {
  private readonly queue = new KeyedQueue();

  constructor(private readonly options: CommandExecutorOptions) {}

  /** Runs after any earlier invocation with the same key has finished. */
  execute(invocation: CommandInvocation): Promise<ExecutionResult> {
    return this.queue.run(invocation.key, () => this.runChain(invocation));
  }

  /** Waits for every queued invocation. */
  drain(): Promise<void> {
    return this.queue.drain();
  }

  private transition(invocation: CommandInvocation, state: InvocationState): void {
    this.options.onTransition?.(invocation.key, invocation.environment.name, state);
  }

  private async runChain(invocation: CommandInvocation): Promise<ExecutionResult> {
    const { logger } = this.options;
    const env = invocation.environment.name;
    const steps: StepResult[] = [];

    for (const [step, command] of invocation.commands.entries()) {
      this.transition(invocation, { state: 'executing', step });
      logger?.debug(`${env}: step ${step}: ${command}`);
      const started = Date.now();
      let result: ShellResult;
      try {
        result = await runShellCommand(command, { cwd: this.options.cwd });
      } catch (e) {
        const reason = new ProcessSpawnError(step, command, toError(e));
        steps.push({ step, command, exitCode: null, durationMs: Date.now() - started });
        return this.fail(invocation, step, reason, '', steps);
      }
      steps.push({ step, command, exitCode: result.exitCode, durationMs: Date.now() - started });
      if (result.exitCode !== 0) {
        const reason = new ProcessExitError(result.exitCode, step, command, result.signal);
        return this.fail(invocation, step, reason, result.output, steps);
      }
    }

    this.transition(invocation, { state: 'succeeded' });
    logger?.info(
      `${env}: done (${invocation.consumedInputs.length} input(s)${invocation.producedOutput ? ` -> ${invocation.producedOutput}` : ''})`,
    );

    const removed: string[] = [];
    const cleanupErrors: CleanupError[] = [];
    if (this.options.cleanInputs) {
      for (const file of invocation.consumedInputs) {
        try {
          await unlink(file);
          removed.push(file);
        } catch (e) {
          const err = new CleanupError(file, e);
          cleanupErrors.push(err);
          logger?.error(`${env}: ${err.message}`);
        }
      }
      this.transition(invocation, { state: 'cleaned' });
    }

    return { ok: true, producedOutput: invocation.producedOutput, steps, removed, cleanupErrors };
  }

  private fail(
    invocation: CommandInvocation,
    step: number,
    reason: ProcessExitError | ProcessSpawnError,
    output: string,
    steps: StepResult[],
  ): ExecutionFailure {
    this.transition(invocation, { state: 'failed', step });
    const { logger } = this.options;
    logger?.error(`${invocation.environment.name}: ${reason.message}; inputs kept: ${invocation.consumedInputs.join(', ')}`);
    if (output) logger?.error(`${invocation.environment.name}: output:\n${output}`);
    return { ok: false, failedStep: step, reason, output, steps };
  }
}
