/**
 * Shell process spawning with tree killing and a registry of live children.
 */
import { spawn, execSync, type ChildProcess } from 'child_process';
import { existsSync } from 'fs';

function windowsShell(): string {
  const comspec = (process.env.ComSpec ?? '').replace(/;+$/, '').trim();
  return comspec || 'cmd.exe';
}

/**
 * Terminate a running command together with whatever it spawned.
 * Commands start in their own process group, so on Unix the group is
 * signalled; Windows needs taskkill for the tree.
 */
export function killProcessTree(pid: number): void {
  try {
    if (process.platform === 'win32') {
      execSync(`taskkill /T /F /PID ${pid}`, { stdio: 'ignore', timeout: 5000 });
    } else {
      process.kill(-pid, 'SIGTERM');
    }
  } catch {
    try {
      process.kill(pid, 'SIGKILL');
    } catch {
      /* already exited */
    }
  }
}

/* ------------------------------------------------------------------ */
/*  Managed child process registry                                     */
/* ------------------------------------------------------------------ */

const running = new Set<ChildProcess>();

function register(child: ChildProcess): void {
  const forget = () => {
    running.delete(child);
  };
  running.add(child);
  child.once('exit', forget);
  child.once('error', forget);
}

/** Kill all tracked child processes. Used on forced shutdown. */
export function killAllChildren(): number {
  let killed = 0;
  for (const child of running) {
    if (child.pid && !child.killed && child.exitCode === null) {
      killProcessTree(child.pid);
      killed++;
    }
  }
  running.clear();
  return killed;
}

/* ------------------------------------------------------------------ */
/*  Shell command                                                      */
/* ------------------------------------------------------------------ */

export interface ShellOptions {
  cwd?: string;
  /** Characters of combined stdout/stderr kept for diagnostics. */
  outputLimit?: number;
}

export interface ShellResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Tail of combined stdout and stderr. */
  output: string;
}

const DEFAULT_OUTPUT_LIMIT = 4096;

/**
 * Run a command line through the platform shell and wait for it to exit.
 * Resolves on any exit status; rejects only when the process cannot start.
 */
export function runShellCommand(command: string, options: ShellOptions = {}): Promise<ShellResult> {
  const { cwd } = options;
  const limit = options.outputLimit ?? DEFAULT_OUTPUT_LIMIT;

  return new Promise((resolve, reject) => {
    if (cwd && !existsSync(cwd)) {
      const err: NodeJS.ErrnoException = new Error(`ENOENT: cwd does not exist: ${cwd}`);
      err.code = 'ENOENT';
      reject(err);
      return;
    }

    const isWindows = process.platform === 'win32';
    let child: ChildProcess;
    try {
      child = spawn(command, [], {
        cwd,
        shell: isWindows ? windowsShell() : true,
        stdio: ['ignore', 'pipe', 'pipe'],
        // own process group so killProcessTree reaches grandchildren
        detached: !isWindows,
      });
    } catch (e) {
      reject(e instanceof Error ? e : new Error(String(e)));
      return;
    }

    register(child);

    let output = '';
    const collect = (chunk: string) => {
      output += chunk;
      if (output.length > limit) output = output.slice(output.length - limit);
    };
    child.stdout?.setEncoding('utf8').on('data', collect);
    child.stderr?.setEncoding('utf8').on('data', collect);

    let settled = false;
    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      reject(err);
    });
    child.on('close', (exitCode, signal) => {
      if (settled) return;
      settled = true;
      resolve({ exitCode, signal, output: output.trimEnd() });
    });
  });
}
