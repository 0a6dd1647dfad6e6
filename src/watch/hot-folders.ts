/**
 * Hot folder layout and the chokidar watcher that feeds the engine.
 *
 * <base>/<hotFolderName>/<environment>/   one watched folder per environment
 * <base>/<outputFolderName>/              derived {out_file} targets
 */
import path from 'node:path';
import fs from 'node:fs';
import chokidar, { type FSWatcher } from 'chokidar';
import type { EnvironmentRegistry } from '../engine/registry.js';
import type { InputEvent } from '../engine/engine.js';
import type { HotdropConfig } from '../config/schema.js';
import type { Logger } from '../utils/logger.js';

export interface HotFolderLayout {
  base: string;
  hotRoot: string;
  outputFolder: string;
}

const PARTIAL_WRITE = /(\.tmp|\.part|\.crdownload|\.partial|~)$/i;

export function resolveLayout(basePath: string, config: Pick<HotdropConfig, 'hotFolderName' | 'outputFolderName'>): HotFolderLayout {
  const base = path.resolve(basePath);
  return {
    base,
    hotRoot: path.join(base, config.hotFolderName),
    outputFolder: path.join(base, config.outputFolderName),
  };
}

export function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

/** Creates the output folder and one hot folder per environment. Returns the hot folders. */
export function prepareHotFolders(layout: HotFolderLayout, registry: EnvironmentRegistry): string[] {
  ensureDir(layout.outputFolder);
  return registry.list().map((env) => {
    const dir = path.join(layout.hotRoot, env.name);
    ensureDir(dir);
    return dir;
  });
}

export function removeHotFolders(layout: HotFolderLayout): void {
  fs.rmSync(layout.hotRoot, { recursive: true, force: true });
}

/** Hidden files and partial-write artifacts are never handed to the engine. */
export function isIgnoredName(name: string): boolean {
  return name.startsWith('.') || PARTIAL_WRITE.test(name);
}

/**
 * Map a file path under the hot root to an input event. Only files sitting
 * directly inside an environment folder count.
 */
export function toInputEvent(hotRoot: string, filePath: string): InputEvent | null {
  const rel = path.relative(hotRoot, filePath);
  if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) return null;
  const segments = rel.split(path.sep);
  if (segments.length !== 2) return null;
  if (isIgnoredName(segments[1])) return null;
  return { path: path.resolve(filePath), hotFolder: path.join(hotRoot, segments[0]) };
}

export interface HotFolderWatcherOptions {
  layout: HotFolderLayout;
  /** Emit files already present when the watcher starts. */
  initialScan: boolean;
  onEvent: (event: InputEvent) => void;
  logger?: Logger;
  /** ms a file's size must stay unchanged before it is considered complete. */
  stabilityThreshold?: number;
}

export function startHotFolderWatcher(options: HotFolderWatcherOptions): Promise<FSWatcher> {
  const { layout, logger } = options;
  const watcher = chokidar.watch(layout.hotRoot, {
    ignoreInitial: !options.initialScan,
    depth: 1,
    ignored: (p: string) => p !== layout.hotRoot && isIgnoredName(path.basename(p)),
    awaitWriteFinish: { stabilityThreshold: options.stabilityThreshold ?? 500, pollInterval: 100 },
  });

  watcher.on('add', (p: string) => {
    const event = toInputEvent(layout.hotRoot, p);
    if (!event) {
      logger?.debug(`ignoring ${p}`);
      return;
    }
    logger?.debug(`file complete: ${event.path}`);
    options.onEvent(event);
  });
  watcher.on('error', (err: unknown) => {
    logger?.error(`watcher: ${err instanceof Error ? err.message : String(err)}`);
  });

  return new Promise((resolve) => {
    watcher.once('ready', () => resolve(watcher));
  });
}
