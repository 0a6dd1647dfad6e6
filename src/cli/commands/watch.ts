/**
 * hotdrop watch [basePath] — create hot folders and run triggers until stopped.
 */
import { loadConfig } from '../../config/loader.js';
import { EnvironmentRegistry } from '../../engine/registry.js';
import { HotFolderEngine } from '../../engine/engine.js';
import { ConfigurationError } from '../../engine/errors.js';
import { resolveLayout, prepareHotFolders, removeHotFolders, startHotFolderWatcher } from '../../watch/hot-folders.js';
import { killAllChildren } from '../../utils/spawn.js';
import { consoleLogger } from '../../utils/logger.js';
import type { HotdropConfig } from '../../config/schema.js';

export interface WatchOptions {
  config: string;
  clean?: boolean;
  cleanInputs?: boolean;
  delay?: string;
  verbose?: boolean;
}

export function applyOverrides(config: HotdropConfig, opts: Pick<WatchOptions, 'cleanInputs' | 'delay'>): HotdropConfig {
  let batchDelaySeconds = config.batchDelaySeconds;
  if (opts.delay !== undefined) {
    batchDelaySeconds = Number(opts.delay);
    if (!Number.isFinite(batchDelaySeconds) || batchDelaySeconds <= 0) {
      throw new ConfigurationError(`--delay must be a positive number of seconds, got '${opts.delay}'`);
    }
  }
  return {
    ...config,
    batchDelaySeconds,
    cleanInputs: opts.cleanInputs ?? config.cleanInputs,
  };
}

export async function watchCommand(basePath: string | undefined, opts: WatchOptions): Promise<void> {
  const logger = consoleLogger({ verbose: opts.verbose });
  const config = applyOverrides(loadConfig(opts.config), opts);
  const registry = new EnvironmentRegistry(config.environments, logger);
  const layout = resolveLayout(basePath ?? process.cwd(), config);
  const hotFolders = prepareHotFolders(layout, registry);

  const engine = new HotFolderEngine({
    registry,
    outputFolder: layout.outputFolder,
    batchDelaySeconds: config.batchDelaySeconds,
    cleanInputs: config.cleanInputs,
    pendingBatchesOnExit: config.pendingBatchesOnExit,
    cwd: layout.base,
    logger,
  });

  const watcher = await startHotFolderWatcher({
    layout,
    initialScan: config.initialScan,
    logger,
    onEvent: (event) => {
      void engine.handle(event);
    },
  });

  for (const dir of hotFolders) logger.info(`hot folder: ${dir}`);
  logger.info(
    `Watching ${registry.size} environment(s) under ${layout.hotRoot} (batch delay ${config.batchDelaySeconds}s). Press Ctrl+C to stop.`,
  );

  let stopping = false;
  const stop = async () => {
    await watcher.close();
    await engine.close();
    if (opts.clean) {
      logger.info(`cleaning ${layout.hotRoot}`);
      removeHotFolders(layout);
    }
  };
  const onSignal = (code: number) => {
    if (stopping) {
      const killed = killAllChildren();
      logger.warn(`forced exit, killed ${killed} running command(s)`);
      process.exit(code);
    }
    stopping = true;
    logger.info(`stopping (${config.pendingBatchesOnExit} pending batches); signal again to force`);
    stop().then(
      () => process.exit(0),
      (e: unknown) => {
        logger.error(e instanceof Error ? e.message : String(e));
        process.exit(2);
      },
    );
  };
  process.on('SIGINT', () => onSignal(130));
  process.on('SIGTERM', () => onSignal(143));
}
