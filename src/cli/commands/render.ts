/**
 * hotdrop render <environment> <files...> — print the commands a trigger would run.
 */
import { loadConfig } from '../../config/loader.js';
import { EnvironmentRegistry } from '../../engine/registry.js';
import { HotFolderEngine } from '../../engine/engine.js';
import { resolveLayout } from '../../watch/hot-folders.js';

export function renderCommand(environment: string, files: string[], opts: { config: string; base?: string }): void {
  const config = loadConfig(opts.config);
  const registry = new EnvironmentRegistry(config.environments);
  const layout = resolveLayout(opts.base ?? process.cwd(), config);
  const engine = new HotFolderEngine({
    registry,
    outputFolder: layout.outputFolder,
    batchDelaySeconds: config.batchDelaySeconds,
    cleanInputs: false,
    pendingBatchesOnExit: 'drop',
  });
  const invocation = engine.preview(environment, files);
  invocation.commands.forEach((cmd, i) => console.log(`${i}: ${cmd}`));
  if (invocation.producedOutput) console.log(`out_file: ${invocation.producedOutput}`);
}
