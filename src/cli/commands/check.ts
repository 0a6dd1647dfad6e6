/**
 * hotdrop check — validate the config and print the environments.
 */
import { loadConfig } from '../../config/loader.js';
import { EnvironmentRegistry } from '../../engine/registry.js';
import { consoleLogger } from '../../utils/logger.js';

export function describeEnvironments(registry: EnvironmentRegistry): string[] {
  return registry.list().map((env) => {
    const steps = env.command.length === 1 ? '1 step' : `${env.command.length} steps`;
    return `${env.name}  [${env.mode}]  ${env.patterns.join(', ')}  (${steps})`;
  });
}

export function checkCommand(opts: { config: string }): void {
  let registry: EnvironmentRegistry;
  try {
    const config = loadConfig(opts.config);
    registry = new EnvironmentRegistry(config.environments, consoleLogger());
    console.log('OK');
    console.log(`  batch delay: ${config.batchDelaySeconds}s`);
    console.log(`  clean inputs: ${config.cleanInputs}`);
    console.log(`  pending batches on exit: ${config.pendingBatchesOnExit}`);
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
  console.log('Environments');
  describeEnvironments(registry).forEach((line) => console.log('  ' + line));
}
