#!/usr/bin/env node

import { program } from 'commander';
import { watchCommand, type WatchOptions } from './commands/watch.js';
import { checkCommand } from './commands/check.js';
import { renderCommand } from './commands/render.js';

const DEFAULT_CONFIG = './hotdrop.yaml';

program
  .name('hotdrop')
  .description('Hot folders that run shell commands on the files dropped into them')
  .version('0.3.0');

/* ---- watch ---- */
program
  .command('watch [basePath]')
  .description('Create one hot folder per environment under basePath and run triggers on new files')
  .option('-c, --config <path>', 'Path to hotdrop.yaml', DEFAULT_CONFIG)
  .option('--clean', 'Remove the hot folders on exit')
  .option('--clean-inputs', 'Delete input files after a successful trigger')
  .option('--delay <seconds>', 'Batch settle delay (overrides batchDelaySeconds)')
  .option('-v, --verbose', 'Debug logging')
  .action((basePath: string | undefined, opts: WatchOptions) =>
    watchCommand(basePath, opts).catch((e: unknown) => { console.error(e instanceof Error ? e.message : e); process.exit(2); }));

/* ---- check ---- */
program
  .command('check')
  .description('Validate the config and list environments with their mode')
  .option('-c, --config <path>', 'Path to hotdrop.yaml', DEFAULT_CONFIG)
  .action((opts: { config: string }) => checkCommand(opts));

/* ---- render (dry run) ---- */
program
  .command('render <environment> <files...>')
  .description('Print the commands an environment would run for the given files')
  .option('-c, --config <path>', 'Path to hotdrop.yaml', DEFAULT_CONFIG)
  .option('-b, --base <path>', 'Base path the output folder is resolved against')
  .action((environment: string, files: string[], opts: { config: string; base?: string }) => {
    try {
      renderCommand(environment, files, opts);
    } catch (e) {
      console.error(e instanceof Error ? e.message : e);
      process.exit(2);
    }
  });

program.parse();
