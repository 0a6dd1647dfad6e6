/**
 * Hot folders + watcher — Acceptance Proofs
 *
 * Proof 1: Only files directly inside an environment folder become events.
 * Proof 2: Hidden files and partial-write artifacts are ignored.
 * Proof 3: prepareHotFolders creates one folder per environment; removeHotFolders deletes the hot root.
 * Proof 4: The chokidar watcher reports files present at start and files added later.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { FSWatcher } from 'chokidar';
import {
  isIgnoredName,
  prepareHotFolders,
  removeHotFolders,
  resolveLayout,
  startHotFolderWatcher,
  toInputEvent,
} from '../watch/hot-folders.js';
import { EnvironmentRegistry } from '../engine/registry.js';
import type { InputEvent } from '../engine/engine.js';

const TEST_DIR = fs.mkdtempSync(path.join(os.tmpdir(), 'hotdrop-watch-'));

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

async function waitFor(cond: () => boolean, timeoutMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (cond()) return true;
    await sleep(50);
  }
  return cond();
}

async function runTests(): Promise<void> {
  let passed = 0;
  let failed = 0;

  const report = (name: string, checks: ReadonlyArray<readonly [string, boolean]>) => {
    const failedChecks = checks.filter(([, ok]) => !ok).map(([label]) => label);
    if (failedChecks.length > 0) {
      console.error(`FAIL ${name}: ${failedChecks.join(', ')}`);
      failed++;
    } else {
      console.log(`PASS ${name}`);
      passed++;
    }
  };

  const registry = new EnvironmentRegistry([
    { name: 'pdf-ocr-deu', patterns: ['*.pdf'], trigger: ['cp {in_file} {out_file}'] },
    { name: 'tiff-merge', patterns: ['*.tif'], trigger: ['cat {in_files} > {out_file}'] },
  ]);
  const layout = resolveLayout(TEST_DIR, { hotFolderName: 'hot', outputFolderName: 'out' });

  /* ---------------------------------------------------------------- */
  /* Proof 1: event mapping                                             */
  /* ---------------------------------------------------------------- */
  {
    const hot = layout.hotRoot;
    const inside = toInputEvent(hot, path.join(hot, 'pdf-ocr-deu', 'scan.pdf'));
    report('proof-1: events only for files in an environment folder', [
      ['path', inside?.path === path.join(hot, 'pdf-ocr-deu', 'scan.pdf')],
      ['hot folder', inside?.hotFolder === path.join(hot, 'pdf-ocr-deu')],
      ['hot root file ignored', toInputEvent(hot, path.join(hot, 'loose.pdf')) === null],
      ['nested file ignored', toInputEvent(hot, path.join(hot, 'pdf-ocr-deu', 'sub', 'x.pdf')) === null],
      ['outside ignored', toInputEvent(hot, path.join(TEST_DIR, 'elsewhere.pdf')) === null],
      ['root itself ignored', toInputEvent(hot, hot) === null],
    ]);
  }

  /* ---------------------------------------------------------------- */
  /* Proof 2: ignored names                                             */
  /* ---------------------------------------------------------------- */
  {
    report('proof-2: hidden and partial files ignored', [
      ['dotfile', isIgnoredName('.DS_Store')],
      ['tmp', isIgnoredName('scan.pdf.tmp')],
      ['part', isIgnoredName('scan.PART')],
      ['crdownload', isIgnoredName('scan.pdf.crdownload')],
      ['backup', isIgnoredName('scan.pdf~')],
      ['regular', !isIgnoredName('scan.pdf')],
      ['event for partial is null', toInputEvent(layout.hotRoot, path.join(layout.hotRoot, 'pdf-ocr-deu', 'x.part')) === null],
    ]);
  }

  /* ---------------------------------------------------------------- */
  /* Proof 3: layout                                                    */
  /* ---------------------------------------------------------------- */
  {
    const folders = prepareHotFolders(layout, registry);
    const created = folders.every((f) => fs.statSync(f).isDirectory());
    const outCreated = fs.existsSync(layout.outputFolder);
    const again = prepareHotFolders(layout, registry);
    report('proof-3: hot folder layout', [
      ['one per environment', folders.join('|') === [path.join(layout.hotRoot, 'pdf-ocr-deu'), path.join(layout.hotRoot, 'tiff-merge')].join('|')],
      ['created', created],
      ['output folder', outCreated],
      ['idempotent', again.length === 2],
      ['layout base', layout.base === path.resolve(TEST_DIR)],
    ]);
  }

  /* ---------------------------------------------------------------- */
  /* Proof 4: live watcher                                              */
  /* ---------------------------------------------------------------- */
  {
    const existing = path.join(layout.hotRoot, 'pdf-ocr-deu', 'before.pdf');
    fs.writeFileSync(existing, 'x', 'utf8');
    const events: InputEvent[] = [];
    let watcher: FSWatcher | null = null;
    try {
      watcher = await startHotFolderWatcher({
        layout,
        initialScan: true,
        stabilityThreshold: 100,
        onEvent: (e) => events.push(e),
      });
      const added = path.join(layout.hotRoot, 'tiff-merge', 'page.tif');
      fs.writeFileSync(added, 'y', 'utf8');
      fs.writeFileSync(path.join(layout.hotRoot, 'tiff-merge', '.hidden.tif'), 'z', 'utf8');
      fs.writeFileSync(path.join(layout.hotRoot, 'tiff-merge', 'page2.tif.part'), 'z', 'utf8');
      fs.writeFileSync(path.join(layout.hotRoot, 'loose.pdf'), 'z', 'utf8');
      const arrived = await waitFor(() => events.length >= 2, 5000);
      await sleep(500);
      const paths = events.map((e) => path.basename(e.path)).sort();
      report('proof-4: watcher emits complete files', [
        ['both arrived', arrived],
        ['exactly two', events.length === 2],
        ['names', paths.join(',') === 'before.pdf,page.tif'],
        ['hot folder set', events.every((e) => path.dirname(e.path) === e.hotFolder)],
      ]);
    } finally {
      await watcher?.close();
    }
  }

  removeHotFolders(layout);
  report('proof-3b: removeHotFolders', [
    ['hot root gone', !fs.existsSync(layout.hotRoot)],
    ['output kept', fs.existsSync(layout.outputFolder)],
  ]);

  fs.rmSync(TEST_DIR, { recursive: true, force: true });
  console.log('');
  console.log('Result:', passed, 'passed', failed, 'failed');
  process.exit(failed > 0 ? 1 : 0);
}

runTests().catch((e: unknown) => {
  fs.rmSync(TEST_DIR, { recursive: true, force: true });
  console.error(e);
  process.exit(1);
});
