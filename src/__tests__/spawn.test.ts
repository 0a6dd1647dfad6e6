/**
 * Shell runner — Acceptance Proofs
 *
 * Proof 1: Multibyte output split across pipe reads decodes intact.
 * Proof 2: Only the last `outputLimit` characters are kept.
 * Proof 3: Exit status and signal are reported; a missing cwd rejects.
 */

import path from 'node:path';
import os from 'node:os';
import { runShellCommand } from '../utils/spawn.js';

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

  /* ---------------------------------------------------------------- */
  /* Proof 1: utf8 across chunk boundaries                              */
  /* ---------------------------------------------------------------- */
  {
    // 40000 three-byte characters: 120000 bytes, more than one pipe read
    const result = await runShellCommand("yes '€' | head -n 40000 | tr -d '\\n'", { outputLimit: 1_000_000 });
    report('proof-1: multibyte output decodes intact', [
      ['exit 0', result.exitCode === 0],
      ['40000 characters', result.output.length === 40000],
      ['no replacement characters', !result.output.includes('�')],
      ['only euro signs', /^€+$/.test(result.output)],
    ]);
  }

  /* ---------------------------------------------------------------- */
  /* Proof 2: output tail                                               */
  /* ---------------------------------------------------------------- */
  {
    const result = await runShellCommand("printf 'abcdefghijklmnop'", { outputLimit: 10 });
    const both = await runShellCommand("printf 'out'; sleep 0.1; printf 'err' >&2");
    report('proof-2: output keeps the tail', [
      ['last ten characters', result.output === 'ghijklmnop'],
      ['stdout and stderr combined', both.output === 'outerr'],
    ]);
  }

  /* ---------------------------------------------------------------- */
  /* Proof 3: exit status and spawn failure                             */
  /* ---------------------------------------------------------------- */
  {
    const exited = await runShellCommand('exit 7');
    const killed = await runShellCommand('kill -TERM $$');
    let rejection = '';
    try {
      await runShellCommand('true', { cwd: path.join(os.tmpdir(), 'hotdrop-no-such-dir', 'x') });
    } catch (e) {
      rejection = e instanceof Error ? e.message : String(e);
    }
    report('proof-3: status reporting', [
      ['exit code', exited.exitCode === 7 && exited.signal === null],
      ['signal', killed.exitCode === null && killed.signal === 'SIGTERM'],
      ['missing cwd rejects', rejection.startsWith('ENOENT: cwd does not exist:')],
    ]);
  }

  console.log('');
  console.log('Result:', passed, 'passed', failed, 'failed');
  process.exit(failed > 0 ? 1 : 0);
}

runTests().catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});
