/**
 * Tests for the post-export hook runner
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createWorkspaceFixture, type WorkspaceFixture } from '../../utils/index.js';
import { MemoryLogSink } from '../../../core/utils/log-sink.js';
import { hookArguments, runPostExportHook, type HookInvocation } from '../../../pipeline/post-export-hook.js';

describe('runPostExportHook', () => {
  let fixture: WorkspaceFixture;
  let sink: MemoryLogSink;

  function invocation(scriptBody: string): HookInvocation {
    const script = join(fixture.dir, 'hook.mjs');
    writeFileSync(script, scriptBody);
    return {
      interpreter: process.execPath,
      script,
      outputFolder: '/out',
      outputFile: 'sites.csv',
      spreadsheetFile: 'sites.xlsx',
    };
  }

  beforeEach(() => {
    fixture = createWorkspaceFixture();
    sink = new MemoryLogSink();
  });

  afterEach(() => {
    fixture.cleanup();
  });

  it('should pass the folder and file names and run from the script folder', async () => {
    const hook = invocation(
      "import { writeFileSync } from 'node:fs';\n" +
        "writeFileSync('args.txt', process.argv.slice(2).join('|'));\n"
    );

    await expect(runPostExportHook(hook, sink)).resolves.toBe(true);
    expect(readFileSync(join(fixture.dir, 'args.txt'), 'utf-8')).toBe('/out|sites.csv|sites.xlsx');
    expect(sink.lines).toEqual([`Executing ${process.execPath} ${hook.script} /out sites.csv sites.xlsx`]);
  });

  it('should log a non-zero exit with the error output', async () => {
    const hook = invocation("process.stderr.write('bad input\\n');\nprocess.exit(3);\n");

    await expect(runPostExportHook(hook, sink)).resolves.toBe(false);
    expect(sink.lines.slice(1)).toEqual([`Error executing ${hook.script}. Exit code : 3`, 'bad input']);
  });

  it('should report false when the interpreter cannot be started', async () => {
    const hook = { ...invocation(''), interpreter: join(fixture.dir, 'no-such-interpreter') };

    await expect(runPostExportHook(hook, sink)).resolves.toBe(false);
  });
});

describe('hookArguments', () => {
  it('should put the script first', () => {
    expect(
      hookArguments({
        interpreter: 'sh',
        script: '/scripts/tidy.sh',
        outputFolder: '/out',
        outputFile: 'a.csv',
        spreadsheetFile: 'a.xlsx',
      })
    ).toEqual(['/scripts/tidy.sh', '/out', 'a.csv', 'a.xlsx']);
  });
});
