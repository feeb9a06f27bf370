/**
 * Post-export hook
 *
 * Runs an external script after a layer's table has been written:
 * `<interpreter> <script> <outputFolder> <outputFile> <spreadsheetFile>`,
 * from the script's directory. Waits for exit. A non-zero exit is logged and
 * reported as false; it never throws.
 */

import { spawn } from 'node:child_process';
import { dirname } from 'node:path';
import type { LogSink } from '../core/utils/log-sink.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger('post-export-hook');

export interface HookInvocation {
  readonly interpreter: string;
  readonly script: string;
  readonly outputFolder: string;
  /** Primary output file name, e.g. `sites.csv` */
  readonly outputFile: string;
  /** Companion spreadsheet file name, e.g. `sites.xlsx` */
  readonly spreadsheetFile: string;
}

export function hookArguments(invocation: HookInvocation): string[] {
  return [invocation.script, invocation.outputFolder, invocation.outputFile, invocation.spreadsheetFile];
}

export function runPostExportHook(invocation: HookInvocation, sink: LogSink): Promise<boolean> {
  const args = hookArguments(invocation);
  sink.writeLine(`Executing ${invocation.interpreter} ${args.join(' ')}`);

  return new Promise((resolve) => {
    const child = spawn(invocation.interpreter, args, {
      cwd: dirname(invocation.script),
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stderr = '';
    child.stdout.on('data', (data: Buffer) => {
      log.debug('Hook output', { script: invocation.script, output: data.toString().trimEnd() });
    });
    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error) => {
      sink.writeLine(`Error executing ${invocation.script}: ${error.message}`);
      resolve(false);
    });

    child.on('close', (code) => {
      if (code === 0) {
        resolve(true);
        return;
      }
      sink.writeLine(`Error executing ${invocation.script}. Exit code : ${code ?? 'none'}`);
      if (stderr.trim()) sink.writeLine(stderr.trim());
      resolve(false);
    });
  });
}
