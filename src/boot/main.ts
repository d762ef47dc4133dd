import { Chalk } from 'chalk';
import * as dotenv from 'dotenv';
import { runControlLoop } from '@system/control';
import { runDiagnostics } from '@system/diagnostics';
import { ConfigValidationError } from '$types';
import { nowMs, sleep } from '@utils/time';
import { createProgram, resolveRunMode } from './cli';
import { announceStartup, initialize } from './init';
import type { Application } from './types';

async function main(argv: string[]): Promise<number> {
  dotenv.config();

  const program = createProgram();
  program.parse(argv);
  const mode = resolveRunMode(program.args);
  const colors = new Chalk();

  let app: Application;
  try {
    app = initialize({ env: process.env, consoleApi: console, colors: colors });
  } catch (e) {
    if (e instanceof ConfigValidationError) {
      console.error('INIT FAIL: ' + e.message);
      return 1;
    }
    throw e;
  }

  if (mode === 'diagnostics') {
    return runDiagnostics(app.controller.fans, { output: console, colors: colors });
  }

  announceStartup(app.config, app.controller.logger);
  await runControlLoop(app.controller, {
    periodMs: app.config.POLL_PERIOD_MS,
    clock: nowMs,
    sleep: sleep
  });
  return 0;
}

main(process.argv).then(
  function(code) {
    process.exitCode = code;
  },
  function(err: unknown) {
    console.error('FATAL: ' + (err instanceof Error ? err.stack || err.message : String(err)));
    process.exitCode = 1;
  }
);
