#!/usr/bin/env node
/**
 * oo-cohesion - Entry Point
 *
 * Usage:
 *   oo-cohesion analyze [path]     # Report class metrics
 *   oo-cohesion analyze --json     # Machine-readable report
 *   oo-cohesion init               # Write cohesion.config.json
 *   oo-cohesion --help             # Show help
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

// Early crash logging - write to file before any other imports that might fail
function logCrash(error: unknown): void {
  try {
    const logDir = path.join(os.tmpdir(), 'oo-cohesion');
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    const logFile = path.join(logDir, 'crash.log');
    const timestamp = new Date().toISOString();
    const errorMsg = error instanceof Error
      ? `${error.message}\n${error.stack}`
      : String(error);
    fs.appendFileSync(logFile, `[${timestamp}] [ERROR] [startup] Crashed: ${errorMsg}\n`);
  } catch (logError) {
    console.error('Failed to write crash log:', logError);
  }
  console.error('oo-cohesion failed:', error);
}

process.on('uncaughtException', (error) => {
  logCrash(error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logCrash(reason instanceof Error ? reason : new Error(String(reason)));
  process.exit(1);
});

async function main(): Promise<void> {
  const { runCLI } = await import('./cli/commands.js');
  await runCLI(process.argv);
}

main().catch((error) => {
  logCrash(error);
  process.exit(1);
});
