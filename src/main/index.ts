#!/usr/bin/env node
import { readFileSync } from 'fs';
import path from 'path';
import { buildProgram } from './cli/program';
import { ConfigError, describeError } from './errors';

process.on('uncaughtException', (err) => {
  console.error('[Main] Uncaught exception:', err);
});

process.on('unhandledRejection', (reason) => {
  console.error('[Main] Unhandled rejection:', reason);
});

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (err) {
    console.warn('[Main] Could not read package version:', describeError(err));
  }
  return '0.0.0';
}

buildProgram(readVersion())
  .parseAsync(process.argv)
  .then(() => process.exit(0))
  .catch((err: unknown) => {
    if (err instanceof ConfigError) {
      console.error(err.message);
    } else {
      console.error('[Main] Fatal:', describeError(err));
    }
    process.exit(1);
  });
