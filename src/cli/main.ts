#!/usr/bin/env node
import { runCli } from './program';

const abort = new AbortController();
process.once('SIGINT', () => abort.abort('interrupted'));
process.once('SIGTERM', () => abort.abort('terminated'));

runCli(process.argv.slice(2), { signal: abort.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`fatal: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exitCode = 1;
  })
  .finally(() => {
    process.removeAllListeners('SIGINT');
    process.removeAllListeners('SIGTERM');
  });
