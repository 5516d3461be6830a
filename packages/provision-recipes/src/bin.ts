#!/usr/bin/env -S node --import tsx
import { run } from './cli.js';

const controller = new AbortController();
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => controller.abort());
}

process.exitCode = await run(process.argv.slice(2), { signal: controller.signal });
