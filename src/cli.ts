#!/usr/bin/env node
// trace-audit CLI
// Usage: trace-audit <scan|graph|check|lint|serve> [options]

import { run } from "./commands.js";

run(process.argv.slice(2))
  .then((code) => {
    // 'serve' keeps running on the stdio transport; exitCode applies once it closes.
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(
      `Fatal: ${err instanceof Error ? err.message : String(err)}\n`
    );
    process.exitCode = 1;
  });
