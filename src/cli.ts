#!/usr/bin/env node

import { run } from "./program.js";

run(process.argv)
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
    process.exit(1);
  });
