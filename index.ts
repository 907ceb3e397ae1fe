#!/usr/bin/env node
import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { main } from "./src/index.js";

export { main };

function isDirectRun(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  // npm links bin entries, so compare resolved paths.
  return fs.realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isDirectRun()) {
  main(process.argv).catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
