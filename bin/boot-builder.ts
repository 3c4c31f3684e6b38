#!/usr/bin/env node
import { main } from "../src/cli";

main(process.argv.slice(2)).then(
  (code) => {
    process.exit(code);
  },
  (err) => {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`${message}\n`);
    process.exit(1);
  }
);
