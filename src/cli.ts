#!/usr/bin/env node

import ansis from "ansis";
import { Runner } from "./execution/runner";

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const runner = new Runner();
  const code = await runner.run(args);
  process.exit(code);
}

main().catch((error: unknown) => {
  console.error(ansis.red("Fatal error:"), error);
  process.exit(1);
});
