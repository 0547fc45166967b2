/**
 * CLI argument parsing and validation
 */

import minimist from "minimist";
import { mirrorHar } from "./mirror.js";

export const USAGE = "Usage: har-mirror <har-file> [site-root-dir]";

/**
 * Parse CLI arguments and run the mirror
 */
export async function runCLI(args: string[] = process.argv.slice(2)): Promise<void> {
  const argv = minimist(args, {
    boolean: ["help"],
    string: ["_"],
    alias: { h: "help" },
  });

  const [harPath, siteRoot = "."] = argv._;
  if (argv.help || !harPath) {
    console.error(USAGE);
    process.exit(1);
  }

  await mirrorHar(harPath, siteRoot);
}
