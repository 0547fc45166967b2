#!/usr/bin/env node
/**
 * har-mirror
 *
 * Rebuilds a static mirror of a captured browsing session from a HAR file.
 * - Writes every recorded response body to a path derived from its URL
 *   (staged under <root>/out_extracted, then copied into <root>)
 * - Records the hosts seen in out_extracted/extracted_hosts.txt
 * - Patches <root>/index.html so scripts and stylesheets load from the
 *   local copies; images keep pointing at their original hosts
 * - Strips integrity/crossorigin attributes and keeps a timestamped backup
 *
 * Usage:
 *   har-mirror <har-file> [site-root-dir]
 */

import { runCLI } from './cli.js';

runCLI().catch((err) => {
  console.error(err);
  process.exit(1);
});
