#!/usr/bin/env node
/**
 * CLI entry point — validates arguments, runs one batch and prints the result.
 *
 * Exit codes:
 *   0 — at least one pair was created
 *   1 — the batch failed (see the remediation list)
 *   2 — bad arguments
 */
import { collectArgs, parseRequest, USAGE } from './cli.js';
import { runPipeline } from './pipeline/index.js';
import { logger } from './utils/logger.js';

async function main(): Promise<number> {
  const args = await collectArgs(process.argv.slice(2));
  if (!args) {
    console.error(USAGE);
    return 2;
  }

  const request = parseRequest(args.url, args.count);
  if (!request.ok) {
    console.error(`Error: ${request.error}\n\n${USAGE}`);
    return 2;
  }

  const result = await runPipeline(request.value);
  if (!result.ok) {
    const { code, message, remediation } = result.error;
    console.error(`\n✗ ${message} [${code}]`);
    for (const step of remediation) console.error(`  - ${step}`);
    return 1;
  }

  const report = result.value;
  console.log(`\n✓ Created ${report.pairs.length} video pair(s) from ${report.profile.url}`);
  for (const pair of report.pairs) {
    console.log(`  ${pair.path}  (${pair.durationSeconds.toFixed(1)}s)`);
  }
  if (report.failures.length > 0) {
    console.log(`  ${report.failures.length} item(s) skipped; see the log for details`);
  }
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    logger.error('Fatal', { err });
    process.exit(1);
  });
