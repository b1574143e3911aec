#!/usr/bin/env tsx
/**
 * List the newest entries of a profile as the extractor sees them, without
 * downloading anything.
 * Run: npm run list-profile -- <profile-url> [count]
 */
import { parseProfileLocator } from '../src/platforms/profile.js';
import { YtDlpProvider } from '../src/platforms/ytdlp.js';
import { parseCount } from '../src/cli.js';

const DIM   = '\x1b[2m';
const BOLD  = '\x1b[1m';
const RESET = '\x1b[0m';

const [rawUrl, rawCount = '10'] = process.argv.slice(2);
if (!rawUrl) {
  console.error('Usage: npm run list-profile -- <profile-url> [count]');
  process.exit(2);
}

const profile = parseProfileLocator(rawUrl);
if (!profile.ok) {
  console.error(`Error: ${profile.error}`);
  process.exit(2);
}
const count = parseCount(rawCount);
if (!count.ok) {
  console.error(`Error: ${count.error}`);
  process.exit(2);
}

console.log(`\n${BOLD}${profile.value.url}${RESET}  (@${profile.value.handle})\n`);

let position = 0;
for await (const entry of new YtDlpProvider().listEntries(profile.value, count.value)) {
  position++;
  if (!entry) {
    console.log(`  ${String(position).padStart(2)}. ${DIM}(unavailable)${RESET}`);
    continue;
  }
  const duration = entry.durationSeconds !== undefined ? `${entry.durationSeconds.toFixed(0)}s` : '?';
  console.log(`  ${String(position).padStart(2)}. ${entry.title}  ${DIM}${duration}  ${entry.url}${RESET}`);
}
if (position === 0) console.log('  No entries found.');
