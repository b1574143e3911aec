#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for clipsplice.
 * Checks the configuration, the external tools, the working folders, and the
 * input video and overlay image.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { execFileSync } from 'child_process';
import { existsSync } from 'fs';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const note = (label: string) => console.log(`  ${YELLOW}○${RESET} ${label}`);

let anyRequiredFailed = false;

console.log(`\n${BOLD}=== clipsplice — Pre-flight Check ===${RESET}\n`);

// ── Section: Configuration ────────────────────────────────────────────────────

console.log(`${BOLD}[ 1 ] Configuration${RESET}`);

// config.ts validates on import, so load it here to report instead of crash.
let config: typeof import('../src/config.js');
try {
  config = await import('../src/config.js');
  pass('Environment variables', '.env and defaults parsed');
} catch (err) {
  fail('Environment variables', err instanceof Error ? err.message : String(err));
  console.error(`\n${RED}${BOLD}Configuration is invalid; fix it before the remaining checks.${RESET}\n`);
  process.exit(1);
}

const { env, IMAGE_EXTENSIONS, VIDEO_EXTENSIONS } = config;
const { findFirstMatching } = await import('../src/utils/folders.js');

note(`MAX_CLIP_SECONDS  ${env.MAX_CLIP_SECONDS}`);
note(`OUTPUT_FPS        ${env.OUTPUT_FPS}`);
note(`FETCH_TIMEOUT_MS  ${env.FETCH_TIMEOUT_MS}`);
note(`FETCH_ATTEMPTS    ${env.FETCH_ATTEMPTS}`);
note(`DEDUPE_ENTRIES    ${env.DEDUPE_ENTRIES}`);

// ── Section: External tools ───────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] External tools${RESET}`);

function checkTool(label: string, binary: string, versionFlag: string, hint: string): void {
  try {
    const out = execFileSync(binary, [versionFlag], { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });
    pass(label, out.split('\n')[0]?.trim() ?? '');
  } catch {
    fail(`${label} (${binary})`, hint);
    anyRequiredFailed = true;
  }
}

checkTool('ffmpeg',  env.FFMPEG_PATH,  '-version',  'Install ffmpeg or set FFMPEG_PATH');
checkTool('ffprobe', env.FFPROBE_PATH, '-version',  'Install ffmpeg (ships ffprobe) or set FFPROBE_PATH');
checkTool('yt-dlp',  env.YTDLP_PATH,   '--version', 'pip install -U yt-dlp, or set YTDLP_PATH');

// ── Section: Working folders ──────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Working folders${RESET}`);

for (const [label, dir] of [
  ['INPUT_DIR',   env.INPUT_DIR],
  ['OVERLAY_DIR', env.OVERLAY_DIR],
  ['TEMP_DIR',    env.TEMP_DIR],
  ['OUTPUT_DIR',  env.OUTPUT_DIR],
] as const) {
  if (existsSync(dir)) pass(label, dir);
  else note(`${label}  ${dir}  (missing — created on first run)`);
}

// ── Section: Assets ───────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Input video and overlay${RESET}`);

const payload = findFirstMatching(env.INPUT_DIR, VIDEO_EXTENSIONS);
if (payload) {
  pass('Input video', payload);
} else {
  fail('Input video', `Put one video (${VIDEO_EXTENSIONS.join(' ')}) in "${env.INPUT_DIR}"`);
  anyRequiredFailed = true;
}

const overlay = findFirstMatching(env.OVERLAY_DIR, IMAGE_EXTENSIONS);
if (overlay) pass('Overlay image', overlay);
else note('Overlay image  (none — clips are processed without one; npm run create-overlay)');

// ── Summary ───────────────────────────────────────────────────────────────────

if (anyRequiredFailed) {
  console.error(`\n${RED}${BOLD}One or more required checks failed.${RESET}\n`);
  process.exit(1);
}
console.log(`\n${GREEN}${BOLD}All required checks passed.${RESET}\n`);
