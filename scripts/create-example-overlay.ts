#!/usr/bin/env tsx
/**
 * Render an example overlay: a 400x100 caption card with a translucent box,
 * written to the overlay folder so a first run has something to composite.
 * Run: npm run create-overlay -- ["caption text"]
 */
import * as path from 'path';
import { env } from '../src/config.js';
import { renderCaptionCard } from '../src/media/overlay.js';

const text = process.argv[2] ?? "Let's expose a dropshipper";
const outputPath = path.join(env.OVERLAY_DIR, 'example_overlay.png');

try {
  await renderCaptionCard(text, outputPath);
  console.log(`✓ Example overlay written to ${outputPath}`);
} catch (err) {
  console.error(`✗ Could not render the overlay: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
