// scripts/generate-pages.ts
// Hourly job: refresh the price caches when needed and rewrite every HTML page

// Environment overrides (.env.local)
import { config } from 'dotenv';
import { join, resolve } from 'path';
config({ path: resolve(process.cwd(), '.env.local') });

import { mkdir, writeFile } from 'fs/promises';
import { loadConfig } from '../lib/config';
import { extractErrorMessage } from '../lib/errors';
import { generatePages } from '../lib/generate';

async function main() {
  try {
    const siteConfig = loadConfig();
    const now = new Date();
    const startTime = Date.now();

    console.log('='.repeat(60));
    console.log('Generating spot price pages...');
    console.log(`Now: ${now.toLocaleString('fi-FI', { timeZone: siteConfig.timeZone })}`);
    console.log('='.repeat(60));

    console.log('\n[1/2] Loading prices and rendering pages...');
    const pages = await generatePages(siteConfig, now);

    // Written only after every page rendered, so a failure leaves the old pages intact
    console.log(`\n[2/2] Writing ${pages.length} pages to ${siteConfig.outputDir}...`);
    await mkdir(siteConfig.outputDir, { recursive: true });
    for (const page of pages) {
      await writeFile(join(siteConfig.outputDir, page.fileName), page.html, 'utf-8');
      console.log(`  ${page.fileName}`);
    }

    console.log('\n' + '='.repeat(60));
    console.log('✓ Pages updated');
    console.log(`Total time: ${Date.now() - startTime}ms`);
    console.log('='.repeat(60));
  } catch (error: unknown) {
    console.error('\n' + '='.repeat(60));
    console.error('✗ Page generation failed:');
    console.error(extractErrorMessage(error));
    if (error instanceof Error && error.stack) {
      console.error('\nStack trace:');
      console.error(error.stack);
    }
    console.error('='.repeat(60));
    process.exit(1);
  }
}

void main();
