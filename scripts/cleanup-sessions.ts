/**
 * Remove stored sessions that have not been updated recently.
 *
 * Usage: npm run cleanup -- [--days=30] [--dry-run]
 */

import { cleanupScopeNotes, cleanupSummary } from '@/lib/cleanupReport';
import { loadConfig } from '@/lib/config';
import { createServices } from '@/lib/services';

const DAY_MS = 24 * 60 * 60 * 1000;

interface Args {
  days: number | null;
  dryRun: boolean;
}

function parseArgs(): Args {
  const args = process.argv.slice(2);
  const daysArg = args.find((a) => a.startsWith('--days='))?.split('=')[1];

  let days: number | null = null;
  if (daysArg !== undefined) {
    days = Number(daysArg);
    if (!Number.isFinite(days) || days < 0) {
      throw new Error(`--days must be a non-negative number, got "${daysArg}"`);
    }
  }

  return {
    days,
    dryRun: args.includes('--dry-run'),
  };
}

async function main(): Promise<void> {
  const args = parseArgs();
  const config = loadConfig();
  const days = args.days ?? config.session.retentionDays;

  console.log('=== Session Cleanup ===\n');

  const { store } = createServices(config);
  const status = await store.status();
  for (const note of cleanupScopeNotes(config.storage.localDbPath, status.remoteAvailable)) {
    console.log(note);
  }

  console.log(`Removing sessions not updated in the last ${days} day(s)${args.dryRun ? ' (dry run)' : ''}...`);
  const result = await store.cleanup(days * DAY_MS, { dryRun: args.dryRun });

  if (args.dryRun) {
    console.log(`\n${result.candidates.length} remote session(s) would be deleted:`);
    for (const name of result.candidates) {
      console.log(`  ${name}`);
    }
  } else {
    console.log(`\n${cleanupSummary(result, config.storage.localDbPath)}`);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
