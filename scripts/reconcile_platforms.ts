import { parseReconcilePlatformsArgs, runReconcilePlatforms } from './lib/reconcile_cli.js';

async function main(): Promise<void> {
  runReconcilePlatforms(parseReconcilePlatformsArgs(process.argv.slice(2)));
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
