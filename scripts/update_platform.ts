import { runUpdatePlatformCli } from './lib/update_platform.js';

runUpdatePlatformCli().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
