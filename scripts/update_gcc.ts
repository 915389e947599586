import { runUpdateGccCli } from './lib/update_gcc.js';

runUpdateGccCli().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
