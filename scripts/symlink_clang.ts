import { runSymlinkClangCli } from './lib/symlink_clang.js';

runSymlinkClangCli().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
