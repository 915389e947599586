import { UnresolvedCodenameError } from './errors.js';
import { listPlatformDirectories } from './reconcile.js';

/**
 * Fails with every surviving codenamed release at once; Clang only accepts
 * numeric platform directories.
 */
export function verifyAllNumeric(platformsRoot: string, prefix?: string): void {
  const codenames = listPlatformDirectories(platformsRoot, prefix)
    .filter((entry) => entry.parsed.kind === 'codename')
    .map((entry) => entry.path);

  if (codenames.length > 0) {
    throw new UnresolvedCodenameError(codenames);
  }
}
