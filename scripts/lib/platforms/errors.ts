export type PlatformsErrorCode =
  | 'METADATA_FORMAT'
  | 'ALIAS_COLLISION'
  | 'UNRESOLVED_CODENAME';

export class PlatformsError extends Error {
  readonly code: PlatformsErrorCode;

  constructor(message: string, code: PlatformsErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlatformsError';
    this.code = code;
  }
}

/**
 * The platforms metadata file is missing, is not JSON, or lacks one of
 * `min`/`max`/`aliases` in the expected shape. Raised before anything on disk
 * is touched.
 */
export class MetadataFormatError extends PlatformsError {
  readonly source: string;

  constructor(source: string, detail: string, options?: { cause?: unknown }) {
    super(`Invalid platforms metadata in ${source}: ${detail}`, 'METADATA_FORMAT', options);
    this.name = 'MetadataFormatError';
    this.source = source;
  }
}

/**
 * A codename would be renamed onto a directory that already exists (or onto
 * the same level as another codename).
 */
export class AliasCollisionError extends PlatformsError {
  readonly sourcePath: string;
  readonly targetPath: string;
  readonly claimedBy: string | null;

  constructor(sourcePath: string, targetPath: string, claimedBy: string | null = null) {
    super(
      claimedBy === null
        ? `Could not rename ${sourcePath} to ${targetPath} because ${targetPath} already exists.`
        : `Could not rename ${sourcePath} to ${targetPath} because ${claimedBy} is aliased to the same level.`,
      'ALIAS_COLLISION'
    );
    this.name = 'AliasCollisionError';
    this.sourcePath = sourcePath;
    this.targetPath = targetPath;
    this.claimedBy = claimedBy;
  }
}

export class UnresolvedCodenameError extends PlatformsError {
  readonly paths: readonly string[];

  constructor(paths: readonly string[]) {
    super(
      [
        'Found unhandled codenamed releases in the sysroot. Clang requires numeric releases, ' +
          'so codenamed releases must either be removed from the platforms metadata range ' +
          'or given an alias. Found codenames:',
        ...paths
      ].join('\n'),
      'UNRESOLVED_CODENAME'
    );
    this.name = 'UnresolvedCodenameError';
    this.paths = paths;
  }
}
