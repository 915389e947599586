import { findExecutable, runLogged, type CommandContext } from './process.js';

export interface ArtifactRequest {
  branch: string;
  target: string;
  build: string;
  pattern: string;
}

const FETCH_ARTIFACT_INSTALL_HINT = [
  'error: cannot find fetch_artifact in PATH. Install it using:',
  '  sudo glinux-add-repo android',
  '  sudo apt update',
  '  sudo apt install android-fetch-artifact',
  ''
].join('\n');

export function fetchArtifactCommand(executable: string, request: ArtifactRequest): string[] {
  return [
    executable,
    '--use_oauth2',
    '--branch',
    request.branch,
    `--target=${request.target}`,
    '--bid',
    request.build,
    request.pattern
  ];
}

/** Downloads one artifact from the build server into `context.cwd`. */
export async function fetchArtifact(
  context: CommandContext,
  request: ArtifactRequest
): Promise<void> {
  const executable = await findExecutable('fetch_artifact', context.env);
  if (executable === null) {
    throw new Error(FETCH_ARTIFACT_INSTALL_HINT);
  }

  await runLogged(context, fetchArtifactCommand(executable, request));
}

export async function extractArchive(
  context: CommandContext,
  archivePath: string,
  destination: string,
  stripComponents = 0
): Promise<void> {
  const argv = ['tar', 'xf', archivePath];
  if (stripComponents > 0) {
    argv.push(`--strip-components=${stripComponents}`);
  }
  argv.push('-C', destination);
  await runLogged(context, argv);
}
