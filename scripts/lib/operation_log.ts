/**
 * Reporting port for every side effect the update scripts perform. The
 * platform engine and the workflows call it before acting, so tests can
 * substitute a recording implementation and the engine never prints itself.
 */
export interface OperationLog {
  command(argv: readonly string[]): void;
  removeTree(targetPath: string): void;
  makeDirs(targetPath: string): void;
  removeFile(targetPath: string): void;
  rename(fromPath: string, toPath: string): void;
  symlink(linkPath: string, targetPath: string): void;
  info(message: string): void;
}

export const consoleOperationLog: OperationLog = {
  command(argv) {
    console.log(`check_call \`${argv.join(' ')}\``);
  },
  removeTree(targetPath) {
    console.log(`rmtree ${targetPath}`);
  },
  makeDirs(targetPath) {
    console.log(`mkdir -p ${targetPath}`);
  },
  removeFile(targetPath) {
    console.log(`rm ${targetPath}`);
  },
  rename(fromPath, toPath) {
    console.log(`mv ${fromPath} ${toPath}`);
  },
  symlink(linkPath, targetPath) {
    console.log(`ln -s ${targetPath} ${linkPath}`);
  },
  info(message) {
    console.log(message);
  }
};

function ignore(): void {}

export const silentOperationLog: OperationLog = {
  command: ignore,
  removeTree: ignore,
  makeDirs: ignore,
  removeFile: ignore,
  rename: ignore,
  symlink: ignore,
  info: ignore
};
