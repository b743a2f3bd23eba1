import * as fs from 'fs';
import * as path from 'path';

function isExecutableFile(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolves an executable the way a shell would: names containing a path separator are
 * checked directly, bare names are looked up in each `PATH` entry.
 *
 * @returns The absolute path of the executable, or `null` when it cannot be found.
 */
export function findExecutable(executable: string, searchPath: string = process.env.PATH ?? ''): string | null {
  if (executable.includes('/') || executable.includes(path.sep)) {
    const candidate = path.resolve(executable);
    return isExecutableFile(candidate) ? candidate : null;
  }

  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, executable);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}
