/**
 * File system operations used by target discovery and the generation flows.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Write content only when nothing exists at the path yet.
 * Returns false (and writes nothing) when the path is taken.
 */
export async function writeFileIfAbsent(filePath: string, content: string): Promise<boolean> {
  await ensureDir(path.dirname(filePath));
  try {
    await fs.promises.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      return false;
    }
    throw error;
  }
}

/**
 * Check if a file or directory exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* not found */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(dirPath);
    return stat.isDirectory();
  } catch { /* not found or not accessible */ }
  return false;
}

/**
 * Check if a path is a directory (sync). Target discovery runs once,
 * eagerly, when the resolver is built.
 */
export function directoryExistsSync(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch { /* not found or not accessible */ }
  return false;
}

/**
 * List the names of the immediate sub-directories of a directory, sorted.
 */
export function listDirectoriesSync(dirPath: string): string[] {
  return fs
    .readdirSync(dirPath, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

/**
 * Ensure a directory exists. Returns true when it had to be created.
 */
export async function ensureDir(dirPath: string): Promise<boolean> {
  const created = await fs.promises.mkdir(dirPath, { recursive: true });
  return created !== undefined;
}

/**
 * Remove a directory tree. Returns false when there was nothing to remove.
 */
export async function removeDir(dirPath: string): Promise<boolean> {
  if (!(await fileExists(dirPath))) {
    return false;
  }
  await fs.promises.rm(dirPath, { recursive: true });
  return true;
}

/**
 * Remove a single file if present.
 */
export async function removeFile(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

/**
 * Copy a file, creating the destination directory. Existing destinations are
 * left alone; returns whether the copy happened.
 */
export async function copyFileIfAbsent(source: string, destination: string): Promise<boolean> {
  await ensureDir(path.dirname(destination));
  try {
    await fs.promises.copyFile(source, destination, fs.constants.COPYFILE_EXCL);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      return false;
    }
    throw error;
  }
}

/**
 * Find files matching glob patterns. Paths are relative to `cwd` unless
 * `absolute` is set.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
    dot?: boolean;
  } = {}
): Promise<string[]> {
  const files = await fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/node_modules/**'],
    absolute: options.absolute ?? false,
    dot: options.dot ?? true,
    onlyFiles: true,
  });
  return files.sort();
}
