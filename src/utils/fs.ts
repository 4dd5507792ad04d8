import { promises as fs, constants as fsConstants } from 'fs';
import { dirname } from 'path';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a file the current user may execute
 */
export async function isExecutableFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    if (!stats.isFile()) {
      return false;
    }
    await fs.access(path, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Create a directory unless this is a dry run, and insist that the path is a directory.
 */
export async function ensureDirExists(path: string, dryRun: boolean): Promise<void> {
  if (!(await exists(path))) {
    if (dryRun) {
      console.log(`Would create ${path}`);
      return;
    }
    await ensureDir(path);
  }

  if (!(await isDirectory(path))) {
    throw new FileSystemError(`Not a directory: ${path}`, { path });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Remove a file or directory recursively
 */
export async function remove(path: string): Promise<void> {
  try {
    await fs.rm(path, { recursive: true, force: true });
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

/**
 * Remove everything below a directory, leaving it empty
 */
export async function emptyDirectory(path: string): Promise<void> {
  await remove(path);
  await ensureDir(path);
}

/**
 * List files in a directory (non-recursive)
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => (entry.isFile() || entry.isSymbolicLink()) && !isJunk(entry.name))
      .map(entry => entry.name)
      .sort();
  } catch (error) {
    throw new FileSystemError(`Failed to list files in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * Write object to JSON file
 */
export async function writeJsonFile(path: string, data: unknown, indent: number = 2): Promise<void> {
  try {
    const content = JSON.stringify(data, null, indent);
    await writeTextFile(path, content + '\n');
  } catch (error) {
    throw new FileSystemError(`Failed to write JSON file: ${path}`, { path, error });
  }
}

/**
 * Rename a directory (or file) from source path to destination path.
 * Ensures the destination parent directory exists and wraps errors consistently.
 */
export async function renameDirectory(srcPath: string, destPath: string): Promise<void> {
  try {
    await ensureDir(dirname(destPath));
    await fs.rename(srcPath, destPath);
    logger.debug(`Renamed: ${srcPath} -> ${destPath}`);
  } catch (error) {
    throw new FileSystemError(`Failed to rename: ${srcPath} -> ${destPath}`, { srcPath, destPath, error });
  }
}

/**
 * Copy a directory tree
 */
export async function copyDirectory(srcPath: string, destPath: string): Promise<void> {
  try {
    await ensureDir(dirname(destPath));
    await fs.cp(srcPath, destPath, { recursive: true });
    logger.debug(`Copied directory: ${srcPath} -> ${destPath}`);
  } catch (error) {
    throw new FileSystemError(`Failed to copy directory: ${srcPath} -> ${destPath}`, { srcPath, destPath, error });
  }
}
