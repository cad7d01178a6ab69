import { promises as fs, constants as fsConstants } from 'fs';
import { join, dirname, isAbsolute, relative, resolve, sep } from 'path';
import { isJunk } from 'junk';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
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
 * Read a JSON or JSONC file (auto-detect format) and parse it.
 * Works with both standard JSON and JSONC (JSON with comments)
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const [first] = errors;
    throw new FileSystemError(
      `Failed to parse JSON/JSONC file: ${path} (${printParseErrorCode(first.error)} at offset ${first.offset})`,
      { path, errors }
    );
  }
  return result;
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
 * List directories in a directory (non-recursive)
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name);
  } catch (error) {
    throw new FileSystemError(`Failed to list directories in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * Recursively copy a directory tree. Junk files (.DS_Store, Thumbs.db, ...)
 * are left behind; everything else, dotfiles included, is copied.
 * A destination at or below the source is rejected before anything is written.
 */
export async function copyDirectory(src: string, dest: string): Promise<void> {
  if (isWithin(src, dest)) {
    throw new FileSystemError(`Cannot copy a directory into itself: ${src} -> ${dest}`, { src, dest });
  }
  await copyTree(src, dest);
}

/**
 * True when `path` is `dir` or lies below it.
 */
export function isWithin(dir: string, path: string): boolean {
  const rel = relative(resolve(dir), resolve(path));
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

async function copyTree(src: string, dest: string): Promise<void> {
  let entries;
  try {
    entries = await fs.readdir(src, { withFileTypes: true });
  } catch (error) {
    throw new FileSystemError(`Failed to read directory: ${src}`, { src, error });
  }

  await ensureDir(dest);

  for (const entry of entries) {
    if (isJunk(entry.name)) {
      continue;
    }

    const from = join(src, entry.name);
    const to = join(dest, entry.name);

    if (entry.isDirectory()) {
      await copyTree(from, to);
    } else if (entry.isSymbolicLink()) {
      try {
        await fs.symlink(await fs.readlink(from), to);
      } catch (error) {
        throw new FileSystemError(`Failed to copy link: ${from} -> ${to}`, { from, to, error });
      }
    } else if (entry.isFile()) {
      try {
        await ensureDir(dirname(to));
        await fs.copyFile(from, to);
      } catch (error) {
        throw new FileSystemError(`Failed to copy file: ${from} -> ${to}`, { from, to, error });
      }
    }
  }
}
