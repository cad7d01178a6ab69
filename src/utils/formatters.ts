import { relative, isAbsolute } from 'path';
import { normalizePathWithTilde } from './home-directory.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user.
 *
 * - Uses relative paths from cwd for paths inside it
 * - Uses tilde notation (~) for paths under the home directory
 * - Falls back to the absolute path otherwise
 *
 * @example
 * formatPathForDisplay('/home/user/.local/share/nvim/site/pack/tendril/start') // => '~/.local/share/nvim/site/pack/tendril/start'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (path.startsWith('~') || !isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  const tildePath = normalizePathWithTilde(path);
  if (tildePath.startsWith('~')) {
    return tildePath;
  }

  return path;
}

/**
 * Get tree connector character based on position
 */
export function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

/**
 * Format tree prefix for nested items
 */
export function getTreePrefix(prefix: string, isLast: boolean): string {
  return prefix + (isLast ? '    ' : '│   ');
}

/**
 * "1 package", "3 packages"
 */
export function formatCount(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
