/**
 * Home Directory Utilities
 *
 * Centralized module for all home directory operations.
 * Handles tilde expansion and display normalization.
 */

import { homedir } from 'os';
import { resolve, normalize } from 'path';

/**
 * Get the home directory path.
 *
 * @returns Absolute path to the user's home directory
 */
export function getHomeDirectory(): string {
  return homedir();
}

/**
 * Convert home directory path to tilde notation for display.
 *
 * Only converts if the path is exactly the home directory or
 * a subdirectory of it. Other paths are returned unchanged.
 */
export function normalizePathWithTilde(path: string): string {
  const normalizedPath = normalize(resolve(path));
  const normalizedHome = normalize(getHomeDirectory());

  if (normalizedPath === normalizedHome) {
    return '~/';
  }

  if (normalizedPath.startsWith(normalizedHome + '/')) {
    return '~/' + normalizedPath.slice(normalizedHome.length + 1);
  }

  return normalizedPath;
}

/**
 * Expand a leading `~` to the home directory.
 *
 * `~user` forms are left alone; only the current user's home is known.
 */
export function expandTilde(path: string): string {
  if (path === '~' || path === '~/') {
    return getHomeDirectory();
  }

  if (path.startsWith('~/')) {
    return resolve(getHomeDirectory(), path.slice(2));
  }

  return path;
}
