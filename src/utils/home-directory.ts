/**
 * Home Directory Utilities
 *
 * Path resolution against the user's home and tilde display normalization.
 */

import { homedir } from 'os';
import { resolve, normalize, join } from 'path';

export function getHomeDirectory(): string {
  return homedir();
}

/**
 * Expand a leading `~` and return the normalized absolute path.
 */
export function expandHome(path: string): string {
  if (path === '~') {
    return getHomeDirectory();
  }
  if (path.startsWith('~/')) {
    return join(getHomeDirectory(), path.slice(2));
  }
  return normalize(resolve(path));
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
