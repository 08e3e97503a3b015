import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Expand a leading "~" to the user's home directory
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return join(home, path.slice(2));
  }
  return path;
}
