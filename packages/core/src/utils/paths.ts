import * as os from 'node:os';
import * as path from 'node:path';

export const QUIRE_DIR = '.quire';

export function getGlobalQuireDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, QUIRE_DIR);
}

export function getProjectQuireDir(projectRoot: string): string {
  return path.join(projectRoot, QUIRE_DIR);
}

/**
 * Expands a leading `~` to the user's home directory.
 */
export function expandHome(
  value: string,
  homeDir: string = os.homedir(),
): string {
  if (value === '~') {
    return homeDir;
  }
  if (value.startsWith('~/')) {
    return path.join(homeDir, value.slice(2));
  }
  return value;
}
