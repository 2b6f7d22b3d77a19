import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

/**
 * Location of the per-user defaults file.
 * `~/.visual-discover/` unless VISUAL_DISCOVER_HOME is set.
 */
export function getVisualDiscoverHome(): string {
  return process.env.VISUAL_DISCOVER_HOME
    ? path.resolve(process.env.VISUAL_DISCOVER_HOME)
    : path.join(os.homedir(), '.visual-discover');
}

export function getGlobalConfigPath(): string {
  return path.join(getVisualDiscoverHome(), 'config.json');
}

/**
 * Path of the defaults file when it exists
 */
export async function findGlobalConfigPath(): Promise<string | undefined> {
  const globalPath = getGlobalConfigPath();
  try {
    await fs.access(globalPath);
    return globalPath;
  } catch {
    return undefined;
  }
}
