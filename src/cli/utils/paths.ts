import { homedir } from 'node:os';
import { join } from 'node:path';

const APP_DIR = 'repoctx';

/**
 * Get the repoctx home directory based on platform conventions.
 *
 * Priority:
 * 1. REPOCTX_HOME environment variable (override)
 * 2. Platform-specific:
 *    - Linux: $XDG_DATA_HOME/repoctx or ~/.local/share/repoctx
 *    - macOS: ~/Library/Application Support/repoctx
 *    - Windows: %APPDATA%/repoctx
 */
export function getRepoctxHome(): string {
  const envHome = process.env['REPOCTX_HOME'];
  if (envHome) {
    return envHome;
  }

  const home = homedir();

  switch (process.platform) {
    case 'darwin':
      return join(home, 'Library', 'Application Support', APP_DIR);

    case 'win32': {
      const appData = process.env['APPDATA'];
      if (appData) {
        return join(appData, APP_DIR);
      }
      return join(home, 'AppData', 'Roaming', APP_DIR);
    }

    default: {
      const xdgDataHome = process.env['XDG_DATA_HOME'];
      if (xdgDataHome) {
        return join(xdgDataHome, APP_DIR);
      }
      return join(home, '.local', 'share', APP_DIR);
    }
  }
}

/**
 * Get the path to the config file.
 */
export function getConfigPath(): string {
  return join(getRepoctxHome(), 'config.json');
}

/**
 * Get the path to the persisted context cache.
 */
export function getCachePath(): string {
  return join(getRepoctxHome(), 'cache', 'context-cache.json');
}
