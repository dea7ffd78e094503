import os from 'node:os';
import path from 'node:path';

export interface DataFiles {
  dataDir: string;
  seenPath: string;
  keywordsPath: string;
}

export function getAppDataDir(
  appName: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string {
  if (platform === 'win32') {
    const base = env.LOCALAPPDATA || env.APPDATA;
    if (base) {
      return path.join(base, appName);
    }
  }

  if (platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', appName);
  }

  if (env.XDG_DATA_HOME) {
    return path.join(env.XDG_DATA_HOME, appName);
  }

  return path.join(os.homedir(), '.local', 'share', appName);
}

export function getDataFiles(dataDir: string): DataFiles {
  return {
    dataDir,
    seenPath: path.join(dataDir, 'seen.json'),
    keywordsPath: path.join(dataDir, 'keywords.json'),
  };
}
