import { homedir } from "node:os";
import { join, win32 } from "node:path";

export const APP_DIRECTORY_NAME = "default-browser-prompt";
export const ACTIVITY_FILENAME = "activity.json";
export const HISTORY_FILENAME = "prompt-history.json";
export const SETTINGS_FILENAME = "default-browser-prompt.json5";

export interface DataRootOptions {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  homeDirectory?: string;
}

export interface PromptStatePaths {
  dataRoot: string;
  activityFile: string;
  historyFile: string;
  settingsFile: string;
}

export function getDataRoot(options: DataRootOptions = {}): string {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const homeDirectory = options.homeDirectory ?? homedir();

  if (platform === "darwin") {
    return platformJoin(platform, homeDirectory, "Library", "Application Support", APP_DIRECTORY_NAME);
  }

  if (platform === "win32") {
    const appData = env.APPDATA ?? platformJoin(platform, homeDirectory, "AppData", "Roaming");
    return platformJoin(platform, appData, APP_DIRECTORY_NAME);
  }

  const xdgDataHome = env.XDG_DATA_HOME;
  if (platform === "linux" && xdgDataHome && xdgDataHome.trim().length > 0) {
    return platformJoin(platform, xdgDataHome, APP_DIRECTORY_NAME);
  }

  return platformJoin(platform, homeDirectory, `.${APP_DIRECTORY_NAME}`);
}

export function resolvePromptStatePaths(dataRoot: string, platform: NodeJS.Platform = process.platform): PromptStatePaths {
  return {
    dataRoot,
    activityFile: platformJoin(platform, dataRoot, ACTIVITY_FILENAME),
    historyFile: platformJoin(platform, dataRoot, HISTORY_FILENAME),
    settingsFile: platformJoin(platform, dataRoot, SETTINGS_FILENAME),
  };
}

function platformJoin(platform: NodeJS.Platform, ...segments: string[]): string {
  return platform === "win32" ? win32.join(...segments) : join(...segments);
}
