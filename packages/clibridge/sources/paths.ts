import os from "node:os";
import path from "node:path";

export const DEFAULT_CLIBRIDGE_DIR = path.join(os.homedir(), ".clibridge");
export const DEFAULT_SETTINGS_PATH = path.join(DEFAULT_CLIBRIDGE_DIR, "settings.json");
