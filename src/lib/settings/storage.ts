import fs from "fs";
import os from "os";
import path from "path";
import { DEFAULT_SETTINGS, validateSettings, type Settings } from "./types.js";

const SETTINGS_DIR_NAME = ".modal-prompt";
const SETTINGS_FILE_NAME = "settings.json";

export function defaultSettingsPath(): string {
  return path.join(os.homedir(), SETTINGS_DIR_NAME, SETTINGS_FILE_NAME);
}

/**
 * Load settings from disk. Falls back to the defaults when the file is
 * missing, unreadable or malformed.
 */
export function loadSettings(settingsPath: string): Settings {
  if (!fs.existsSync(settingsPath)) {
    return { ...DEFAULT_SETTINGS };
  }

  try {
    const content = fs.readFileSync(settingsPath, "utf-8");
    const parsed: unknown = JSON.parse(content);

    if (!validateSettings(parsed)) {
      console.error("Invalid settings file format:", settingsPath);
      return { ...DEFAULT_SETTINGS };
    }

    return parsed;
  } catch (error) {
    console.error("Failed to load settings:", error);
    return { ...DEFAULT_SETTINGS };
  }
}

/**
 * Save settings to disk (atomic write)
 */
export function saveSettings(settingsPath: string, settings: Settings): void {
  const dir = path.dirname(settingsPath);
  const tempFile = path.join(dir, `.${path.basename(settingsPath)}.tmp`);

  try {
    // Ensure directory exists
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    // Write to temp file first
    fs.writeFileSync(tempFile, JSON.stringify(settings, null, 2), "utf-8");

    // Atomic rename
    fs.renameSync(tempFile, settingsPath);
  } catch (error) {
    // Clean up temp file if it exists
    if (fs.existsSync(tempFile)) {
      fs.unlinkSync(tempFile);
    }
    throw error;
  }
}
