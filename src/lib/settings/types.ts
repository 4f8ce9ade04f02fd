export const SETTINGS_VERSION = 1;

// Settings as stored in the settings file
export interface Settings {
  version: number;
  /** Modal editing on the prompt; plain text input when false */
  viMode: boolean;
  /** Symbol drawn before the input */
  prompt: string;
}

export const DEFAULT_SETTINGS: Settings = {
  version: SETTINGS_VERSION,
  viMode: true,
  prompt: ">",
};

/**
 * Validate settings file structure
 */
export function validateSettings(file: unknown): file is Settings {
  if (!file || typeof file !== "object") return false;
  if (!("version" in file) || typeof file.version !== "number") return false;
  if (!("viMode" in file) || typeof file.viMode !== "boolean") return false;
  if (!("prompt" in file) || typeof file.prompt !== "string") return false;

  return true;
}
