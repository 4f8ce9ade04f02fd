#!/usr/bin/env node
import { render } from "ink";
import path from "path";
import App from "./src/App.js";
import { defaultSettingsPath, loadSettings } from "./src/lib/settings/storage.js";

const USAGE = "Usage: modal-prompt [--config <path>] [--no-vi]";

// Parse CLI arguments
const args = process.argv.slice(2);
let settingsPath = defaultSettingsPath();
let forceViOff = false;

for (let i = 0; i < args.length; i++) {
  const arg = args[i];
  if (arg === "--config") {
    const value = args[++i];
    if (!value) {
      console.error(USAGE);
      process.exit(1);
    }
    settingsPath = path.resolve(value);
  } else if (arg === "--no-vi") {
    forceViOff = true;
  } else {
    console.error(`Unknown argument: ${arg}`);
    console.error(USAGE);
    process.exit(1);
  }
}

const settings = loadSettings(settingsPath);
if (forceViOff) {
  settings.viMode = false;
}

console.log(`Settings: ${settingsPath}`);

const instance = render(<App settings={settings} settingsPath={settingsPath} />);

instance.waitUntilExit().then(
  () => process.exit(0),
  (error: unknown) => {
    console.error("Exited with error:", error);
    process.exit(1);
  },
);
