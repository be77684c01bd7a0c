import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { Logger } from "./logger";
import { CONFIG_DIR } from "./paths";

/** Defaults applied when the matching command-line flag is absent. */
export interface LocalSettings {
  lineWidth?: number;
  byteGroupLength?: number;
  controlPictures?: boolean;
}

export const SETTINGS_FILE = join(CONFIG_DIR, "settings.json");

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Fields of the wrong type are dropped; range checks happen in DumpConfig.
function pickSettings(raw: unknown): LocalSettings {
  if (!isRecord(raw)) return {};
  const settings: LocalSettings = {};
  if (typeof raw.lineWidth === "number") settings.lineWidth = raw.lineWidth;
  if (typeof raw.byteGroupLength === "number") settings.byteGroupLength = raw.byteGroupLength;
  if (typeof raw.controlPictures === "boolean") settings.controlPictures = raw.controlPictures;
  return settings;
}

export function loadSettings(path: string = SETTINGS_FILE): LocalSettings {
  try {
    if (existsSync(path)) {
      const data = readFileSync(path, "utf-8");
      const parsed: unknown = JSON.parse(data);
      return pickSettings(parsed);
    }
  } catch (error) {
    Logger.warn("settings", "Ignoring unreadable settings file", {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return {};
}
