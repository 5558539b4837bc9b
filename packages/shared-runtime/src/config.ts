import { toFiniteNumber } from "@actionscope/protocol";

export interface CollectorSettings {
  /** Directory snapshot files are written to. */
  outputDir: string;
  autoSaveIntervalMs: number;
  partyScanIntervalMs: number;
  /** Whether incoming packets are processed at startup. */
  trackingEnabled: boolean;
}

export const DEFAULT_COLLECTOR_SETTINGS: CollectorSettings = {
  outputDir: "./data",
  autoSaveIntervalMs: 60_000,
  partyScanIntervalMs: 5000,
  trackingEnabled: true,
};

const DISABLED_FLAGS = new Set(["false", "0", "off", "no"]);

const readInterval = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = toFiniteNumber(raw, fallback);
  return value > 0 ? value : fallback;
};

const readFlag = (raw: string | undefined, fallback: boolean): boolean => {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  return !DISABLED_FLAGS.has(raw.trim().toLowerCase());
};

/**
 * Reads collector settings from environment variables, falling back to
 * {@link DEFAULT_COLLECTOR_SETTINGS} for anything missing or invalid.
 */
export const loadCollectorSettings = (
  env: Record<string, string | undefined> = process.env,
): CollectorSettings => ({
  outputDir: env.ACTIONSCOPE_OUTPUT_DIR?.trim() || DEFAULT_COLLECTOR_SETTINGS.outputDir,
  autoSaveIntervalMs: readInterval(
    env.ACTIONSCOPE_AUTOSAVE_INTERVAL_MS,
    DEFAULT_COLLECTOR_SETTINGS.autoSaveIntervalMs,
  ),
  partyScanIntervalMs: readInterval(
    env.ACTIONSCOPE_PARTY_SCAN_INTERVAL_MS,
    DEFAULT_COLLECTOR_SETTINGS.partyScanIntervalMs,
  ),
  trackingEnabled: readFlag(env.ACTIONSCOPE_TRACKING, DEFAULT_COLLECTOR_SETTINGS.trackingEnabled),
});
