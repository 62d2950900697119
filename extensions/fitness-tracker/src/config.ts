import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

export type ImageSource = {
  name: string;
  path: string;
};

export type FitnessTrackerConfig = {
  stateDir: string;
  dbPath: string;
  host: string;
  port: number;
  dashboardDir: string;
  images: ImageSource[];
  logLevel: LogLevel;
};

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8765;

const LOOPBACK_HOSTS = ["127.0.0.1", "::1", "localhost"];

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function getPortEnv(env: Env, key: string, defaultValue: number): number {
  const value = getEnv(env, key);
  if (!value || !/^\d+$/.test(value)) {
    return defaultValue;
  }
  const parsed = Number(value);
  return parsed <= 65535 ? parsed : defaultValue;
}

// The server only ever listens on loopback.
function getHostEnv(env: Env, key: string): string {
  const value = getEnv(env, key)?.toLowerCase();
  return LOOPBACK_HOSTS.find((host) => host === value) ?? DEFAULT_HOST;
}

function getLogLevelEnv(env: Env, key: string): LogLevel {
  const value = getEnv(env, key)?.toLowerCase();
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

// Running from source the dashboard sits next to this module; a build in
// dist/src/ reaches back to the package's src/dashboard.
function resolveDashboardDir(): string {
  const sourceDir = path.join(moduleDir, "dashboard");
  if (fs.existsSync(sourceDir)) {
    return sourceDir;
  }
  return path.resolve(moduleDir, "..", "..", "src", "dashboard");
}

export function resolveConfig(env: Env = process.env): FitnessTrackerConfig {
  const stateDir =
    getEnv(env, "FITNESS_TRACKER_STATE_DIR") ?? path.join(os.homedir(), ".fitness-tracker");
  const imagesDir = path.join(stateDir, "images");

  return {
    stateDir,
    dbPath: getEnv(env, "FITNESS_TRACKER_DB_PATH") ?? path.join(stateDir, "fitness_tracker.db"),
    host: getHostEnv(env, "FITNESS_TRACKER_HOST"),
    port: getPortEnv(env, "FITNESS_TRACKER_PORT", DEFAULT_PORT),
    dashboardDir: getEnv(env, "FITNESS_TRACKER_DASHBOARD_DIR") ?? resolveDashboardDir(),
    images: [
      {
        name: "activity",
        path:
          getEnv(env, "FITNESS_TRACKER_ACTIVITY_IMAGE") ?? path.join(imagesDir, "activity.jpg"),
      },
      {
        name: "nutrition",
        path:
          getEnv(env, "FITNESS_TRACKER_NUTRITION_IMAGE") ?? path.join(imagesDir, "nutrition.jpg"),
      },
    ],
    logLevel: getLogLevelEnv(env, "FITNESS_TRACKER_LOG_LEVEL"),
  };
}
