import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import path from "node:path";
import { parse as parseToml } from "smol-toml";
import { InvalidConfigError } from "./errors";

export const DEFAULT_MAX_TRY_TIMES = 3;
export const DEFAULT_MIN_FETCH_INTERVAL_MS = 1_000;
export const DEFAULT_BACKOFF_MIN_MS = 1_000;
export const DEFAULT_BACKOFF_MAX_MS = 60_000;

/** Resolved settings from the config file profile and environment variables. */
export interface Profile {
  maxTryTimes?: number;
  minFetchIntervalMs?: number;
  backoffMinMs?: number;
  backoffMaxMs?: number;
  logLevel?: string;
}

/** Settings a client runs with for its whole lifetime. */
export interface RefreshSettings {
  maxTryTimes: number;
  minFetchIntervalMs: number;
  backoffMinMs: number;
  backoffMaxMs: number;
  logLevel: string;
}

type ProfileTable = Record<string, unknown>;

export function configFilePath(): string {
  const configPath = process.env["STS_AUTOREFRESH_CONFIG_PATH"];
  if (configPath && configPath !== "") {
    return configPath;
  }
  return path.join(homedir(), ".sts-autorefresh.toml");
}

function readConfigFile(): Record<string, ProfileTable> {
  let content: string;
  try {
    content = readFileSync(configFilePath(), { encoding: "utf-8" });
  } catch {
    // A missing or unreadable file means no profiles.
    return {};
  }

  let parsed: ReturnType<typeof parseToml>;
  try {
    parsed = parseToml(content);
  } catch {
    return {};
  }

  const profiles: Record<string, ProfileTable> = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (isTable(value)) {
      profiles[name] = value;
    }
  }
  return profiles;
}

function isTable(value: unknown): value is ProfileTable {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function numberField(table: ProfileTable, key: string): number | undefined {
  const value = table[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  throw new InvalidConfigError(
    `Config key "${key}" must be a number, found ${typeof value}`,
  );
}

function stringField(table: ProfileTable, key: string): string | undefined {
  const value = table[key];
  return typeof value === "string" ? value : undefined;
}

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === "") {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new InvalidConfigError(
      `Environment variable ${name} must be a number, found "${raw}"`,
    );
  }
  return value;
}

/**
 * Reads the named profile (else `STS_AUTOREFRESH_PROFILE`, else the one marked
 * `active = true`) from the config file and overlays the `STS_AUTOREFRESH_*` environment variables.
 */
export function getProfile(profileName?: string): Profile {
  const config = readConfigFile();

  profileName ||= process.env["STS_AUTOREFRESH_PROFILE"] || undefined;
  if (!profileName) {
    for (const [name, profileData] of Object.entries(config)) {
      if (profileData["active"] === true) {
        profileName = name;
        break;
      }
    }
  }
  const profileData: ProfileTable =
    profileName && Object.hasOwn(config, profileName)
      ? config[profileName]
      : {};

  return {
    maxTryTimes:
      envNumber("STS_AUTOREFRESH_MAX_TRY_TIMES") ??
      numberField(profileData, "max_try_times"),
    minFetchIntervalMs:
      envNumber("STS_AUTOREFRESH_MIN_FETCH_INTERVAL_MS") ??
      numberField(profileData, "min_fetch_interval_ms"),
    backoffMinMs:
      envNumber("STS_AUTOREFRESH_BACKOFF_MIN_MS") ??
      numberField(profileData, "backoff_min_ms"),
    backoffMaxMs:
      envNumber("STS_AUTOREFRESH_BACKOFF_MAX_MS") ??
      numberField(profileData, "backoff_max_ms"),
    logLevel:
      process.env["STS_AUTOREFRESH_LOGLEVEL"] ||
      stringField(profileData, "log_level"),
  };
}

/** Merges explicit settings over a profile, fills defaults, and validates. */
export function resolveRefreshSettings(
  params: Partial<RefreshSettings>,
  profile: Profile = {},
): RefreshSettings {
  const settings: RefreshSettings = {
    maxTryTimes:
      params.maxTryTimes ?? profile.maxTryTimes ?? DEFAULT_MAX_TRY_TIMES,
    minFetchIntervalMs:
      params.minFetchIntervalMs ??
      profile.minFetchIntervalMs ??
      DEFAULT_MIN_FETCH_INTERVAL_MS,
    backoffMinMs:
      params.backoffMinMs ?? profile.backoffMinMs ?? DEFAULT_BACKOFF_MIN_MS,
    backoffMaxMs:
      params.backoffMaxMs ?? profile.backoffMaxMs ?? DEFAULT_BACKOFF_MAX_MS,
    logLevel: params.logLevel || profile.logLevel || "",
  };

  if (!Number.isInteger(settings.maxTryTimes) || settings.maxTryTimes < 1) {
    throw new InvalidConfigError(
      `Invalid maxTryTimes: ${settings.maxTryTimes}. Must be an integer of at least 1.`,
    );
  }
  if (
    !Number.isFinite(settings.minFetchIntervalMs) ||
    settings.minFetchIntervalMs < 0
  ) {
    throw new InvalidConfigError(
      `Invalid minFetchIntervalMs: ${settings.minFetchIntervalMs}. Must be a non-negative number.`,
    );
  }
  if (!Number.isFinite(settings.backoffMinMs) || settings.backoffMinMs <= 0) {
    throw new InvalidConfigError(
      `Invalid backoffMinMs: ${settings.backoffMinMs}. Must be a positive number.`,
    );
  }
  if (
    !Number.isFinite(settings.backoffMaxMs) ||
    settings.backoffMaxMs < settings.backoffMinMs
  ) {
    throw new InvalidConfigError(
      `Invalid backoffMaxMs: ${settings.backoffMaxMs}. Must be at least backoffMinMs (${settings.backoffMinMs}).`,
    );
  }
  return settings;
}
