import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  configFilePath,
  getProfile,
  resolveRefreshSettings,
} from "../src/config";
import { InvalidConfigError } from "../src/errors";

const CONFIG = `
[default]
max_try_times = 4
min_fetch_interval_ms = 500

[prod]
active = true
max_try_times = 6
backoff_max_ms = 30000
log_level = "debug"

[broken]
max_try_times = "many"
`;

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(path.join(tmpdir(), "sts-autorefresh-"));
  const file = path.join(dir, "config.toml");
  writeFileSync(file, CONFIG);
  vi.stubEnv("STS_AUTOREFRESH_CONFIG_PATH", file);
  vi.stubEnv("STS_AUTOREFRESH_MAX_TRY_TIMES", "");
  vi.stubEnv("STS_AUTOREFRESH_MIN_FETCH_INTERVAL_MS", "");
  vi.stubEnv("STS_AUTOREFRESH_BACKOFF_MIN_MS", "");
  vi.stubEnv("STS_AUTOREFRESH_BACKOFF_MAX_MS", "");
  vi.stubEnv("STS_AUTOREFRESH_LOGLEVEL", "");
  vi.stubEnv("STS_AUTOREFRESH_PROFILE", "");
});

afterEach(() => {
  vi.unstubAllEnvs();
  rmSync(dir, { recursive: true, force: true });
});

test("GetConfigPath_WithEnvVar", () => {
  vi.stubEnv("STS_AUTOREFRESH_CONFIG_PATH", "/custom/path/to/config.toml");
  expect(configFilePath()).toBe("/custom/path/to/config.toml");
});

test("GetConfigPath_WithoutEnvVar", () => {
  vi.stubEnv("STS_AUTOREFRESH_CONFIG_PATH", undefined);
  expect(configFilePath()).toBe(
    path.join(homedir(), ".sts-autorefresh.toml"),
  );
});

describe("getProfile", () => {
  test("uses the active profile by default", () => {
    expect(getProfile()).toEqual({
      maxTryTimes: 6,
      backoffMaxMs: 30_000,
      logLevel: "debug",
    });
  });

  test("uses a named profile", () => {
    expect(getProfile("default")).toEqual({
      maxTryTimes: 4,
      minFetchIntervalMs: 500,
    });
  });

  test("the profile can be chosen through the environment", () => {
    vi.stubEnv("STS_AUTOREFRESH_PROFILE", "default");
    expect(getProfile()).toEqual({
      maxTryTimes: 4,
      minFetchIntervalMs: 500,
    });
  });

  test("environment variables override the profile", () => {
    vi.stubEnv("STS_AUTOREFRESH_MAX_TRY_TIMES", "9");
    vi.stubEnv("STS_AUTOREFRESH_LOGLEVEL", "error");

    expect(getProfile("default")).toEqual({
      maxTryTimes: 9,
      minFetchIntervalMs: 500,
      logLevel: "error",
    });
  });

  test("a missing file yields an empty profile", () => {
    vi.stubEnv("STS_AUTOREFRESH_CONFIG_PATH", path.join(dir, "missing.toml"));
    expect(getProfile("default")).toEqual({});
  });

  test("an unparsable file yields an empty profile", () => {
    const file = path.join(dir, "bad.toml");
    writeFileSync(file, "[default\nmax_try_times = ");
    vi.stubEnv("STS_AUTOREFRESH_CONFIG_PATH", file);
    expect(getProfile("default")).toEqual({});
  });

  test("rejects values of the wrong type", () => {
    expect(() => getProfile("broken")).toThrow(
      'Config key "max_try_times" must be a number, found string',
    );
  });

  test("rejects a non-numeric environment variable", () => {
    vi.stubEnv("STS_AUTOREFRESH_BACKOFF_MIN_MS", "soon");
    expect(() => getProfile()).toThrow(InvalidConfigError);
  });
});

describe("resolveRefreshSettings", () => {
  test("fills defaults", () => {
    expect(resolveRefreshSettings({})).toEqual({
      maxTryTimes: 3,
      minFetchIntervalMs: 1_000,
      backoffMinMs: 1_000,
      backoffMaxMs: 60_000,
      logLevel: "",
    });
  });

  test("explicit settings win over the profile", () => {
    expect(
      resolveRefreshSettings(
        { maxTryTimes: 2, minFetchIntervalMs: 0 },
        { maxTryTimes: 6, minFetchIntervalMs: 500, backoffMaxMs: 30_000 },
      ),
    ).toEqual({
      maxTryTimes: 2,
      minFetchIntervalMs: 0,
      backoffMinMs: 1_000,
      backoffMaxMs: 30_000,
      logLevel: "",
    });
  });

  test("validates ranges", () => {
    expect(() => resolveRefreshSettings({ maxTryTimes: 0 })).toThrow(
      /maxTryTimes/,
    );
    expect(() => resolveRefreshSettings({ maxTryTimes: 1.5 })).toThrow(
      /maxTryTimes/,
    );
    expect(() => resolveRefreshSettings({ minFetchIntervalMs: -1 })).toThrow(
      /minFetchIntervalMs/,
    );
    expect(() => resolveRefreshSettings({ backoffMinMs: 0 })).toThrow(
      /backoffMinMs/,
    );
    expect(() =>
      resolveRefreshSettings({ backoffMinMs: 5_000, backoffMaxMs: 1_000 }),
    ).toThrow(/backoffMaxMs/);
  });
});
