import { describe, expect, it, vi } from "vitest";
import { defaultSettings, loadEditorSettings, redactSettings, SettingsError } from "./settings";

describe("loadEditorSettings", () => {
  it("returns the defaults for an empty environment", () => {
    expect(loadEditorSettings({})).toEqual(defaultSettings);
  });

  it("reads the process environment by default", () => {
    vi.stubEnv("BLOCK_EDITOR_MAX_RETRIES", "7");
    try {
      expect(loadEditorSettings().maxRetries).toBe(7);
    } finally {
      vi.unstubAllEnvs();
    }
  });

  it("uses the defaults where there is no process global", () => {
    vi.stubGlobal("process", undefined);
    try {
      expect(loadEditorSettings()).toEqual(defaultSettings);
    } finally {
      vi.unstubAllGlobals();
    }
  });

  it("reads and coerces BLOCK_EDITOR_* variables", () => {
    const settings = loadEditorSettings({
      BLOCK_EDITOR_API_TOKEN: "test-secret",
      BLOCK_EDITOR_MAX_RETRIES: "5",
      BLOCK_EDITOR_RETRY_BASE_DELAY_MS: "250",
      BLOCK_EDITOR_LOG_LEVEL: "debug",
      BLOCK_EDITOR_INDICATOR_MS: "   "
    });
    expect(settings.apiToken).toBe("test-secret");
    expect(settings.maxRetries).toBe(5);
    expect(settings.retryBaseDelayMs).toBe(250);
    expect(settings.logLevel).toBe("debug");
    expect(settings.indicatorMs).toBe(1500);
    expect(Object.isFrozen(settings)).toBe(true);
  });

  it("lets explicit overrides win over the environment", () => {
    const settings = loadEditorSettings({ BLOCK_EDITOR_MAX_RETRIES: "5" }, { maxRetries: 1 });
    expect(settings.maxRetries).toBe(1);
  });

  it("reports every invalid key", () => {
    let caught: unknown;
    try {
      loadEditorSettings({
        BLOCK_EDITOR_API_BASE_URL: "not a url",
        BLOCK_EDITOR_MAX_RETRIES: "-1"
      });
    } catch (error) {
      caught = error;
    }
    if (!(caught instanceof SettingsError)) {
      throw new Error("expected a SettingsError");
    }
    const issues = caught.issues;
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^apiBaseUrl: /);
    expect(issues[1]).toMatch(/^maxRetries: /);
  });

  it("rejects a cap below the base delay", () => {
    expect(() => loadEditorSettings({}, { retryBaseDelayMs: 5000, retryMaxDelayMs: 1000 })).toThrow(
      "retryMaxDelayMs: must be at least retryBaseDelayMs"
    );
  });

  it("masks the token for logging", () => {
    const settings = loadEditorSettings({ BLOCK_EDITOR_API_TOKEN: "test-secret" });
    expect(redactSettings(settings).apiToken).toBe("***");
    expect(redactSettings(defaultSettings).apiToken).toBeUndefined();
  });
});
