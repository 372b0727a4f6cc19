import { describe, expect, it } from "vitest";

import {
  DEFAULT_FEATURE_CONFIG,
  toSettingsDocument,
  validatePromptSettings,
} from "../../src/config";

describe("validatePromptSettings", () => {
  it("accepts a complete settings document", () => {
    const result = validatePromptSettings({
      version: 1,
      enabled: true,
      minActiveDays: 3,
      minInstallAgeDays: 0,
      reshowIntervalDays: 7,
      maxTimesShown: 2,
      eligibleUserTypes: ["existing", "returning"],
    });

    expect(result.isValid).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.config.enabled).toBe(true);
    expect(result.config.minActiveDays).toBe(3);
    expect(result.config.minInstallAgeDays).toBe(0);
    expect(result.config.reshowIntervalDays).toBe(7);
    expect(result.config.maxTimesShown).toBe(2);
    expect([...result.config.eligibleUserTypes]).toEqual(["existing", "returning"]);
  });

  it("fills omitted fields from the defaults", () => {
    const result = validatePromptSettings({ enabled: true });

    expect(result.isValid).toBe(true);
    expect(result.config.minActiveDays).toBe(DEFAULT_FEATURE_CONFIG.minActiveDays);
    expect(result.config.maxTimesShown).toBe(DEFAULT_FEATURE_CONFIG.maxTimesShown);
    expect(result.config.eligibleUserTypes).toEqual(DEFAULT_FEATURE_CONFIG.eligibleUserTypes);
  });

  it("reports every invalid field with its path and rule", () => {
    const result = validatePromptSettings({
      minActiveDays: -1,
      enabled: "yes",
      eligibleUserTypes: ["new", "vip"],
    });

    expect(result.isValid).toBe(false);
    expect(result.issues.map((issue) => issue.path)).toEqual([
      "enabled",
      "minActiveDays",
      "eligibleUserTypes[1]",
    ]);
    expect(result.issues.map((issue) => issue.rule)).toEqual(["boolean", "integer_range", "enum"]);
    expect(result.config.enabled).toBe(false);
    expect(result.config.minActiveDays).toBe(DEFAULT_FEATURE_CONFIG.minActiveDays);
    expect([...result.config.eligibleUserTypes]).toEqual(["new"]);
  });

  it("rejects fractional and oversized thresholds", () => {
    const result = validatePromptSettings({ reshowIntervalDays: 1.5, maxTimesShown: 4000 });

    expect(result.issues).toEqual([
      {
        path: "reshowIntervalDays",
        rule: "integer_range",
        message: "reshowIntervalDays must be an integer between 0 and 3650.",
      },
      {
        path: "maxTimesShown",
        rule: "integer_range",
        message: "maxTimesShown must be an integer between 0 and 3650.",
      },
    ]);
  });

  it("rejects an unsupported version and a non-array user type list", () => {
    const result = validatePromptSettings({ version: 2, eligibleUserTypes: "existing" });

    expect(result.issues.map((issue) => [issue.path, issue.rule])).toEqual([
      ["version", "supported_version"],
      ["eligibleUserTypes", "array"],
    ]);
  });

  it("rejects a document that is not an object", () => {
    const result = validatePromptSettings([1, 2]);

    expect(result.isValid).toBe(false);
    expect(result.issues).toEqual([{ path: "", rule: "record", message: "settings must be an object." }]);
    expect(result.config).toEqual(DEFAULT_FEATURE_CONFIG);
  });

  it("gives every result its own user type set", () => {
    const first = validatePromptSettings({});
    const second = validatePromptSettings({ eligibleUserTypes: 7 });
    const third = validatePromptSettings(null);

    expect(first.config.eligibleUserTypes).not.toBe(second.config.eligibleUserTypes);
    expect(first.config.eligibleUserTypes).not.toBe(third.config.eligibleUserTypes);
    expect(first.config.eligibleUserTypes).not.toBe(DEFAULT_FEATURE_CONFIG.eligibleUserTypes);
    expect([...second.config.eligibleUserTypes]).toEqual(["new", "returning", "existing"]);
  });

  it("round-trips through the settings document shape", () => {
    const document = toSettingsDocument(DEFAULT_FEATURE_CONFIG);

    expect(document).toEqual({
      version: 1,
      enabled: false,
      minActiveDays: 4,
      minInstallAgeDays: 1,
      reshowIntervalDays: 14,
      maxTimesShown: 3,
      eligibleUserTypes: ["new", "returning", "existing"],
    });
    expect(validatePromptSettings(document).isValid).toBe(true);
  });
});
