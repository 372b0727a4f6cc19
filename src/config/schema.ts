import type { ConfigValidationIssue } from "../errors";
import { isUserType, type FeatureConfig, type UserType } from "../types/prompt";
import {
  createDefaultFeatureConfig,
  DEFAULT_FEATURE_CONFIG,
  MAX_THRESHOLD_VALUE,
  SETTINGS_SCHEMA_VERSION,
} from "./defaults";
import type { PromptSettingsDocument, SettingsValidationResult } from "./types";

type ThresholdKey = "minActiveDays" | "minInstallAgeDays" | "reshowIntervalDays" | "maxTimesShown";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates a settings draft. Fields that fail validation fall back to their
 * defaults in `config` and are reported in `issues`.
 */
export function validatePromptSettings(input: unknown): SettingsValidationResult {
  const issues: ConfigValidationIssue[] = [];

  if (!isRecord(input)) {
    issues.push({ path: "", rule: "record", message: "settings must be an object." });
    return { config: createDefaultFeatureConfig(), issues, isValid: false };
  }

  normalizeVersion(input.version, issues);

  let enabled = DEFAULT_FEATURE_CONFIG.enabled;
  if (typeof input.enabled === "boolean") {
    enabled = input.enabled;
  } else if (input.enabled !== undefined) {
    issues.push({ path: "enabled", rule: "boolean", message: "enabled must be true or false." });
  }

  const config: FeatureConfig = Object.freeze({
    enabled,
    minActiveDays: normalizeThreshold(input.minActiveDays, "minActiveDays", issues),
    minInstallAgeDays: normalizeThreshold(input.minInstallAgeDays, "minInstallAgeDays", issues),
    reshowIntervalDays: normalizeThreshold(input.reshowIntervalDays, "reshowIntervalDays", issues),
    maxTimesShown: normalizeThreshold(input.maxTimesShown, "maxTimesShown", issues),
    eligibleUserTypes: normalizeUserTypes(input.eligibleUserTypes, issues),
  });

  return { config, issues, isValid: issues.length === 0 };
}

export function toSettingsDocument(config: FeatureConfig): PromptSettingsDocument {
  return {
    version: SETTINGS_SCHEMA_VERSION,
    enabled: config.enabled,
    minActiveDays: config.minActiveDays,
    minInstallAgeDays: config.minInstallAgeDays,
    reshowIntervalDays: config.reshowIntervalDays,
    maxTimesShown: config.maxTimesShown,
    eligibleUserTypes: [...config.eligibleUserTypes],
  };
}

function normalizeVersion(value: unknown, issues: ConfigValidationIssue[]): void {
  if (value === undefined || value === SETTINGS_SCHEMA_VERSION) {
    return;
  }

  issues.push({
    path: "version",
    rule: "supported_version",
    message: `version must be ${SETTINGS_SCHEMA_VERSION}.`,
  });
}

function normalizeThreshold(value: unknown, key: ThresholdKey, issues: ConfigValidationIssue[]): number {
  if (typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_THRESHOLD_VALUE) {
    return value;
  }

  if (value !== undefined) {
    issues.push({
      path: key,
      rule: "integer_range",
      message: `${key} must be an integer between 0 and ${MAX_THRESHOLD_VALUE}.`,
    });
  }

  return DEFAULT_FEATURE_CONFIG[key];
}

function normalizeUserTypes(value: unknown, issues: ConfigValidationIssue[]): ReadonlySet<UserType> {
  if (value === undefined) {
    return new Set(DEFAULT_FEATURE_CONFIG.eligibleUserTypes);
  }

  if (!Array.isArray(value)) {
    issues.push({
      path: "eligibleUserTypes",
      rule: "array",
      message: "eligibleUserTypes must be an array of user types.",
    });
    return new Set(DEFAULT_FEATURE_CONFIG.eligibleUserTypes);
  }

  const userTypes = new Set<UserType>();
  value.forEach((candidate: unknown, index) => {
    if (isUserType(candidate)) {
      userTypes.add(candidate);
    } else {
      issues.push({
        path: `eligibleUserTypes[${index}]`,
        rule: "enum",
        message: "user types must be one of: new, returning, existing.",
      });
    }
  });

  return userTypes;
}
