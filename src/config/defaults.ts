import { USER_TYPES, type FeatureConfig } from "../types/prompt";

export const SETTINGS_SCHEMA_VERSION = 1;

/** Upper bound for any day or count threshold, roughly ten years. */
export const MAX_THRESHOLD_VALUE = 3650;

/**
 * Starting document written when no settings file exists. The prompt stays off
 * until remote configuration or an operator enables it, and every threshold is
 * meant to be tuned.
 *
 * Each call builds its own `eligibleUserTypes` set; `Object.freeze` does not
 * reach into a `Set`.
 */
export function createDefaultFeatureConfig(): FeatureConfig {
  return Object.freeze({
    enabled: false,
    minActiveDays: 4,
    minInstallAgeDays: 1,
    reshowIntervalDays: 14,
    maxTimesShown: 3,
    eligibleUserTypes: new Set(USER_TYPES),
  });
}

/** Read-only reference copy; hand out {@link createDefaultFeatureConfig} results instead. */
export const DEFAULT_FEATURE_CONFIG: FeatureConfig = createDefaultFeatureConfig();
