import type { ConfigValidationIssue } from "../errors";
import type { FeatureConfig, UserType } from "../types/prompt";

/** On-disk shape of the settings document. */
export interface PromptSettingsDocument {
  version: number;
  enabled: boolean;
  minActiveDays: number;
  minInstallAgeDays: number;
  reshowIntervalDays: number;
  maxTimesShown: number;
  eligibleUserTypes: UserType[];
}

export interface SettingsValidationResult {
  config: FeatureConfig;
  issues: ConfigValidationIssue[];
  isValid: boolean;
}

export interface PromptSettingsStoreOptions {
  /** Write the default document when the file does not exist. Defaults to true. */
  createIfMissing?: boolean;
}
