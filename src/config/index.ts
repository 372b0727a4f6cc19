export {
  createDefaultFeatureConfig,
  DEFAULT_FEATURE_CONFIG,
  MAX_THRESHOLD_VALUE,
  SETTINGS_SCHEMA_VERSION,
} from "./defaults";
export { SettingsFeatureFlagProvider } from "./flag-provider";
export type { SettingsFeatureFlagProviderOptions } from "./flag-provider";
export { toSettingsDocument, validatePromptSettings } from "./schema";
export { PromptSettingsStore } from "./store";
export type { PromptSettingsDocument, PromptSettingsStoreOptions, SettingsValidationResult } from "./types";
