import type { FeatureFlagProvider } from "../types/collaborators";
import type { FeatureConfig } from "../types/prompt";
import type { PromptSettingsStore } from "./store";

export interface SettingsFeatureFlagProviderOptions {
  /** Remote kill switch evaluated on every read. Absent means on. */
  remoteFlag?: () => boolean;
}

/** Serves {@link FeatureFlagProvider} reads from a settings store. */
export class SettingsFeatureFlagProvider implements FeatureFlagProvider {
  private readonly remoteFlag: () => boolean;

  constructor(
    private readonly store: PromptSettingsStore,
    options: SettingsFeatureFlagProviderOptions = {},
  ) {
    this.remoteFlag = options.remoteFlag ?? (() => true);
  }

  isEnabled(): boolean {
    return this.remoteFlag() && this.store.settings().enabled;
  }

  settings(): FeatureConfig {
    return this.store.settings();
  }
}
