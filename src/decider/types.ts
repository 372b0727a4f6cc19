import type { FeatureConfig, PromptHistory, PromptVariant, UserActivity, UserType } from "../types/prompt";

export const SUPPRESS_REASONS = [
  "feature_disabled",
  "already_default_browser",
  "user_type_not_eligible",
  "install_too_recent",
  "not_enough_active_days",
  "permanently_dismissed",
  "max_times_shown_reached",
  "reshow_interval_not_elapsed",
] as const;

export type SuppressReason = (typeof SUPPRESS_REASONS)[number];

export type PromptDecision =
  | { kind: "none"; reason: SuppressReason }
  | { kind: "show"; variant: PromptVariant };

export interface DecisionInput {
  config: FeatureConfig;
  isDefaultBrowser: boolean;
  userType: UserType;
  installDate: Date | null;
  activity: UserActivity;
  history: PromptHistory;
  today: Date;
}
