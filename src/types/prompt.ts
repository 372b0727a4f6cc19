export const USER_TYPES = ["new", "returning", "existing"] as const;
export type UserType = (typeof USER_TYPES)[number];

export const PROMPT_VARIANTS = ["firstPrompt", "reminder"] as const;
export type PromptVariant = (typeof PROMPT_VARIANTS)[number];

export const PROMPT_OUTCOMES = ["accepted", "dismissed", "dismissedPermanently"] as const;
export type PromptOutcome = (typeof PROMPT_OUTCOMES)[number];

export interface UserActivity {
  readonly lastActiveDate: Date | null;
  readonly numberOfActiveDays: number;
}

export interface PromptHistory {
  readonly timesShown: number;
  readonly lastShownDate: Date | null;
  readonly permanentlyDismissed: boolean;
  readonly lastVariant: PromptVariant | null;
}

export interface FeatureConfig {
  readonly enabled: boolean;
  readonly minActiveDays: number;
  readonly minInstallAgeDays: number;
  readonly reshowIntervalDays: number;
  readonly maxTimesShown: number;
  readonly eligibleUserTypes: ReadonlySet<UserType>;
}

export const EMPTY_USER_ACTIVITY: UserActivity = Object.freeze({
  lastActiveDate: null,
  numberOfActiveDays: 0,
});

export const EMPTY_PROMPT_HISTORY: PromptHistory = Object.freeze({
  timesShown: 0,
  lastShownDate: null,
  permanentlyDismissed: false,
  lastVariant: null,
});

export function isUserType(value: unknown): value is UserType {
  return USER_TYPES.some((candidate) => candidate === value);
}

export function isPromptVariant(value: unknown): value is PromptVariant {
  return PROMPT_VARIANTS.some((candidate) => candidate === value);
}

export function isPromptOutcome(value: unknown): value is PromptOutcome {
  return PROMPT_OUTCOMES.some((candidate) => candidate === value);
}

export function freezeActivity(activity: UserActivity): UserActivity {
  return Object.freeze({
    lastActiveDate: activity.lastActiveDate === null ? null : new Date(activity.lastActiveDate.getTime()),
    numberOfActiveDays: activity.numberOfActiveDays,
  });
}

export function freezeHistory(history: PromptHistory): PromptHistory {
  return Object.freeze({
    timesShown: history.timesShown,
    lastShownDate: history.lastShownDate === null ? null : new Date(history.lastShownDate.getTime()),
    permanentlyDismissed: history.permanentlyDismissed,
    lastVariant: history.lastVariant,
  });
}
