import {
  EMPTY_PROMPT_HISTORY,
  EMPTY_USER_ACTIVITY,
  freezeActivity,
  freezeHistory,
  isPromptVariant,
  type PromptHistory,
  type UserActivity,
} from "../types/prompt";

export const STATE_FILE_VERSION = 1;

export interface StoredUserActivity {
  version: number;
  lastActiveDate: string | null;
  numberOfActiveDays: number;
}

export interface StoredPromptHistory {
  version: number;
  timesShown: number;
  lastShownDate: string | null;
  permanentlyDismissed: boolean;
  lastVariant: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseDate(value: unknown): Date | null {
  if (typeof value !== "string") {
    return null;
  }

  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

function parseCount(value: unknown): number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : 0;
}

export function encodeActivity(activity: UserActivity): StoredUserActivity {
  return {
    version: STATE_FILE_VERSION,
    lastActiveDate: activity.lastActiveDate?.toISOString() ?? null,
    numberOfActiveDays: activity.numberOfActiveDays,
  };
}

export function decodeActivity(value: unknown): UserActivity {
  if (!isRecord(value)) {
    return EMPTY_USER_ACTIVITY;
  }

  return freezeActivity({
    lastActiveDate: parseDate(value.lastActiveDate),
    numberOfActiveDays: parseCount(value.numberOfActiveDays),
  });
}

export function encodeHistory(history: PromptHistory): StoredPromptHistory {
  return {
    version: STATE_FILE_VERSION,
    timesShown: history.timesShown,
    lastShownDate: history.lastShownDate?.toISOString() ?? null,
    permanentlyDismissed: history.permanentlyDismissed,
    lastVariant: history.lastVariant,
  };
}

export function decodeHistory(value: unknown): PromptHistory {
  if (!isRecord(value)) {
    return EMPTY_PROMPT_HISTORY;
  }

  return freezeHistory({
    timesShown: parseCount(value.timesShown),
    lastShownDate: parseDate(value.lastShownDate),
    permanentlyDismissed: value.permanentlyDismissed === true,
    lastVariant: isPromptVariant(value.lastVariant) ? value.lastVariant : null,
  });
}
