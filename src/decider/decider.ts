import type { DayCalendar } from "../calendar";
import type { DecisionInput, PromptDecision, SuppressReason } from "./types";

function suppress(reason: SuppressReason): PromptDecision {
  return { kind: "none", reason };
}

/**
 * Decides whether to show a default browser prompt.
 *
 * Checks run in a fixed priority order and the first one that fails names the
 * outcome:
 * 1. feature disabled
 * 2. already the default browser
 * 3. user type not eligible
 * 4. install date unknown or younger than `minInstallAgeDays`
 * 5. fewer than `minActiveDays` active days
 * 6. permanently dismissed
 * 7. `maxTimesShown` reached
 * 8. last shown fewer than `reshowIntervalDays` calendar days ago
 *
 * When every check passes the variant is `firstPrompt` for a user who has never
 * seen a prompt and `reminder` otherwise. Pure: no I/O, no clock reads.
 */
export function decidePrompt(input: DecisionInput, calendar: DayCalendar): PromptDecision {
  const { config, activity, history, today } = input;

  if (!config.enabled) {
    return suppress("feature_disabled");
  }

  if (input.isDefaultBrowser) {
    return suppress("already_default_browser");
  }

  if (!config.eligibleUserTypes.has(input.userType)) {
    return suppress("user_type_not_eligible");
  }

  if (input.installDate === null || calendar.daysBetween(input.installDate, today) < config.minInstallAgeDays) {
    return suppress("install_too_recent");
  }

  if (activity.numberOfActiveDays < config.minActiveDays) {
    return suppress("not_enough_active_days");
  }

  if (history.permanentlyDismissed) {
    return suppress("permanently_dismissed");
  }

  if (history.timesShown >= config.maxTimesShown) {
    return suppress("max_times_shown_reached");
  }

  if (history.lastShownDate !== null && calendar.daysBetween(history.lastShownDate, today) < config.reshowIntervalDays) {
    return suppress("reshow_interval_not_elapsed");
  }

  return { kind: "show", variant: history.timesShown === 0 ? "firstPrompt" : "reminder" };
}
