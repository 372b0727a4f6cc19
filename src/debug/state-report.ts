import type { DayCalendar } from "../calendar";
import type { PromptCoordinator } from "../coordinator";
import type { PromptDecision } from "../decider";
import type { DefaultBrowserInfo, DefaultStatusCache } from "../default-status";
import type { PromptEngineError } from "../errors";
import { ok, type Result } from "../result";
import type { PromptVariant, UserType } from "../types/prompt";

export interface PromptStateReport {
  timeZone: string;
  today: string;
  userType: UserType;
  installDate: string | null;
  daysSinceInstall: number | null;
  numberOfActiveDays: number;
  lastActiveDate: string | null;
  timesShown: number;
  lastShownDate: string | null;
  lastVariant: PromptVariant | null;
  permanentlyDismissed: boolean;
  defaultBrowser: DefaultBrowserInfo;
  decision: PromptDecision;
}

export interface StateReportSources {
  coordinator: PromptCoordinator;
  statusCache: DefaultStatusCache;
  calendar: DayCalendar;
}

/**
 * Snapshot of everything the next evaluation would look at, plus the decision
 * it would reach. Read-only.
 */
export async function describePromptState(
  sources: StateReportSources,
): Promise<Result<PromptStateReport, PromptEngineError>> {
  const previewResult = await sources.coordinator.previewDecision();
  if (!previewResult.ok) {
    return previewResult;
  }

  const { input, decision } = previewResult.value;
  const { calendar } = sources;
  const dayOrNull = (date: Date | null): string | null => (date === null ? null : calendar.dayKey(date));

  return ok({
    timeZone: calendar.timeZone,
    today: calendar.dayKey(input.today),
    userType: input.userType,
    installDate: dayOrNull(input.installDate),
    daysSinceInstall: input.installDate === null ? null : calendar.daysBetween(input.installDate, input.today),
    numberOfActiveDays: input.activity.numberOfActiveDays,
    lastActiveDate: dayOrNull(input.activity.lastActiveDate),
    timesShown: input.history.timesShown,
    lastShownDate: dayOrNull(input.history.lastShownDate),
    lastVariant: input.history.lastVariant,
    permanentlyDismissed: input.history.permanentlyDismissed,
    defaultBrowser: sources.statusCache.info(),
    decision,
  });
}

export function formatPromptStateReport(report: PromptStateReport): string {
  const decision = report.decision.kind === "show"
    ? `show ${report.decision.variant}`
    : `none (${report.decision.reason})`;

  return [
    `Installation: ${report.installDate ?? "unknown"} (${report.daysSinceInstall ?? "?"} days ago, ${report.userType} user)`,
    `Activity: ${report.numberOfActiveDays} active days, last ${report.lastActiveDate ?? "never"}`,
    `Prompt: shown ${report.timesShown} times, last ${report.lastShownDate ?? "never"}${report.lastVariant === null ? "" : ` (${report.lastVariant})`}`,
    `Permanently dismissed: ${report.permanentlyDismissed ? "yes" : "no"}`,
    `Default browser: ${report.defaultBrowser.isDefaultBrowser ? "yes" : "no"} (checked ${report.defaultBrowser.numberOfTimesChecked} times)`,
    `Decision on ${report.today} [${report.timeZone}]: ${decision}`,
  ].join("\n");
}
