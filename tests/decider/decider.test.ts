import { describe, expect, it } from "vitest";

import { DayCalendar } from "../../src/calendar";
import { decidePrompt, type DecisionInput } from "../../src/decider";
import { EMPTY_PROMPT_HISTORY, type PromptHistory } from "../../src/types/prompt";
import { makeConfig } from "../helpers/fakes";

const calendar = new DayCalendar("UTC");
const today = new Date("2025-06-24T12:00:00.000Z");

function makeInput(overrides: Partial<DecisionInput> = {}): DecisionInput {
  return {
    config: makeConfig(),
    isDefaultBrowser: false,
    userType: "existing",
    installDate: new Date("2025-06-14T12:00:00.000Z"),
    activity: { lastActiveDate: new Date("2025-06-24T00:00:00.000Z"), numberOfActiveDays: 3 },
    history: EMPTY_PROMPT_HISTORY,
    today,
    ...overrides,
  };
}

function history(overrides: Partial<PromptHistory>): PromptHistory {
  return { ...EMPTY_PROMPT_HISTORY, ...overrides };
}

describe("decidePrompt", () => {
  it("requires the configured number of active days before the first prompt", () => {
    const twoDays = makeInput({ activity: { lastActiveDate: today, numberOfActiveDays: 2 } });
    const threeDays = makeInput({ activity: { lastActiveDate: today, numberOfActiveDays: 3 } });

    expect(decidePrompt(twoDays, calendar)).toEqual({ kind: "none", reason: "not_enough_active_days" });
    expect(decidePrompt(threeDays, calendar)).toEqual({ kind: "show", variant: "firstPrompt" });
  });

  it("suppresses when the feature is disabled", () => {
    expect(decidePrompt(makeInput({ config: makeConfig({ enabled: false }) }), calendar)).toEqual({
      kind: "none",
      reason: "feature_disabled",
    });
  });

  it("suppresses when the app is already the default browser", () => {
    expect(decidePrompt(makeInput({ isDefaultBrowser: true }), calendar)).toEqual({
      kind: "none",
      reason: "already_default_browser",
    });
  });

  it("suppresses user types outside the eligible set", () => {
    expect(decidePrompt(makeInput({ userType: "new" }), calendar)).toEqual({
      kind: "none",
      reason: "user_type_not_eligible",
    });
  });

  it("suppresses when the install date is unknown or too recent", () => {
    expect(decidePrompt(makeInput({ installDate: null }), calendar).kind).toBe("none");
    expect(decidePrompt(makeInput({ config: makeConfig({ minInstallAgeDays: 11 }) }), calendar)).toEqual({
      kind: "none",
      reason: "install_too_recent",
    });
    expect(decidePrompt(makeInput({ config: makeConfig({ minInstallAgeDays: 10 }) }), calendar)).toEqual({
      kind: "show",
      variant: "firstPrompt",
    });
  });

  it("never shows again after a permanent dismissal", () => {
    const input = makeInput({
      history: history({ timesShown: 1, lastShownDate: new Date("2025-01-01T00:00:00.000Z"), permanentlyDismissed: true }),
    });

    expect(decidePrompt(input, calendar)).toEqual({ kind: "none", reason: "permanently_dismissed" });
  });

  it("stops once the prompt has been shown the maximum number of times", () => {
    const input = makeInput({
      history: history({ timesShown: 2, lastShownDate: new Date("2025-01-01T00:00:00.000Z") }),
    });

    expect(decidePrompt(input, calendar)).toEqual({ kind: "none", reason: "max_times_shown_reached" });
  });

  it("waits for the reshow interval before a reminder", () => {
    const sixDaysAgo = makeInput({
      history: history({ timesShown: 1, lastShownDate: new Date("2025-06-18T12:00:00.000Z") }),
    });
    const sevenDaysAgo = makeInput({
      history: history({ timesShown: 1, lastShownDate: new Date("2025-06-17T12:00:00.000Z") }),
    });

    expect(decidePrompt(sixDaysAgo, calendar)).toEqual({ kind: "none", reason: "reshow_interval_not_elapsed" });
    expect(decidePrompt(sevenDaysAgo, calendar)).toEqual({ kind: "show", variant: "reminder" });
  });

  it("measures the reshow interval in calendar days", () => {
    const input = makeInput({
      history: history({ timesShown: 1, lastShownDate: new Date("2025-06-17T23:59:00.000Z") }),
      today: new Date("2025-06-24T00:01:00.000Z"),
    });

    expect(decidePrompt(input, calendar)).toEqual({ kind: "show", variant: "reminder" });
  });

  it("reports the first failing check in priority order", () => {
    const everythingFails = makeInput({
      config: makeConfig({ enabled: false }),
      isDefaultBrowser: true,
      userType: "new",
      installDate: null,
      activity: { lastActiveDate: null, numberOfActiveDays: 0 },
      history: history({ timesShown: 5, permanentlyDismissed: true, lastShownDate: today }),
    });

    expect(decidePrompt(everythingFails, calendar)).toEqual({ kind: "none", reason: "feature_disabled" });
    expect(decidePrompt({ ...everythingFails, config: makeConfig() }, calendar)).toEqual({
      kind: "none",
      reason: "already_default_browser",
    });
    expect(decidePrompt({ ...everythingFails, config: makeConfig(), isDefaultBrowser: false }, calendar)).toEqual({
      kind: "none",
      reason: "user_type_not_eligible",
    });
  });

  it("never shows a prompt when disabled or already default, whatever the other inputs", () => {
    for (const numberOfActiveDays of [0, 3, 40]) {
      for (const timesShown of [0, 1, 5]) {
        for (const permanentlyDismissed of [false, true]) {
          const base = makeInput({
            activity: { lastActiveDate: today, numberOfActiveDays },
            history: history({ timesShown, permanentlyDismissed }),
          });

          expect(decidePrompt({ ...base, config: makeConfig({ enabled: false }) }, calendar).kind).toBe("none");
          expect(decidePrompt({ ...base, isDefaultBrowser: true }, calendar).kind).toBe("none");
        }
      }
    }
  });

  it("picks the variant from the number of prompts already shown", () => {
    const config = makeConfig({ maxTimesShown: 10, reshowIntervalDays: 0 });

    for (const timesShown of [0, 1, 2, 9]) {
      const decision = decidePrompt(makeInput({ config, history: history({ timesShown }) }), calendar);
      expect(decision).toEqual({ kind: "show", variant: timesShown === 0 ? "firstPrompt" : "reminder" });
    }
  });
});
