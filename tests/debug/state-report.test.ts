import { describe, expect, it } from "vitest";

import { createPromptEngine } from "../../src/engine";
import { formatPromptStateReport, type PromptStateReport } from "../../src/debug";
import { InMemoryActivityStorage, InMemoryPromptHistoryStorage } from "../../src/storage";
import { answeringPresenter, makeConfig, recordingEventMapper, staticFlags } from "../helpers/fakes";

function makeReport(overrides: Partial<PromptStateReport> = {}): PromptStateReport {
  return {
    timeZone: "Europe/Berlin",
    today: "2025-06-24",
    userType: "returning",
    installDate: "2025-06-14",
    daysSinceInstall: 10,
    numberOfActiveDays: 5,
    lastActiveDate: "2025-06-23",
    timesShown: 1,
    lastShownDate: "2025-06-10",
    lastVariant: "firstPrompt",
    permanentlyDismissed: false,
    defaultBrowser: {
      isDefaultBrowser: false,
      lastSuccessfulCheckDate: null,
      lastAttemptedCheckDate: null,
      numberOfTimesChecked: 2,
    },
    decision: { kind: "none", reason: "reshow_interval_not_elapsed" },
    ...overrides,
  };
}

describe("describePromptState", () => {
  it("reports the inputs and the decision the next evaluation would take", async () => {
    const presenter = answeringPresenter("accepted");
    const engineResult = createPromptEngine({
      defaultBrowserStatus: { isDefault: () => Promise.resolve(false) },
      userTypeProvider: { currentUserType: () => "existing" },
      installDateProvider: { installDate: () => new Date("2025-06-14T12:00:00.000Z") },
      onboarding: { isOnboardingCompleted: () => true },
      presenter,
      eventMapper: recordingEventMapper(),
      activityStorage: new InMemoryActivityStorage({
        lastActiveDate: new Date("2025-06-23T00:00:00.000Z"),
        numberOfActiveDays: 3,
      }),
      historyStorage: new InMemoryPromptHistoryStorage(),
      featureFlags: staticFlags(makeConfig()),
      timeZone: "UTC",
      defaultStatus: { initialStatus: false },
      now: () => new Date("2025-06-24T12:00:00.000Z"),
      logging: { logLevel: "silent" },
    });
    expect(engineResult.ok).toBe(true);
    if (!engineResult.ok) return;

    await engineResult.value.start();
    const result = await engineResult.value.describeState();

    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const { defaultBrowser, ...rest } = result.value;
    expect(rest).toEqual({
      timeZone: "UTC",
      today: "2025-06-24",
      userType: "existing",
      installDate: "2025-06-14",
      daysSinceInstall: 10,
      numberOfActiveDays: 3,
      lastActiveDate: "2025-06-23",
      timesShown: 0,
      lastShownDate: null,
      lastVariant: null,
      permanentlyDismissed: false,
      decision: { kind: "show", variant: "firstPrompt" },
    });
    expect(defaultBrowser.isDefaultBrowser).toBe(false);
    expect(presenter.present).not.toHaveBeenCalled();
  });
});

describe("formatPromptStateReport", () => {
  it("renders one line per concern", () => {
    expect(formatPromptStateReport(makeReport()).split("\n")).toEqual([
      "Installation: 2025-06-14 (10 days ago, returning user)",
      "Activity: 5 active days, last 2025-06-23",
      "Prompt: shown 1 times, last 2025-06-10 (firstPrompt)",
      "Permanently dismissed: no",
      "Default browser: no (checked 2 times)",
      "Decision on 2025-06-24 [Europe/Berlin]: none (reshow_interval_not_elapsed)",
    ]);
  });

  it("marks unknown and never-set values", () => {
    const text = formatPromptStateReport(makeReport({
      userType: "new",
      installDate: null,
      daysSinceInstall: null,
      numberOfActiveDays: 0,
      lastActiveDate: null,
      timesShown: 0,
      lastShownDate: null,
      lastVariant: null,
      decision: { kind: "show", variant: "firstPrompt" },
    }));

    expect(text.split("\n")).toEqual([
      "Installation: unknown (? days ago, new user)",
      "Activity: 0 active days, last never",
      "Prompt: shown 0 times, last never",
      "Permanently dismissed: no",
      "Default browser: no (checked 2 times)",
      "Decision on 2025-06-24 [Europe/Berlin]: show firstPrompt",
    ]);
  });
});
