import type { ActivityTracker } from "../activity";
import type { DayCalendar } from "../calendar";
import { decidePrompt, type DecisionInput, type PromptDecision } from "../decider";
import type { DefaultStatusCache } from "../default-status";
import { PromptCoordinatorError, toError, type PromptEngineError } from "../errors";
import { createLogger, type Logger } from "../logger";
import { err, ok, type Result } from "../result";
import type {
  EventMapper,
  FeatureFlagProvider,
  InstallDateProvider,
  OnboardingCompletionProvider,
  Presenter,
  PromptHistoryStorage,
  UserTypeProvider,
} from "../types/collaborators";
import {
  freezeHistory,
  isPromptOutcome,
  type FeatureConfig,
  type PromptHistory,
  type PromptOutcome,
  type PromptVariant,
} from "../types/prompt";
import { SerialQueue } from "../utils/serial-queue";
import { outcomeEvent, type PromptEvent } from "./events";
import type { CoordinatorState, PromptCoordinatorOptions, PromptCycleResult } from "./types";

type CycleResult = Result<PromptCycleResult, PromptEngineError>;

export interface DecisionPreview {
  input: DecisionInput;
  decision: PromptDecision;
}

/**
 * Runs prompt evaluation cycles:
 *
 *   idle → evaluating → idle                      (nothing to show)
 *   idle → evaluating → presenting → recording → idle
 *
 * Cycles never overlap. A trigger that arrives while a cycle is running joins
 * that cycle instead of starting another. History is written only after the
 * presenter reports a definite outcome; an abandoned presentation leaves it
 * untouched.
 */
export class PromptCoordinator {
  private readonly tracker: ActivityTracker;
  private readonly statusCache: DefaultStatusCache;
  private readonly historyStorage: PromptHistoryStorage;
  private readonly featureFlags: FeatureFlagProvider;
  private readonly userTypeProvider: UserTypeProvider;
  private readonly installDateProvider: InstallDateProvider;
  private readonly onboarding: OnboardingCompletionProvider;
  private readonly presenter: Presenter;
  private readonly eventMapper: EventMapper;
  private readonly calendar: DayCalendar;
  private readonly now: () => Date;
  private readonly logger: Logger;

  private readonly queue = new SerialQueue();
  private currentState: CoordinatorState = "idle";
  private inFlight: Promise<CycleResult> | null = null;
  private activePresentation: AbortController | null = null;
  private cycleCount = 0;

  constructor(options: PromptCoordinatorOptions) {
    this.tracker = options.tracker;
    this.statusCache = options.statusCache;
    this.historyStorage = options.historyStorage;
    this.featureFlags = options.featureFlags;
    this.userTypeProvider = options.userTypeProvider;
    this.installDateProvider = options.installDateProvider;
    this.onboarding = options.onboarding;
    this.presenter = options.presenter;
    this.eventMapper = options.eventMapper;
    this.calendar = options.calendar;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger("prompt-coordinator");
  }

  get state(): CoordinatorState {
    return this.currentState;
  }

  evaluate(): Promise<CycleResult> {
    if (this.inFlight !== null) {
      return this.inFlight;
    }

    const cycle = this.queue.run(() => this.runCycle());
    this.inFlight = cycle;
    return cycle.finally(() => {
      if (this.inFlight === cycle) {
        this.inFlight = null;
      }
    });
  }

  /**
   * Ends the current presentation without recording it. Called by the host
   * when the application is backgrounded or terminated mid-prompt.
   */
  abandonPresentation(): boolean {
    if (this.activePresentation === null) {
      return false;
    }

    this.activePresentation.abort();
    return true;
  }

  /** Computes the decision a cycle would take now, without presenting anything. */
  async previewDecision(): Promise<Result<DecisionPreview, PromptEngineError>> {
    const inputResult = await this.gatherInputs();
    if (!inputResult.ok) {
      return inputResult;
    }

    return ok({ input: inputResult.value, decision: decidePrompt(inputResult.value, this.calendar) });
  }

  /** Administrative reset. Clears the permanent dismissal too. */
  resetHistory(): Promise<Result<void, PromptEngineError>> {
    return this.queue.run(async () => {
      const deleteResult = await this.historyStorage.deleteHistory();
      if (deleteResult.ok) {
        this.logger.info("Prompt history reset");
      }

      return deleteResult;
    });
  }

  private async runCycle(): Promise<CycleResult> {
    this.cycleCount += 1;
    const logger = this.logger.withContext({ cycle: this.cycleCount });

    try {
      const onboardingResult = this.readInput("onboarding", () => this.onboarding.isOnboardingCompleted());
      if (!onboardingResult.ok) {
        return onboardingResult;
      }

      if (!onboardingResult.value) {
        logger.debug("Onboarding not completed, not evaluating prompt");
        return ok({ status: "skipped", reason: "onboarding_incomplete" });
      }

      this.transition("evaluating", logger);
      const inputResult = await this.gatherInputs();
      if (!inputResult.ok) {
        return inputResult;
      }

      const input = inputResult.value;
      const decision = decidePrompt(input, this.calendar);
      if (decision.kind === "none") {
        logger.debug("No prompt to show", { reason: decision.reason });
        return ok({ status: "suppressed", decision });
      }

      this.transition("presenting", logger);
      const presentationResult = await this.present(decision.variant, logger);
      if (!presentationResult.ok) {
        return presentationResult;
      }

      const outcome = presentationResult.value;
      if (outcome === "interrupted") {
        return ok({ status: "interrupted", variant: decision.variant });
      }

      this.transition("recording", logger);
      return await this.record(input.history, decision.variant, outcome, logger);
    } finally {
      this.transition("idle", logger);
    }
  }

  private async gatherInputs(): Promise<Result<DecisionInput, PromptEngineError>> {
    const configResult = this.readInput("feature flags", () => this.currentConfig());
    if (!configResult.ok) {
      return configResult;
    }

    const userTypeResult = this.readInput("user type", () => this.userTypeProvider.currentUserType());
    if (!userTypeResult.ok) {
      return userTypeResult;
    }

    const installDateResult = this.readInput("install date", () => this.installDateProvider.installDate());
    if (!installDateResult.ok) {
      return installDateResult;
    }

    const installDate = installDateResult.value;
    if (installDate !== null && Number.isNaN(installDate.getTime())) {
      return err(new PromptCoordinatorError("Install date is not a valid date", "PROMPT_INPUT_UNAVAILABLE"));
    }

    const today = this.now();
    if (Number.isNaN(today.getTime())) {
      return err(new PromptCoordinatorError("Current time is not a valid date", "PROMPT_INPUT_UNAVAILABLE"));
    }

    const activityResult = await this.tracker.currentActivity();
    if (!activityResult.ok) {
      return activityResult;
    }

    const historyResult = await this.historyStorage.loadHistory();
    if (!historyResult.ok) {
      this.fireEvent({ type: "historyLoadFailed", errorCode: historyResult.error.code }, this.logger);
      return historyResult;
    }

    return ok({
      config: configResult.value,
      isDefaultBrowser: this.statusCache.isDefaultBrowser(),
      userType: userTypeResult.value,
      installDate,
      activity: activityResult.value,
      history: historyResult.value,
      today,
    });
  }

  private currentConfig(): FeatureConfig {
    const settings = this.featureFlags.settings();
    return { ...settings, enabled: settings.enabled && this.featureFlags.isEnabled() };
  }

  private async present(
    variant: PromptVariant,
    logger: Logger,
  ): Promise<Result<PromptOutcome | "interrupted", PromptCoordinatorError>> {
    const controller = new AbortController();
    this.activePresentation = controller;

    const abandoned = new Promise<"interrupted">((resolve) => {
      controller.signal.addEventListener("abort", () => resolve("interrupted"), { once: true });
    });

    try {
      logger.info("Presenting default browser prompt", { variant });
      const outcome: unknown = await Promise.race([
        this.presenter.present(variant, { signal: controller.signal }),
        abandoned,
      ]);

      if (outcome === "interrupted") {
        logger.info("Presentation abandoned, history unchanged", { variant });
        return ok("interrupted");
      }

      if (!isPromptOutcome(outcome)) {
        return err(new PromptCoordinatorError(
          `Presenter returned an unknown outcome: ${String(outcome)}`,
          "PROMPT_OUTCOME_INVALID",
        ));
      }

      return ok(outcome);
    } catch (cause) {
      if (controller.signal.aborted) {
        logger.info("Presentation abandoned, history unchanged", { variant });
        return ok("interrupted");
      }

      logger.error("Prompt presentation failed", { variant, error: toError(cause) });
      return err(new PromptCoordinatorError("Prompt presentation failed", "PROMPT_PRESENTATION_FAILED", toError(cause)));
    } finally {
      if (this.activePresentation === controller) {
        this.activePresentation = null;
      }
    }
  }

  private async record(
    previous: PromptHistory,
    variant: PromptVariant,
    outcome: PromptOutcome,
    logger: Logger,
  ): Promise<CycleResult> {
    const next = freezeHistory({
      timesShown: previous.timesShown + 1,
      lastShownDate: this.now(),
      lastVariant: variant,
      permanentlyDismissed: previous.permanentlyDismissed || outcome === "dismissedPermanently",
    });

    const saveResult = await this.historyStorage.saveHistory(next);
    if (!saveResult.ok) {
      logger.error("Failed to record prompt outcome", { variant, outcome, code: saveResult.error.code });
      this.fireEvent({ type: "historySaveFailed", variant, outcome, errorCode: saveResult.error.code }, logger);
      return err(new PromptCoordinatorError(
        "Failed to record prompt outcome",
        "PROMPT_HISTORY_SAVE_FAILED",
        saveResult.error,
      ));
    }

    logger.info("Prompt outcome recorded", { variant, outcome, timesShown: next.timesShown });
    this.fireEvent(outcomeEvent(outcome, variant, next.timesShown), logger);
    return ok({ status: "presented", variant, outcome, history: next });
  }

  private fireEvent(event: PromptEvent, logger: Logger): void {
    try {
      this.eventMapper.fire(event);
    } catch (error) {
      logger.warn("Event mapper failed", { event: event.type, error: toError(error) });
    }
  }

  private readInput<T>(label: string, read: () => T): Result<T, PromptCoordinatorError> {
    try {
      return ok(read());
    } catch (cause) {
      return err(new PromptCoordinatorError(
        `Unable to read ${label}`,
        "PROMPT_INPUT_UNAVAILABLE",
        toError(cause),
      ));
    }
  }

  private transition(next: CoordinatorState, logger: Logger): void {
    if (this.currentState === next) {
      return;
    }

    logger.debug("Coordinator state change", { from: this.currentState, to: next });
    this.currentState = next;
  }
}
