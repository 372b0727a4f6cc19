import type { ActivityTracker } from "../activity";
import type { DayCalendar } from "../calendar";
import type { DefaultStatusCache } from "../default-status";
import type { PromptDecision } from "../decider";
import type { Logger } from "../logger";
import type {
  EventMapper,
  FeatureFlagProvider,
  InstallDateProvider,
  OnboardingCompletionProvider,
  Presenter,
  PromptHistoryStorage,
  UserTypeProvider,
} from "../types/collaborators";
import type { PromptHistory, PromptOutcome, PromptVariant } from "../types/prompt";

export type CoordinatorState = "idle" | "evaluating" | "presenting" | "recording";

export type PromptCycleResult =
  | { status: "skipped"; reason: "onboarding_incomplete" }
  | { status: "suppressed"; decision: Extract<PromptDecision, { kind: "none" }> }
  | { status: "presented"; variant: PromptVariant; outcome: PromptOutcome; history: PromptHistory }
  | { status: "interrupted"; variant: PromptVariant };

export interface PromptCoordinatorOptions {
  tracker: ActivityTracker;
  statusCache: DefaultStatusCache;
  historyStorage: PromptHistoryStorage;
  featureFlags: FeatureFlagProvider;
  userTypeProvider: UserTypeProvider;
  installDateProvider: InstallDateProvider;
  onboarding: OnboardingCompletionProvider;
  presenter: Presenter;
  eventMapper: EventMapper;
  calendar: DayCalendar;
  now?: () => Date;
  logger?: Logger;
}
