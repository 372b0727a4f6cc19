import { ActivityTracker, type TickResult } from "./activity";
import { DayCalendar } from "./calendar";
import { PromptSettingsStore, SettingsFeatureFlagProvider } from "./config";
import { PromptCoordinator, type PromptCycleResult } from "./coordinator";
import { describePromptState, type PromptStateReport } from "./debug";
import { DefaultStatusCache } from "./default-status";
import type { DefaultStatusError, PromptConfigError, PromptEngineError } from "./errors";
import { createLogger, type LoggerOptions } from "./logger";
import { ok, type Result } from "./result";
import { FileActivityStorage, FilePromptHistoryStorage, getDataRoot, resolvePromptStatePaths } from "./storage";
import type {
  ActivityStorage,
  DefaultBrowserStatusProvider,
  EventMapper,
  FeatureFlagProvider,
  InstallDateProvider,
  OnboardingCompletionProvider,
  Presenter,
  PromptHistoryStorage,
  UserTypeProvider,
} from "./types/collaborators";
import type { FeatureConfig } from "./types/prompt";

export interface PromptEngineOptions {
  defaultBrowserStatus: DefaultBrowserStatusProvider;
  userTypeProvider: UserTypeProvider;
  installDateProvider: InstallDateProvider;
  onboarding: OnboardingCompletionProvider;
  presenter: Presenter;
  eventMapper: EventMapper;
  /** Directory for the state files and settings. Defaults to the platform data root. */
  dataRoot?: string;
  activityStorage?: ActivityStorage;
  historyStorage?: PromptHistoryStorage;
  /** Replaces the settings-file flag provider entirely. */
  featureFlags?: FeatureFlagProvider;
  /** Remote kill switch layered over the settings file. */
  remoteFlag?: () => boolean;
  /** IANA zone used to bucket active days. Defaults to the system zone. */
  timeZone?: string;
  defaultStatus?: {
    initialStatus?: boolean;
    minRefreshIntervalMs?: number;
  };
  now?: () => Date;
  logging?: LoggerOptions;
}

export interface StartResult {
  /** Null when the host supplied its own flag provider. */
  settings: Result<FeatureConfig, PromptConfigError> | null;
  defaultStatus: Result<boolean, DefaultStatusError>;
}

export interface ForegroundResult {
  tick: Result<TickResult, PromptEngineError>;
  cycle: Result<PromptCycleResult, PromptEngineError>;
}

export interface PromptEngine {
  readonly calendar: DayCalendar;
  readonly tracker: ActivityTracker;
  readonly statusCache: DefaultStatusCache;
  readonly coordinator: PromptCoordinator;
  /** Null when the host supplied its own flag provider. */
  readonly settingsStore: PromptSettingsStore | null;
  /**
   * Loads settings and queries the default browser status once. Failures are
   * reported but leave the engine usable on defaults and cached values.
   */
  start(): Promise<StartResult>;
  /** Host hook for "application became active": counts the day, then evaluates. */
  handleForeground(): Promise<ForegroundResult>;
  /** Host hook for backgrounding or termination. */
  handleBackground(): boolean;
  describeState(): Promise<Result<PromptStateReport, PromptEngineError>>;
}

/**
 * Builds every component once and wires them together. The host owns the
 * returned engine; nothing here is global.
 */
export function createPromptEngine(options: PromptEngineOptions): Result<PromptEngine, PromptConfigError> {
  const calendarResult = DayCalendar.create(options.timeZone);
  if (!calendarResult.ok) {
    return calendarResult;
  }

  const calendar = calendarResult.value;
  const logging = options.logging ?? {};
  const logger = createLogger("prompt-engine", logging);
  const now = options.now ?? (() => new Date());
  const paths = resolvePromptStatePaths(options.dataRoot ?? getDataRoot());

  const activityStorage = options.activityStorage
    ?? new FileActivityStorage(paths.activityFile, createLogger("activity-storage", logging));
  const historyStorage = options.historyStorage
    ?? new FilePromptHistoryStorage(paths.historyFile, createLogger("history-storage", logging));

  const { settingsStore, featureFlags } = resolveFeatureFlags(options, paths.settingsFile, logging);

  const tracker = new ActivityTracker({
    storage: activityStorage,
    calendar,
    logger: createLogger("activity-tracker", logging),
  });

  const statusCache = new DefaultStatusCache({
    provider: options.defaultBrowserStatus,
    initialStatus: options.defaultStatus?.initialStatus,
    minRefreshIntervalMs: options.defaultStatus?.minRefreshIntervalMs,
    now,
    logger: createLogger("default-status", logging),
  });

  const coordinator = new PromptCoordinator({
    tracker,
    statusCache,
    historyStorage,
    featureFlags,
    userTypeProvider: options.userTypeProvider,
    installDateProvider: options.installDateProvider,
    onboarding: options.onboarding,
    presenter: options.presenter,
    eventMapper: options.eventMapper,
    calendar,
    now,
    logger: createLogger("prompt-coordinator", logging),
  });

  return ok({
    calendar,
    tracker,
    statusCache,
    coordinator,
    settingsStore,
    async start() {
      const settings = settingsStore === null ? null : await settingsStore.load();
      const defaultStatus = await statusCache.refresh();
      logger.info("Prompt engine started", {
        timeZone: calendar.timeZone,
        settingsLoaded: settings?.ok ?? true,
        defaultStatusKnown: defaultStatus.ok,
      });
      return { settings, defaultStatus };
    },
    async handleForeground() {
      const tick = await tracker.recordTick(now());
      const cycle = await coordinator.evaluate();
      return { tick, cycle };
    },
    handleBackground() {
      return coordinator.abandonPresentation();
    },
    describeState() {
      return describePromptState({ coordinator, statusCache, calendar });
    },
  });
}

function resolveFeatureFlags(
  options: PromptEngineOptions,
  settingsFile: string,
  logging: LoggerOptions,
): { settingsStore: PromptSettingsStore | null; featureFlags: FeatureFlagProvider } {
  if (options.featureFlags !== undefined) {
    return { settingsStore: null, featureFlags: options.featureFlags };
  }

  const settingsStore = new PromptSettingsStore(settingsFile, {}, createLogger("prompt-settings", logging));
  return {
    settingsStore,
    featureFlags: new SettingsFeatureFlagProvider(settingsStore, { remoteFlag: options.remoteFlag }),
  };
}
