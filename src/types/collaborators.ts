import type { PromptEngineError } from "../errors";
import type { Result } from "../result";
import type { PromptEvent } from "../coordinator/events";
import type { FeatureConfig, PromptHistory, PromptOutcome, PromptVariant, UserActivity, UserType } from "./prompt";

export type StorageResult<T> = Promise<Result<T, PromptEngineError>>;

export interface ActivityStorage {
  /** Empty activity when nothing has been stored yet. */
  currentActivity(): StorageResult<UserActivity>;
  save(activity: UserActivity): StorageResult<void>;
  deleteActivity(): StorageResult<void>;
}

export interface PromptHistoryStorage {
  /** Empty history when nothing has been stored yet. */
  loadHistory(): StorageResult<PromptHistory>;
  saveHistory(history: PromptHistory): StorageResult<void>;
  deleteHistory(): StorageResult<void>;
}

export interface FeatureFlagProvider {
  isEnabled(): boolean;
  settings(): FeatureConfig;
}

export interface UserTypeProvider {
  currentUserType(): UserType;
}

export interface InstallDateProvider {
  installDate(): Date | null;
}

export interface DefaultBrowserStatusProvider {
  isDefault(): Promise<boolean>;
}

export interface OnboardingCompletionProvider {
  isOnboardingCompleted(): boolean;
}

export interface PresentationOptions {
  /** Aborted when the application abandons the presentation. */
  signal: AbortSignal;
}

export interface Presenter {
  present(variant: PromptVariant, options: PresentationOptions): Promise<PromptOutcome>;
}

export interface EventMapper {
  fire(event: PromptEvent): void;
}
