import { ok } from "../result";
import type { ActivityStorage, PromptHistoryStorage, StorageResult } from "../types/collaborators";
import {
  EMPTY_PROMPT_HISTORY,
  EMPTY_USER_ACTIVITY,
  freezeActivity,
  freezeHistory,
  type PromptHistory,
  type UserActivity,
} from "../types/prompt";

/**
 * In-memory storages for embedding hosts that persist elsewhere and for tests.
 * Values are copied on the way in and out.
 */
export class InMemoryActivityStorage implements ActivityStorage {
  private activity: UserActivity | null;

  constructor(initial?: UserActivity) {
    this.activity = initial === undefined ? null : freezeActivity(initial);
  }

  currentActivity(): StorageResult<UserActivity> {
    return Promise.resolve(ok(this.activity ?? EMPTY_USER_ACTIVITY));
  }

  save(activity: UserActivity): StorageResult<void> {
    this.activity = freezeActivity(activity);
    return Promise.resolve(ok(undefined));
  }

  deleteActivity(): StorageResult<void> {
    this.activity = null;
    return Promise.resolve(ok(undefined));
  }
}

export class InMemoryPromptHistoryStorage implements PromptHistoryStorage {
  private history: PromptHistory | null;

  constructor(initial?: PromptHistory) {
    this.history = initial === undefined ? null : freezeHistory(initial);
  }

  loadHistory(): StorageResult<PromptHistory> {
    return Promise.resolve(ok(this.history ?? EMPTY_PROMPT_HISTORY));
  }

  saveHistory(history: PromptHistory): StorageResult<void> {
    this.history = freezeHistory(history);
    return Promise.resolve(ok(undefined));
  }

  deleteHistory(): StorageResult<void> {
    this.history = null;
    return Promise.resolve(ok(undefined));
  }
}
