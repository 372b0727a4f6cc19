import { createLogger, type Logger } from "../logger";
import { ok } from "../result";
import type { ActivityStorage, PromptHistoryStorage, StorageResult } from "../types/collaborators";
import type { PromptHistory, UserActivity } from "../types/prompt";
import { decodeActivity, decodeHistory, encodeActivity, encodeHistory } from "./codec";
import { deleteJsonFile, readJsonFile, writeJsonFile } from "./json-file";

/**
 * File-backed {@link ActivityStorage}. Every read goes to disk; the file is
 * created lazily on the first save.
 */
export class FileActivityStorage implements ActivityStorage {
  private readonly logger: Logger;

  constructor(private readonly filePath: string, logger?: Logger) {
    this.logger = logger ?? createLogger("activity-storage");
  }

  async currentActivity(): StorageResult<UserActivity> {
    const readResult = await readJsonFile(this.filePath, this.logger);
    if (!readResult.ok) {
      return readResult;
    }

    return ok(decodeActivity(readResult.value));
  }

  save(activity: UserActivity): StorageResult<void> {
    return writeJsonFile(this.filePath, encodeActivity(activity));
  }

  deleteActivity(): StorageResult<void> {
    return deleteJsonFile(this.filePath);
  }
}

export class FilePromptHistoryStorage implements PromptHistoryStorage {
  private readonly logger: Logger;

  constructor(private readonly filePath: string, logger?: Logger) {
    this.logger = logger ?? createLogger("history-storage");
  }

  async loadHistory(): StorageResult<PromptHistory> {
    const readResult = await readJsonFile(this.filePath, this.logger);
    if (!readResult.ok) {
      return readResult;
    }

    return ok(decodeHistory(readResult.value));
  }

  saveHistory(history: PromptHistory): StorageResult<void> {
    return writeJsonFile(this.filePath, encodeHistory(history));
  }

  deleteHistory(): StorageResult<void> {
    return deleteJsonFile(this.filePath);
  }
}
