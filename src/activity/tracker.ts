import type { DayCalendar } from "../calendar";
import { PromptEngineError } from "../errors";
import { createLogger, type Logger } from "../logger";
import { err, ok, type Result } from "../result";
import type { ActivityStorage } from "../types/collaborators";
import { freezeActivity, type UserActivity } from "../types/prompt";
import { SerialQueue } from "../utils/serial-queue";

export interface TickResult {
  /** False when the tick fell on an already-counted day. */
  recorded: boolean;
  activity: UserActivity;
}

export interface ActivityTrackerOptions {
  storage: ActivityStorage;
  calendar: DayCalendar;
  logger?: Logger;
}

/**
 * Counts distinct calendar days on which the application became active.
 *
 * The host calls {@link recordTick} from its own lifecycle hooks. All reads and
 * writes go through one queue so two ticks racing on a day boundary can never
 * lose an increment.
 */
export class ActivityTracker {
  private readonly storage: ActivityStorage;
  private readonly calendar: DayCalendar;
  private readonly logger: Logger;
  private readonly queue = new SerialQueue();

  constructor(options: ActivityTrackerOptions) {
    this.storage = options.storage;
    this.calendar = options.calendar;
    this.logger = options.logger ?? createLogger("activity-tracker");
  }

  recordTick(now: Date): Promise<Result<TickResult, PromptEngineError>> {
    if (Number.isNaN(now.getTime())) {
      return Promise.resolve(err(new PromptEngineError("Activity tick has an invalid date", "ACTIVITY_TICK_INVALID")));
    }

    return this.queue.run(async () => {
      const currentResult = await this.storage.currentActivity();
      if (!currentResult.ok) {
        return currentResult;
      }

      const current = currentResult.value;
      const day = this.calendar.startOfDay(now);

      // Days on or before the last counted one are already counted.
      if (current.lastActiveDate !== null && this.calendar.daysBetween(current.lastActiveDate, day) <= 0) {
        return ok({ recorded: false, activity: current });
      }

      const next = freezeActivity({
        lastActiveDate: day,
        numberOfActiveDays: current.numberOfActiveDays + 1,
      });

      const saveResult = await this.storage.save(next);
      if (!saveResult.ok) {
        this.logger.warn("Failed to persist active day", {
          day: this.calendar.dayKey(day),
          code: saveResult.error.code,
        });
        return saveResult;
      }

      this.logger.debug("Recorded active day", {
        day: this.calendar.dayKey(day),
        numberOfActiveDays: next.numberOfActiveDays,
      });
      return ok({ recorded: true, activity: next });
    });
  }

  async numberOfActiveDays(): Promise<Result<number, PromptEngineError>> {
    const activityResult = await this.currentActivity();
    if (!activityResult.ok) {
      return activityResult;
    }

    return ok(activityResult.value.numberOfActiveDays);
  }

  currentActivity(): Promise<Result<UserActivity, PromptEngineError>> {
    return this.queue.run(() => this.storage.currentActivity());
  }

  reset(): Promise<Result<void, PromptEngineError>> {
    return this.queue.run(async () => {
      const deleteResult = await this.storage.deleteActivity();
      if (deleteResult.ok) {
        this.logger.info("User activity reset");
      }

      return deleteResult;
    });
  }
}
