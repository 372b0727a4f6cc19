import { differenceInCalendarDays, parseISO } from "date-fns";
import { formatInTimeZone, fromZonedTime } from "date-fns-tz";

import { err, ok, type Result } from "../result";
import { PromptConfigError, toError } from "../errors";

const DAY_KEY_FORMAT = "yyyy-MM-dd";

export function getSystemTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone ?? "UTC";
}

export function validateTimeZone(timeZone: string): Result<string, PromptConfigError> {
  try {
    Intl.DateTimeFormat("en-US", { timeZone }).format(new Date());
    return ok(timeZone);
  } catch (cause) {
    return err(new PromptConfigError(`Invalid time zone: ${timeZone}`, "CALENDAR_TIMEZONE_INVALID", [], toError(cause)));
  }
}

/**
 * Calendar-day arithmetic in one fixed IANA time zone.
 *
 * Two instants belong to the same day when their wall-clock dates in that zone
 * match, so 23:59 and 00:01 the following minute are different days.
 */
export class DayCalendar {
  constructor(readonly timeZone: string = getSystemTimeZone()) {}

  static create(timeZone?: string): Result<DayCalendar, PromptConfigError> {
    if (timeZone === undefined) {
      return ok(new DayCalendar());
    }

    const validated = validateTimeZone(timeZone);
    if (!validated.ok) {
      return validated;
    }

    return ok(new DayCalendar(validated.value));
  }

  /** Wall-clock date of `instant` in this calendar's zone, as `yyyy-MM-dd`. */
  dayKey(instant: Date): string {
    return formatInTimeZone(instant, this.timeZone, DAY_KEY_FORMAT);
  }

  startOfDay(instant: Date): Date {
    return fromZonedTime(`${this.dayKey(instant)}T00:00:00`, this.timeZone);
  }

  isSameDay(left: Date, right: Date): boolean {
    return this.dayKey(left) === this.dayKey(right);
  }

  /** Whole calendar days from `from` to `to`; negative when `to` is earlier. */
  daysBetween(from: Date, to: Date): number {
    return differenceInCalendarDays(parseISO(this.dayKey(to)), parseISO(this.dayKey(from)));
  }
}
