export { DayCalendar, getSystemTimeZone, validateTimeZone } from "./day-calendar";
