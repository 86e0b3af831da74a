import { minutesOfDay, type TimeOfDay } from '../config/question-set.config.js';

/**
 * Daily two-slot publish schedule. Sets alternate between the
 * [openTime1, openTime2) day shift and the [openTime2, next openTime1) night
 * shift. Times are wall-clock in the server's local time zone.
 */
export interface PublishSchedule {
  openTime1: TimeOfDay;
  openTime2: TimeOfDay;
}

export function atTimeOfDay(day: Date, time: TimeOfDay): Date {
  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), time.hours, time.minutes, 0, 0);
}

export function addDays(day: Date, days: number): Date {
  return new Date(
    day.getFullYear(),
    day.getMonth(),
    day.getDate() + days,
    day.getHours(),
    day.getMinutes(),
    day.getSeconds(),
    day.getMilliseconds()
  );
}

function isSameTimeOfDay(date: Date, time: TimeOfDay): boolean {
  return (
    date.getHours() === time.hours &&
    date.getMinutes() === time.minutes &&
    date.getSeconds() === 0 &&
    date.getMilliseconds() === 0
  );
}

/** First slot strictly after `now` */
export function nextPublishTime(now: Date, schedule: PublishSchedule): Date {
  const nowMinutes = now.getHours() * 60 + now.getMinutes();
  const isBefore = (time: TimeOfDay) => nowMinutes < minutesOfDay(time);

  if (isBefore(schedule.openTime1)) {
    return atTimeOfDay(now, schedule.openTime1);
  }
  if (isBefore(schedule.openTime2)) {
    return atTimeOfDay(now, schedule.openTime2);
  }
  return atTimeOfDay(addDays(now, 1), schedule.openTime1);
}

/**
 * A window opening at openTime1 closes the same day at openTime2; anything
 * else closes at openTime1 the following day.
 */
export function endTimeFor(publishedAt: Date, schedule: PublishSchedule): Date {
  if (isSameTimeOfDay(publishedAt, schedule.openTime1)) {
    return atTimeOfDay(publishedAt, schedule.openTime2);
  }
  return atTimeOfDay(addDays(publishedAt, 1), schedule.openTime1);
}
