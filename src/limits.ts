/**
 * Daily video budget.
 *
 * `checkVideoLimit` is a pure decision over a stats snapshot; `windowStart`
 * computes where "today" begins for a given reset hour.
 */
import type { VideoStats } from "./media.js";

export interface LimitResult {
  readonly allowed: boolean;
  /** Only meaningful when allowed: this video reaches the count or minutes ceiling */
  readonly isLast: boolean;
  /** Only meaningful when denied */
  readonly reason: string;
}

/**
 * Decide whether another video may start.
 *
 * Denies when either ceiling is already reached. Otherwise allows, and flags
 * the video as the last one when it would bring the count to the ceiling or
 * push the projected minutes to or past the time ceiling.
 */
export function checkVideoLimit(
  stats: VideoStats,
  maxCount: number,
  maxMinutes: number,
  videoDurationS: number = 0,
): LimitResult {
  if (stats.count >= maxCount) {
    return { allowed: false, isLast: false, reason: `Video count limit reached (${maxCount} today)` };
  }

  if (stats.totalMinutes >= maxMinutes) {
    return { allowed: false, isLast: false, reason: `Video time limit reached (${maxMinutes} min today)` };
  }

  const projectedMinutes = stats.totalMinutes + videoDurationS / 60;
  const lastByCount = stats.count + 1 >= maxCount;
  const lastByTime = projectedMinutes >= maxMinutes;

  return { allowed: true, isLast: lastByCount || lastByTime, reason: "" };
}

/**
 * Start of the budget day containing `now`, in local time.
 * Before the reset hour the day began at yesterday's reset time.
 */
export function windowStart(now: Date, resetHour: number): Date {
  const start = new Date(now.getFullYear(), now.getMonth(), now.getDate(), resetHour, 0, 0, 0);
  if (now.getHours() < resetHour) {
    start.setDate(start.getDate() - 1);
  }
  return start;
}
