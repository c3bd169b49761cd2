import { ALL_WEEKS } from "../records/records.types";
import type { ScheduleEntry } from "../records/records.types";
import { normalizeText } from "../change_detector/change_detector";
import { weekdayName } from "../message_renderer/message_renderer";

export const DEFAULT_TOTAL_WEEKS = 20;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export type LinearEntry = {
  week: number;
  weekday: number;
  startPeriod: number;
  endPeriod: number;
  courseName: string;
  room: string;
  teacher: string;
  /** YYYY-MM-DD; present when the semester start is known */
  date?: string;
};

export type LinearWeek = {
  week: number;
  entries: LinearEntry[];
};

export type LinearSchedule = {
  weeks: LinearWeek[];
  /** Number of schedule entries the view was built from */
  sourceEntries: number;
  firstMonday?: string;
};

export type LinearizeOptions = {
  /** Monday of week 1, YYYY-MM-DD */
  firstMonday?: string;
  /** Weeks an `"all"` week list expands to; default 20 */
  totalWeeks?: number;
};

export class ScheduleLinearizerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScheduleLinearizerError";
    Object.setPrototypeOf(this, ScheduleLinearizerError.prototype);
  }
}

function parseFirstMonday(value: string): { year: number; month: number; day: number } {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    throw new ScheduleLinearizerError(`Invalid semester start date "${value}": expected YYYY-MM-DD`);
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const check = new Date(Date.UTC(year, month - 1, day));
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    throw new ScheduleLinearizerError(`Invalid semester start date "${value}"`);
  }
  return { year, month, day };
}

/** Calendar date of `weekday` (1 = Monday) in teaching week `week` */
export function dateOfWeekday(firstMonday: string, week: number, weekday: number): string {
  const { year, month, day } = parseFirstMonday(firstMonday);
  const date = new Date(Date.UTC(year, month - 1, day + (week - 1) * 7 + (weekday - 1)));
  return date.toISOString().slice(0, 10);
}

function weeksOf(entry: ScheduleEntry, totalWeeks: number): number[] {
  if (entry.weekList === ALL_WEEKS) {
    return Array.from({ length: totalWeeks }, (_, index) => index + 1);
  }
  return Array.from(new Set(entry.weekList));
}

function compareEntries(a: LinearEntry, b: LinearEntry): number {
  if (a.weekday !== b.weekday) return a.weekday - b.weekday;
  if (a.courseName !== b.courseName) return a.courseName < b.courseName ? -1 : 1;
  return a.startPeriod - b.startPeriod;
}

/** Joins back-to-back periods of the same course on the same day */
function mergeConsecutive(entries: LinearEntry[]): LinearEntry[] {
  const merged: LinearEntry[] = [];
  for (const entry of entries) {
    const last = merged[merged.length - 1];
    if (
      last &&
      last.weekday === entry.weekday &&
      last.courseName === entry.courseName &&
      entry.startPeriod === last.endPeriod + 1
    ) {
      last.endPeriod = entry.endPeriod;
      continue;
    }
    merged.push({ ...entry });
  }
  return merged;
}

/**
 * Expands a weekly timetable into a week-by-week view.
 *
 * Entries are sorted within each week by weekday, course name and start
 * period; consecutive periods of one course on one day are merged.
 */
export function linearizeSchedule(entries: ScheduleEntry[], options: LinearizeOptions = {}): LinearSchedule {
  const totalWeeks = options.totalWeeks ?? DEFAULT_TOTAL_WEEKS;
  if (!Number.isInteger(totalWeeks) || totalWeeks < 1) {
    throw new ScheduleLinearizerError(`totalWeeks must be a positive integer, got ${totalWeeks}`);
  }
  const firstMonday = options.firstMonday;
  if (firstMonday !== undefined) {
    parseFirstMonday(firstMonday);
  }

  const byWeek = new Map<number, LinearEntry[]>();
  for (const entry of entries) {
    for (const week of weeksOf(entry, totalWeeks)) {
      const list = byWeek.get(week) ?? [];
      list.push({
        week,
        weekday: entry.weekday,
        startPeriod: entry.startPeriod,
        endPeriod: entry.endPeriod,
        courseName: normalizeText(entry.courseName),
        room: normalizeText(entry.room),
        teacher: normalizeText(entry.teacher),
      });
      byWeek.set(week, list);
    }
  }

  const weeks: LinearWeek[] = Array.from(byWeek.keys())
    .sort((a, b) => a - b)
    .map((week) => {
      const merged = mergeConsecutive((byWeek.get(week) ?? []).sort(compareEntries));
      if (firstMonday !== undefined) {
        for (const entry of merged) {
          entry.date = dateOfWeekday(firstMonday, week, entry.weekday);
        }
      }
      return { week, entries: merged };
    });

  const schedule: LinearSchedule = { weeks, sourceEntries: entries.length };
  if (firstMonday !== undefined) {
    schedule.firstMonday = firstMonday;
  }
  return schedule;
}

function formatEntry(entry: LinearEntry): string {
  const periods = entry.startPeriod === entry.endPeriod
    ? `period ${entry.startPeriod}`
    : `periods ${entry.startPeriod}-${entry.endPeriod}`;
  const where = [entry.room, entry.teacher].filter(Boolean).join(", ");
  const day = entry.date ? `${weekdayName(entry.weekday)} ${entry.date}` : weekdayName(entry.weekday);
  return `  ${day} ${periods} ${entry.courseName}${where ? ` @ ${where}` : ""}`;
}

/** Plain-text rendering, one block per week */
export function formatLinearSchedule(schedule: LinearSchedule): string {
  if (schedule.weeks.length === 0) {
    return "No scheduled courses.";
  }
  return schedule.weeks
    .map((week) => [`Week ${week.week} (${week.entries.length} course(s))`, ...week.entries.map(formatEntry)].join("\n"))
    .join("\n\n");
}
