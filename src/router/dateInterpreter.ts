import { normaliseText } from "./text.js";
import type { DateRange, DateRangeKind } from "./types.js";

const DAY_MS = 86_400_000;

/** Largest rolling window accepted, in days. */
export const MAX_ROLLING_DAYS = 3_660;

/** Month names (English and Indonesian) mapped to their zero-based index. */
const MONTHS: Record<string, number> = {
  january: 0,
  januari: 0,
  february: 1,
  februari: 1,
  march: 2,
  maret: 2,
  april: 3,
  may: 4,
  mei: 4,
  june: 5,
  juni: 5,
  july: 6,
  juli: 6,
  august: 7,
  agustus: 7,
  september: 8,
  october: 9,
  oktober: 9,
  november: 10,
  december: 11,
  desember: 11,
};

/** Spelled-out day counts recognised in rolling windows. */
const NUMBER_WORDS: Record<string, number> = {
  seven: 7,
  fourteen: 14,
  thirty: 30,
  sixty: 60,
  ninety: 90,
  tujuh: 7,
  sepuluh: 10,
  "empat belas": 14,
  "lima belas": 15,
  "dua puluh": 20,
  "tiga puluh": 30,
  "enam puluh": 60,
  "sembilan puluh": 90,
};

const YEAR_PATTERN = /\b((?:19|20)\d{2})\b/;

/** Inclusive span expressed as UTC midnights. */
type Span = readonly [start: number, end: number];

interface DateRule {
  readonly kind: DateRangeKind;
  /** Global pattern evaluated on the normalised text. */
  readonly pattern: RegExp;
  /** Returns `null` when the match turns out not to be a usable period. */
  readonly resolve: (match: RegExpMatchArray, today: number, text: string) => Span | null;
}

function utcDay(year: number, monthIndex: number, day: number): number {
  return Date.UTC(year, monthIndex, day);
}

function addDays(day: number, offset: number): number {
  return day + offset * DAY_MS;
}

function toIsoDate(day: number): string {
  return new Date(day).toISOString().slice(0, 10);
}

/** ISO weekday of a UTC midnight: Monday = 1 … Sunday = 7. */
function isoWeekday(day: number): number {
  return ((new Date(day).getUTCDay() + 6) % 7) + 1;
}

function mondayOf(day: number): number {
  return addDays(day, 1 - isoWeekday(day));
}

function monthSpan(year: number, monthIndex: number): Span {
  return [utcDay(year, monthIndex, 1), utcDay(year, monthIndex + 1, 0)];
}

function yearSpan(year: number): Span {
  return [utcDay(year, 0, 1), utcDay(year, 11, 31)];
}

function fieldsOf(day: number): { year: number; monthIndex: number } {
  const date = new Date(day);
  return { year: date.getUTCFullYear(), monthIndex: date.getUTCMonth() };
}

/** Year written next to the match, else anywhere in the text, else today's. */
function resolveYear(adjacent: string | undefined, text: string, today: number): number {
  if (adjacent) {
    return Number.parseInt(adjacent, 10);
  }
  const elsewhere = YEAR_PATTERN.exec(text);
  return elsewhere ? Number.parseInt(elsewhere[1], 10) : fieldsOf(today).year;
}

function rollingSpan(days: number, today: number): Span | null {
  if (!Number.isSafeInteger(days) || days < 1 || days > MAX_ROLLING_DAYS) {
    return null;
  }
  return [addDays(today, -days), today];
}

const monthAlternation = Object.keys(MONTHS)
  .sort((left, right) => right.length - left.length)
  .join("|");
const numberWordAlternation = Object.keys(NUMBER_WORDS)
  .sort((left, right) => right.length - left.length)
  .join("|");

/**
 * Rules evaluated in order; the first one producing a span wins. Week, month
 * and year phrases come before the bare "kemarin"/"hari ini" forms they
 * contain.
 */
const DATE_RULES: readonly DateRule[] = [
  {
    kind: "calendar",
    pattern: /\b(?:(?:last|previous) week|minggu (?:lalu|kemarin))\b/g,
    resolve: (_match, today) => {
      const previousMonday = addDays(mondayOf(today), -7);
      return [previousMonday, addDays(previousMonday, 6)];
    },
  },
  {
    kind: "calendar",
    pattern: /\b(?:this week|minggu ini)\b/g,
    resolve: (_match, today) => [mondayOf(today), today],
  },
  {
    kind: "calendar",
    pattern: /\b(?:(?:last|previous) month|bulan (?:lalu|kemarin))\b/g,
    resolve: (_match, today) => {
      const { year, monthIndex } = fieldsOf(today);
      return monthSpan(year, monthIndex - 1);
    },
  },
  {
    kind: "calendar",
    pattern: /\b(?:this month|bulan ini)\b/g,
    resolve: (_match, today) => {
      const { year, monthIndex } = fieldsOf(today);
      return [utcDay(year, monthIndex, 1), today];
    },
  },
  {
    kind: "calendar",
    pattern: /\b(?:(?:last|previous) year|tahun (?:lalu|kemarin))\b/g,
    resolve: (_match, today) => yearSpan(fieldsOf(today).year - 1),
  },
  {
    kind: "calendar",
    pattern: /\b(?:this year|tahun ini)\b/g,
    resolve: (_match, today) => [utcDay(fieldsOf(today).year, 0, 1), today],
  },
  {
    kind: "calendar",
    pattern: /\b(?:q([1-4])|(?:quarter|kuartal|triwulan) ?([1-4]))(?: ((?:19|20)\d{2}))?\b/g,
    resolve: (match, today, text) => {
      const quarter = Number.parseInt(match[1] ?? match[2] ?? "", 10);
      if (!Number.isInteger(quarter)) {
        return null;
      }
      const year = resolveYear(match[3], text, today);
      const firstMonth = (quarter - 1) * 3;
      return [utcDay(year, firstMonth, 1), utcDay(year, firstMonth + 3, 0)];
    },
  },
  {
    kind: "calendar",
    pattern: new RegExp(`\\b(${monthAlternation})(?: ((?:19|20)\\d{2}))?\\b`, "g"),
    resolve: (match, today, text) => {
      const name = match[1];
      const monthIndex = MONTHS[name];
      if (monthIndex === undefined) {
        return null;
      }
      // "may" is too common a word to stand alone.
      if (name === "may" && !match[2] && !YEAR_PATTERN.test(text)) {
        return null;
      }
      return monthSpan(resolveYear(match[2], text, today), monthIndex);
    },
  },
  {
    kind: "rolling",
    pattern: /\b(\d+) ?(?:days?|hari)\b/g,
    resolve: (match, today) => rollingSpan(Number.parseInt(match[1], 10), today),
  },
  {
    kind: "rolling",
    pattern: new RegExp(`\\b(${numberWordAlternation}) (?:days|hari)\\b`, "g"),
    resolve: (match, today) => {
      const days = NUMBER_WORDS[match[1]];
      return days === undefined ? null : rollingSpan(days, today);
    },
  },
  {
    kind: "calendar",
    pattern: /\b(?:yesterday|kemarin)\b/g,
    resolve: (_match, today) => {
      const yesterday = addDays(today, -1);
      return [yesterday, yesterday];
    },
  },
  {
    kind: "calendar",
    pattern: /\b(?:today|hari ini)\b/g,
    resolve: (_match, today) => [today, today],
  },
  {
    kind: "calendar",
    pattern: /\b((?:19|20)\d{2})\b/g,
    resolve: (match) => yearSpan(Number.parseInt(match[1], 10)),
  },
];

/**
 * Turns temporal phrases into concrete inclusive date ranges. Calendar phrases
 * ("last week", "q1", "bulan lalu") snap to period boundaries; day counts
 * ("7 days", "tiga puluh hari") count back from `today` without snapping.
 *
 * `today` is always supplied by the caller and read through its local calendar
 * fields, so `new Date(2026, 0, 22)` means 22 January 2026 in every timezone.
 */
export class DateInterpreter {
  /** Range described by a temporal phrase such as "bulan lalu", or `null`. */
  parse(phrase: string, today: Date): DateRange | null {
    return this.find(phrase, today);
  }

  /**
   * Scans free text and resolves the highest priority temporal expression it
   * contains. Rule order matters more than position in the text.
   */
  find(text: string, today: Date): DateRange | null {
    const normalised = normaliseText(text);
    if (normalised.length === 0) {
      return null;
    }
    const todayDay = utcDay(today.getFullYear(), today.getMonth(), today.getDate());
    for (const rule of DATE_RULES) {
      for (const match of normalised.matchAll(rule.pattern)) {
        const span = rule.resolve(match, todayDay, normalised);
        if (span) {
          return {
            start: toIsoDate(span[0]),
            end: toIsoDate(span[1]),
            kind: rule.kind,
            expression: match[0],
          };
        }
      }
    }
    return null;
  }

  /** First day of `today`'s month through `today`. */
  monthToDate(today: Date): DateRange {
    const todayDay = utcDay(today.getFullYear(), today.getMonth(), today.getDate());
    return {
      start: toIsoDate(utcDay(today.getFullYear(), today.getMonth(), 1)),
      end: toIsoDate(todayDay),
      kind: "calendar",
      expression: "this month",
    };
  }
}
