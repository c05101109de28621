import { padNum } from "./format";

export class DateParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DateParseError";
  }
}

/** Converts the raw text of a date field into ISO-8601, or throws DateParseError. */
export type DateParser = (raw: string) => string;

const RCS_KEYWORD = /^\$Date:\s*(.*?)\s*\$$/;
const NUMERIC_DATE =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2}))?)?\s*(Z|[+-]\d{2}:?\d{2})?(?:\s+\(.*\))?$/;

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const WEEKDAYS = ["mon", "tue", "wed", "thu", "fri", "sat", "sun"];

type DateParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  offset?: string;
};

function monthOf(token: string): number | undefined {
  const t = token.replace(/\.$/, "").toLowerCase();
  if (t.length < 3) return undefined;
  const index = MONTHS.findIndex((m) => m.startsWith(t));
  return index < 0 ? undefined : index + 1;
}

function isValidDay(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

function normalizeOffset(offset: string): string {
  if (offset === "Z") return "+00:00";
  const digits = offset.replace(":", "");
  return `${digits.slice(0, 3)}:${digits.slice(3)}`;
}

function parseNumeric(text: string): DateParts | undefined {
  const m = NUMERIC_DATE.exec(text);
  if (!m) return undefined;
  return {
    year: parseInt(m[1], 10),
    month: parseInt(m[2], 10),
    day: parseInt(m[3], 10),
    hour: m[4] ? parseInt(m[4], 10) : 0,
    minute: m[5] ? parseInt(m[5], 10) : 0,
    second: m[6] ? parseInt(m[6], 10) : 0,
    offset: m[7] ? normalizeOffset(m[7]) : undefined,
  };
}

function parseWords(text: string): DateParts | undefined {
  const tokens = text
    .replace(/,/g, " ")
    .split(/\s+/)
    .filter((t) => t.length > 0);
  if (tokens.length === 4 && WEEKDAYS.includes(tokens[0].slice(0, 3).toLowerCase())) {
    tokens.shift();
  }
  if (tokens.length !== 3 || !/^\d{4}$/.test(tokens[2])) return undefined;
  const year = parseInt(tokens[2], 10);
  let month: number | undefined;
  let dayToken: string;
  if (/^\d{1,2}$/.test(tokens[0])) {
    month = monthOf(tokens[1]);
    dayToken = tokens[0];
  } else {
    month = monthOf(tokens[0]);
    dayToken = tokens[1].replace(/(st|nd|rd|th)$/i, "");
  }
  if (month === undefined || !/^\d{1,2}$/.test(dayToken)) return undefined;
  return { year, month, day: parseInt(dayToken, 10), hour: 0, minute: 0, second: 0 };
}

/**
 * Reads "2009-10-05", "2009-10-05 13:37:10 +0000", "October 5, 2009",
 * "Mon, 5 Oct 2009" and RCS "$Date: ... $" keywords.
 * The result has no zone designator unless the input gave an offset.
 */
export function parseDateString(raw: string): string {
  let text = raw.trim();
  const rcs = RCS_KEYWORD.exec(text);
  if (rcs) text = rcs[1];
  if (text === "") throw new DateParseError("empty date");
  const parts = parseNumeric(text) ?? parseWords(text);
  if (!parts) throw new DateParseError(`unrecognized date: ${raw}`);
  const { year, month, day, hour, minute, second } = parts;
  if (!isValidDay(year, month, day) || hour > 23 || minute > 59 || second > 59) {
    throw new DateParseError(`date out of range: ${raw}`);
  }
  const date = `${padNum(year, 4)}-${padNum(month)}-${padNum(day)}`;
  const time = `${padNum(hour)}:${padNum(minute)}:${padNum(second)}`;
  return `${date}T${time}${parts.offset ?? ""}`;
}

export const unavailableDateParser: DateParser = () => {
  throw new DateParseError("date parser is not available");
};
