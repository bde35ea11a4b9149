type DatePattern = {
  regex: RegExp;
  order: "ymd" | "mdy";
  withTime: boolean;
};

const DATE_PATTERNS: readonly DatePattern[] = [
  { regex: /^(\d{4}):(\d{1,2}):(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/, order: "ymd", withTime: true },
  { regex: /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/, order: "ymd", withTime: true },
  { regex: /^(\d{4}):(\d{1,2}):(\d{1,2})$/, order: "ymd", withTime: false },
  { regex: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: "ymd", withTime: false },
  { regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/, order: "mdy", withTime: true },
  { regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: "mdy", withTime: false },
];

/**
 * Reduce a raw timestamp to `date[ time]`: the ISO `T` becomes a space, and
 * fractional seconds, `Z` and numeric zone offsets are dropped.
 */
export function cleanDateText(raw: string): string {
  let cleaned = raw.replace(/T/g, " ").split(".")[0].split("+")[0].trim();
  cleaned = cleaned.replace(/( \d{1,2}:\d{1,2}:\d{1,2})-\d{2}:?\d{2}$/, "$1");
  if (cleaned.endsWith("Z")) {
    cleaned = cleaned.slice(0, -1).trimEnd();
  }
  return cleaned;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function isValidTime(hour: number, minute: number, second: number): boolean {
  return hour < 24 && minute < 60 && second <= 61;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Normalize a capture timestamp to `MM/DD/YYYY`.
 *
 * Recognizes EXIF (`2023:07:14 18:22:05`), ISO (`2023-07-14T18:22:05.120+02:00`)
 * and US slash forms, each with or without a time. Text that matches none of
 * them, or names an impossible date, is returned unchanged.
 */
export function normalizeCaptureDate(value: string | null | undefined): string | null {
  if (!value) {
    return null;
  }
  const cleaned = cleanDateText(value);
  for (const pattern of DATE_PATTERNS) {
    const match = pattern.regex.exec(cleaned);
    if (!match) {
      continue;
    }
    const parts = match.slice(1).map(Number);
    const [year, month, day] =
      pattern.order === "ymd" ? [parts[0], parts[1], parts[2]] : [parts[2], parts[0], parts[1]];
    if (year < 1 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
      continue;
    }
    if (pattern.withTime && !isValidTime(parts[3], parts[4], parts[5])) {
      continue;
    }
    return `${pad2(month)}/${pad2(day)}/${String(year).padStart(4, "0")}`;
  }
  return value;
}
