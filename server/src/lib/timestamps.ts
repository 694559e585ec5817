const DAY_MS = 24 * 60 * 60 * 1000;

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?$/i;
const CERT_DATE = /^([A-Za-z]{3})\s+(\d{1,2})\s+(\d{2}):(\d{2}):(\d{2})\s+(\d{4})\s+(GMT|UTC)$/;

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

function utcDate(year: number, month: number, day: number, hours = 0, minutes = 0, seconds = 0): Date | undefined {
  const date = new Date(Date.UTC(year, month, day, hours, minutes, seconds));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month || date.getUTCDate() !== day) return undefined;
  if (hours > 23 || minutes > 59 || seconds > 59) return undefined;
  return date;
}

/**
 * Parses registry timestamps: ISO-8601 with `Z` or an offset, naive ISO date-times
 * (read as UTC) and bare `YYYY-MM-DD` dates. Returns undefined for anything else.
 */
export function parseTimestamp(value: string | null | undefined): Date | undefined {
  if (!value) return undefined;
  const input = value.trim();

  const dateOnly = DATE_ONLY.exec(input);
  if (dateOnly) {
    return utcDate(Number(dateOnly[1]), Number(dateOnly[2]) - 1, Number(dateOnly[3]));
  }

  const dateTime = ISO_DATE_TIME.exec(input);
  if (!dateTime) return undefined;
  const [, day, time, zone] = dateTime;
  if (!utcDate(Number(day.slice(0, 4)), Number(day.slice(5, 7)) - 1, Number(day.slice(8, 10)))) return undefined;

  const offset = !zone ? "Z" : zone.toUpperCase() === "Z" ? "Z" : zone.replace(/^([+-]\d{2})(\d{2})$/, "$1:$2");
  const parsed = new Date(`${day}T${time}${offset}`);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

export function toIsoTimestamp(value: string | null | undefined): string | null {
  return parseTimestamp(value)?.toISOString() ?? null;
}

/** Certificate validity dates look like `Mar 15 12:00:00 2025 GMT`; unparsable text is returned as given. */
export function parseCertificateDate(raw: string): string {
  const match = CERT_DATE.exec(raw.trim());
  if (!match) return raw;
  const month = MONTHS.indexOf(match[1].toLowerCase());
  if (month < 0) return raw;
  const date = utcDate(Number(match[6]), month, Number(match[2]), Number(match[3]), Number(match[4]), Number(match[5]));
  return date ? date.toISOString() : raw;
}

export function ageInDays(createdAt: Date, now: Date): number {
  return Math.floor((now.getTime() - createdAt.getTime()) / DAY_MS);
}
