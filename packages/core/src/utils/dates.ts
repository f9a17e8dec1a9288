/**
 * Calendar-date helpers. Every date the engine reasons about is a plain
 * `YYYY-MM-DD` string; anything that does not parse to a real calendar day
 * becomes `null`.
 */

const MS_PER_DAY = 86_400_000;

const ISO_PREFIX_RE = /^(\d{4})-(\d{2})-(\d{2})/;
const FR_DATE_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

/** French month names, accented and unaccented spellings. */
export const FRENCH_MONTHS: Readonly<Record<string, number>> = {
  janvier: 1,
  février: 2,
  fevrier: 2,
  mars: 3,
  avril: 4,
  mai: 5,
  juin: 6,
  juillet: 7,
  août: 8,
  aout: 8,
  septembre: 9,
  octobre: 10,
  novembre: 11,
  décembre: 12,
  decembre: 12,
};

export const FRENCH_MONTH_PATTERN = Object.keys(FRENCH_MONTHS).join("|");

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function isoFromParts(year: number, month: number, day: number): string | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null;
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/** Accepts `YYYY-MM-DD` with any trailing time part. */
export function toIsoDate(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const match = ISO_PREFIX_RE.exec(value.trim());
  if (!match) return null;
  return isoFromParts(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function frenchToIsoDate(value: string): string | null {
  const match = FR_DATE_RE.exec(value.trim());
  if (!match) return null;
  return isoFromParts(Number(match[3]), Number(match[2]), Number(match[1]));
}

/** `15 mars 2026`, `1er avril 2026`. */
export function spelledToIsoDate(day: string, monthName: string, year: string): string | null {
  const month = FRENCH_MONTHS[monthName.toLowerCase()];
  if (month === undefined) return null;
  return isoFromParts(Number(year), month, parseInt(day, 10));
}

/** Any of the notations the engine recognises, normalised to ISO. */
export function normalizeDate(value: string): string | null {
  return frenchToIsoDate(value) ?? toIsoDate(value);
}

export function isoToFrench(iso: string): string {
  const normalized = toIsoDate(iso);
  if (!normalized) return iso;
  const [year, month, day] = normalized.split("-");
  return `${day}/${month}/${year}`;
}

function toEpochDay(iso: string): number {
  const [year, month, day] = iso.split("-").map(Number);
  return Date.UTC(year ?? 0, (month ?? 1) - 1, day ?? 1) / MS_PER_DAY;
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: string, to: string): number {
  return Math.round(toEpochDay(to) - toEpochDay(from));
}

export function addDays(iso: string, days: number): string {
  const date = new Date((toEpochDay(iso) + days) * MS_PER_DAY);
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export interface DateMention {
  raw: string;
  iso: string;
  index: number;
}

const NUMERIC_FR_DATE_RE = /(?<!\d)\d{1,2}\/\d{1,2}\/\d{4}(?!\d)/g;
const NUMERIC_ISO_DATE_RE = /(?<!\d)\d{4}-\d{2}-\d{2}(?!\d)/g;
const SPELLED_DATE_RE = new RegExp(
  `(?<!\\d)(\\d{1,2})(?:er)?\\s+(${FRENCH_MONTH_PATTERN})\\s+(\\d{4})(?!\\d)`,
  "giu",
);

/**
 * Every real calendar date written in `text` as `DD/MM/YYYY`, `YYYY-MM-DD`
 * or `15 mars 2026`, in order of appearance. Impossible dates are dropped.
 */
export function findDateMentions(text: string): DateMention[] {
  const mentions: DateMention[] = [];
  const push = (raw: string, iso: string | null, index: number | undefined): void => {
    if (iso) mentions.push({ raw, iso, index: index ?? 0 });
  };

  for (const match of text.matchAll(NUMERIC_FR_DATE_RE)) {
    push(match[0], frenchToIsoDate(match[0]), match.index);
  }
  for (const match of text.matchAll(NUMERIC_ISO_DATE_RE)) {
    push(match[0], toIsoDate(match[0]), match.index);
  }
  for (const match of text.matchAll(SPELLED_DATE_RE)) {
    push(match[0], spelledToIsoDate(match[1] ?? "", match[2] ?? "", match[3] ?? ""), match.index);
  }

  return mentions.sort((a, b) => a.index - b.index);
}

/** Local calendar day of `date`, or the ISO day itself when given a string. */
export function resolveToday(today: Date | string): string {
  if (typeof today === "string") {
    const iso = toIsoDate(today);
    if (!iso) throw new Error(`Invalid "today" value: ${today}`);
    return iso;
  }
  return `${pad(today.getFullYear(), 4)}-${pad(today.getMonth() + 1)}-${pad(today.getDate())}`;
}
