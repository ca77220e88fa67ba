import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat.js";
import utc from "dayjs/plugin/utc.js";

import type { CellValue } from "@/types/domain";

dayjs.extend(utc);
dayjs.extend(customParseFormat);

export const MISSING_TOKEN = "nan";

const FLOAT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const ISO_DATE_PATTERN =
  /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|UTC|GMT|[+-]\d{2}:?\d{2})?$/i;
const EXPLICIT_ZONE_PATTERN = /(?:\b(?:Z|UTC|GMT)|[+-]\d{2}:?\d{2})$/i;

// Long-form dates carry no zone and are read as UTC.
const LONG_DATE_FORMATS = [
  "MMMM D, YYYY",
  "MMM D, YYYY",
  "MMMM D, YYYY h:mm A",
  "MMM D, YYYY h:mm A",
  "MMMM D, YYYY HH:mm",
  "MMM D, YYYY HH:mm",
  "D MMMM YYYY",
  "D MMM YYYY",
  "D MMM YYYY HH:mm"
];

const US_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?\s*(Z|UTC|GMT|[+-]\d{2}:?\d{2})?$/i;

export function cellText(value: CellValue): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "number" && Number.isNaN(value)) {
    return "";
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "" : value.toISOString();
  }
  return String(value);
}

export function isBlank(value: CellValue): boolean {
  return cellText(value).trim().length === 0;
}

// Stringified, trimmed, with the missing-value token collapsed to "".
export function normalizeText(value: CellValue): string {
  const text = cellText(value).trim();
  return text === MISSING_TOKEN ? "" : text;
}

function parseStrictFloat(text: string): number | null {
  const trimmed = text.trim();
  if (!FLOAT_PATTERN.test(trimmed)) {
    return null;
  }
  const numeric = Number(trimmed);
  return Number.isFinite(numeric) ? numeric : null;
}

export function parseMoney(value: CellValue): number {
  if (value === null || value === undefined) {
    return 0;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }

  let text = cellText(value).replace(/,/g, "").replace(/\$/g, "").trim();
  if (text.includes("(") && text.includes(")")) {
    text = `-${text.replace(/[()]/g, "")}`;
  }
  return parseStrictFloat(text) ?? 0;
}

export function parseQuantity(value: CellValue): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : 1;
  }
  const numeric = parseStrictFloat(cellText(value).replace(/,/g, ""));
  return numeric === null ? 1 : Math.trunc(numeric);
}

function zoneOffsetMinutes(zone: string | undefined): number {
  if (!zone || /^(z|utc|gmt)$/i.test(zone)) {
    return 0;
  }
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}

function fromParts(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  fraction: string | undefined,
  zone: string | undefined
): Date | null {
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0;
  const local = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  if (local.getUTCFullYear() !== year || local.getUTCMonth() !== month - 1 || local.getUTCDate() !== day) {
    return null;
  }
  return new Date(local.getTime() - zoneOffsetMinutes(zone) * 60_000);
}

function parseDateText(text: string): Date | null {
  const iso = ISO_DATE_PATTERN.exec(text);
  if (iso) {
    const [, year, month, day, hour, minute, second, fraction, zone] = iso;
    return fromParts(
      Number(year),
      Number(month),
      Number(day),
      Number(hour ?? 0),
      Number(minute ?? 0),
      Number(second ?? 0),
      fraction,
      zone
    );
  }

  const us = US_DATE_PATTERN.exec(text);
  if (us) {
    const [, month, day, year, hour, minute, second, zone] = us;
    return fromParts(
      Number(year),
      Number(month),
      Number(day),
      Number(hour ?? 0),
      Number(minute ?? 0),
      Number(second ?? 0),
      undefined,
      zone
    );
  }

  if (!/\d{4}/.test(text)) {
    return null;
  }
  for (const format of LONG_DATE_FORMATS) {
    const parsed = dayjs.utc(text, format, true);
    if (parsed.isValid()) {
      return parsed.toDate();
    }
  }
  if (!EXPLICIT_ZONE_PATTERN.test(text)) {
    return null;
  }
  const zoned = dayjs.utc(text);
  return zoned.isValid() ? zoned.toDate() : null;
}

export function parseTimestamp(value: CellValue): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? new Date(value) : null;
  }
  if (typeof value !== "string") {
    return null;
  }
  const text = value.trim();
  return text ? parseDateText(text) : null;
}
