import { TimestampFormatError } from './exceptions.js';

// W3C Datetime profiles accepted by the sitemap protocol, from YYYY up to
// YYYY-MM-DDThh:mm:ss.sTZD.
const W3C_DATETIME =
  /^(\d{4})(?:-(\d{2})(?:-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:\d{2}))?)?)?$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  return month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
}

function zoneOffsetMinutes(zone: string, value: string): number {
  if (zone === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const hours = Number(zone.slice(1, 3));
  const minutes = Number(zone.slice(4, 6));
  if (hours > 23 || minutes > 59) {
    throw new TimestampFormatError(value);
  }
  return sign * (hours * 60 + minutes);
}

export function parseLastModified(value: string): Date {
  const match = W3C_DATETIME.exec(value.trim());
  if (!match) {
    throw new TimestampFormatError(value);
  }

  const [
    ,
    yearText,
    monthText = '01',
    dayText = '01',
    hourText = '00',
    minuteText = '00',
    secondText = '00',
    fractionText = '',
    zone = 'Z',
  ] = match;

  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText);

  if (
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > daysInMonth(year, month) ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    throw new TimestampFormatError(value);
  }

  const millis = fractionText ? Math.round(Number(`0.${fractionText}`) * 1000) : 0;
  const offset = zoneOffsetMinutes(zone, value);

  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  return new Date(date.getTime() - offset * 60_000);
}

/** `YYYY-MM-DDThh:mm:ssZ` */
export function formatLastModified(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function truncateToSeconds(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}
