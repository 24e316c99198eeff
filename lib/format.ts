// lib/format.ts

import type { Resolution } from './types';

export const TIME_ZONE = 'Europe/Helsinki';

const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;

export const SLOT_MS: Record<Resolution, number> = {
  hour: MS_PER_HOUR,
  quarter: 15 * MS_PER_MINUTE,
};

const WEEKDAY_FI: Record<string, string> = {
  Monday: 'ma',
  Tuesday: 'ti',
  Wednesday: 'ke',
  Thursday: 'to',
  Friday: 'pe',
  Saturday: 'la',
  Sunday: 'su',
};

type LocalParts = {
  weekday: string;
  day: string;
  month: string;
  hour: string;
};

function localParts(date: Date, timeZone: string): LocalParts {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    weekday: 'long',
    day: 'numeric',
    month: 'numeric',
    hour: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const pick = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return {
    weekday: pick('weekday'),
    day: pick('day'),
    month: pick('month'),
    hour: pick('hour'),
  };
}

// "ma 3.2."
export function formatDay(date: Date, timeZone: string = TIME_ZONE): string {
  const { weekday, day, month } = localParts(date, timeZone);
  return `${WEEKDAY_FI[weekday] ?? weekday} ${Number(day)}.${Number(month)}.`;
}

// "07"
export function formatHour(date: Date, timeZone: string = TIME_ZONE): string {
  return localParts(date, timeZone).hour;
}

export function localHour(date: Date, timeZone: string = TIME_ZONE): number {
  return Number(localParts(date, timeZone).hour);
}

// Round to cents first so the text and the bar agree
export function roundPrice(price: number): number {
  return Math.round(price * 100) / 100;
}

export function formatPrice(price: number): string {
  return roundPrice(price).toFixed(2);
}

// Finnish offsets are whole hours, so flooring in UTC also floors local time
export function cutoffFor(now: Date, resolution: Resolution): Date {
  const slot = SLOT_MS[resolution];
  return new Date(Math.floor(now.getTime() / slot) * slot);
}
