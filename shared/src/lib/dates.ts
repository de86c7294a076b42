import { IsoDate } from '../models/charter.model';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Source of "today" for pricing and date phrases. */
export type Clock = () => IsoDate;

const pad = (value: number) => value.toString().padStart(2, '0');

function toUtcDate(date: IsoDate): Date {
  const [year, month, day] = date.split('-').map(Number);
  return new Date(Date.UTC(year, month - 1, day));
}

function fromUtcDate(date: Date): IsoDate {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * Local calendar date of `now`.
 */
export function todayIso(now: Date = new Date()): IsoDate {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

export function formatIsoDate(year: number, month: number, day: number): IsoDate {
  return `${year}-${pad(month)}-${pad(day)}`;
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return fromUtcDate(new Date(toUtcDate(date).getTime() + days * MS_PER_DAY));
}

/**
 * Whole days from `from` to `to`; negative when `to` is earlier.
 */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return Math.round((toUtcDate(to).getTime() - toUtcDate(from).getTime()) / MS_PER_DAY);
}

/** 0 = Sunday ... 6 = Saturday */
export function dayOfWeek(date: IsoDate): number {
  return toUtcDate(date).getUTCDay();
}

export function isWeekend(date: IsoDate): boolean {
  const day = dayOfWeek(date);
  return day === 0 || day === 6;
}

/**
 * First date strictly after `from` that falls on `weekday`.
 */
export function nextWeekday(from: IsoDate, weekday: number): IsoDate {
  const offset = (weekday - dayOfWeek(from) + 7) % 7 || 7;
  return addDays(from, offset);
}
