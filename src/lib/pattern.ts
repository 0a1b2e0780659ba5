import { InvalidDateError } from '../errors.ts';
import type { Bitmap, Intensity, Pattern } from '../types.ts';
import type { Random } from '../utils/pacing.ts';

export const DAYS_PER_WEEK = 7;
const MS_PER_DAY = 86_400_000;

const COMMIT_RANGES: Record<Exclude<Intensity, 0>, [number, number]> = {
  1: [1, 2],
  2: [3, 5],
  3: [6, 8],
};

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/** Day index in the local calendar, independent of time of day and DST. */
const dayNumber = (date: Date): number =>
  Math.floor(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()) / MS_PER_DAY);

export const daysBetween = (from: Date, to: Date): number => dayNumber(to) - dayNumber(from);

export const isIntensity = (value: number): value is Intensity =>
  value === 0 || value === 1 || value === 2 || value === 3;

/**
 * Length of one repetition of the pattern, in days: each figure counts its
 * row length, plus the blank weeks between figures.
 */
export function patternWidth(pattern: Pattern): number {
  const figureWidths = pattern.figures.reduce((sum, figure) => sum + (figure[0]?.length ?? 0), 0);
  const gaps = pattern.gapWeeks * DAYS_PER_WEEK * Math.max(0, pattern.figures.length - 1);
  return figureWidths + gaps;
}

const digitAt = (figure: Bitmap, row: number, column: number): Intensity => {
  const cells = figure[row];
  if (cells === undefined || column >= cells.length) return 0;
  const value = Number(cells[column]);
  return isIntensity(value) ? value : 0;
};

/**
 * Intensity at a position inside one repetition. Each figure spans
 * `rows × 7` days; gap spans and anything past the last figure are blank.
 */
export function intensityAtOffset(pattern: Pattern, offset: number): Intensity {
  const gapDays = pattern.gapWeeks * DAYS_PER_WEEK;
  let start = 0;

  for (const [index, figure] of pattern.figures.entries()) {
    const span = figure.length * DAYS_PER_WEEK;
    if (offset < start + span) {
      const local = offset - start;
      return digitAt(figure, Math.floor(local / DAYS_PER_WEEK), local % DAYS_PER_WEEK);
    }
    start += span;

    if (index < pattern.figures.length - 1) {
      if (offset < start + gapDays) return 0;
      start += gapDays;
    }
  }

  return 0;
}

export function intensityForDate(pattern: Pattern, date: Date): Intensity {
  const width = patternWidth(pattern);
  if (width <= 0) return 0;
  const days = daysBetween(pattern.epoch, date);
  const offset = ((days % width) + width) % width;
  return intensityAtOffset(pattern, offset);
}

export function commitCountForIntensity(intensity: Intensity, random: Random): number {
  if (intensity === 0) return 0;
  const [min, max] = COMMIT_RANGES[intensity];
  return random.int(min, max);
}

export function parseCalendarDate(input: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(input.trim());
  if (!match) throw new InvalidDateError(input);

  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    throw new InvalidDateError(input);
  }
  return date;
}

export const formatCalendarDate = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

/** `YYYY-MM-DD HH:00:00`, the form git accepts in its date variables. */
export const formatCommitDate = (date: Date, hour: number): string =>
  `${formatCalendarDate(date)} ${pad(hour)}:00:00`;

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export const formatDateTime = (date: Date): string =>
  `${formatCalendarDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

/** `YYYYMMDDHHMMSS`, used to make commit markers unique. */
export const compactTimestamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

/**
 * Calendar days from `from` to `to`, both inclusive, each at local midnight.
 */
export function* eachCalendarDay(from: Date, to: Date): Generator<Date> {
  const total = daysBetween(from, to);
  for (let i = 0; i <= total; i++) {
    yield new Date(from.getFullYear(), from.getMonth(), from.getDate() + i);
  }
}
