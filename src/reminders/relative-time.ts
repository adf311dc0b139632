import {
  addDays,
  addHours,
  addMinutes,
  addMonths,
  addWeeks,
  getDate,
  isAfter,
  isValid,
  parseISO,
  set,
} from 'date-fns';

/** Accepted forms of a reminder time */
export type ReminderWhen = string | number | Date;

/** Hour used for day-level expressions without an explicit time */
export const DEFAULT_REMINDER_HOUR = 9;

const OFFSET_PATTERN =
  /\b(?:em|daqui a|daqui|in)\s+(\d+)\s*(minutos?|min|mins?|minutes?|horas?|hrs?|hours?|h|dias?|days?|semanas?|weeks?)\b/;
const TIME_PATTERN = /\b(?:as|at)\s+(\d{1,2})(?:(?::|h)(\d{2})?)?/;
const DAY_OF_MONTH_PATTERN = /\bdia\s+(\d{1,2})\b/;

/** Lowercase and strip accents so `amanhã` and `amanha` read the same */
const normalize = (text: string) =>
  text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .trim();

interface TimeOfDay {
  hours: number;
  minutes: number;
}

function parseTimeOfDay(text: string): TimeOfDay | null {
  const match = TIME_PATTERN.exec(text);
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = match[2] ? Number(match[2]) : 0;
  if (hours > 23 || minutes > 59) return null;
  return { hours, minutes };
}

const atTime = (day: Date, time: TimeOfDay) =>
  set(day, {
    hours: time.hours,
    minutes: time.minutes,
    seconds: 0,
    milliseconds: 0,
  });

function applyOffset(now: Date, amount: number, unit: string): Date {
  if (unit.startsWith('min')) return addMinutes(now, amount);
  if (unit.startsWith('h')) return addHours(now, amount);
  if (unit.startsWith('d')) return addDays(now, amount);
  return addWeeks(now, amount);
}

/**
 * Next occurrence of day `day` of a month, at `time`, strictly after `now`.
 * Months too short for the day are skipped.
 */
function nextDayOfMonth(now: Date, day: number, time: TimeOfDay): Date | null {
  if (day < 1 || day > 31) return null;
  for (let offset = 0; offset < 3; offset++) {
    const month = addMonths(set(now, { date: 1 }), offset);
    const candidate = atTime(set(month, { date: day }), time);
    if (getDate(candidate) === day && isAfter(candidate, now)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Resolve a reminder time against `now`.
 *
 * Understands ISO timestamps, epoch milliseconds, `Date`s and short
 * Portuguese or English expressions: `amanhã`, `depois de amanhã`,
 * `semana que vem`, `próxima semana`, `em 3 dias`, `daqui a 2 horas`,
 * `dia 15`, `tomorrow`, `next week`, `in 30 minutes`, each optionally with
 * `às 14h` / `at 14:00`. Returns null when the input is not understood.
 */
export function resolveReminderTime(
  when: ReminderWhen,
  now: Date = new Date(),
): Date | null {
  if (when instanceof Date) return isValid(when) ? when : null;
  if (typeof when === 'number') {
    return Number.isFinite(when) ? new Date(when) : null;
  }

  const raw = when.trim();
  if (/^\d{4}-\d{2}-\d{2}/.test(raw)) {
    const parsed = parseISO(raw);
    return isValid(parsed) ? parsed : null;
  }

  const text = normalize(raw);

  const offset = OFFSET_PATTERN.exec(text);
  if (offset) {
    return applyOffset(now, Number(offset[1]), offset[2]);
  }

  const explicitTime = parseTimeOfDay(text);
  const time = explicitTime ?? { hours: DEFAULT_REMINDER_HOUR, minutes: 0 };

  const dayOfMonth = DAY_OF_MONTH_PATTERN.exec(text);
  if (dayOfMonth) {
    return nextDayOfMonth(now, Number(dayOfMonth[1]), time);
  }

  if (text.includes('depois de amanha')) {
    return atTime(addDays(now, 2), time);
  }
  if (text.includes('amanha') || text.includes('tomorrow')) {
    return atTime(addDays(now, 1), time);
  }
  if (
    text.includes('semana que vem') ||
    text.includes('proxima semana') ||
    text.includes('next week')
  ) {
    return atTime(addWeeks(now, 1), time);
  }

  if (explicitTime) {
    // A bare time means its next occurrence
    const today = atTime(now, explicitTime);
    return isAfter(today, now) ? today : addDays(today, 1);
  }

  return null;
}
