// src/engine/weeklyAvailability.ts

import { DateTime } from 'luxon';
import { WEEKDAYS, Weekday, WeeklyAvailability } from '../models/Availability';
import { Period } from '../models/Slot';

const PERIODS: readonly Period[] = [Period.AM, Period.PM];

/**
 * Availability lists as patients describe them, e.g. { Tuesday: ['PM'] }
 */
export type AvailabilityLists = Partial<Record<Weekday, readonly Period[]>>;

export function emptyAvailability(): WeeklyAvailability {
    return availabilityFromLists({});
}

/**
 * Build the fixed grid from weekday → periods lists
 *
 * Duplicate periods collapse; weekdays left out are not listed.
 */
export function availabilityFromLists(lists: AvailabilityLists): WeeklyAvailability {
    const row = (day: Weekday): Record<Period, boolean> => {
        const periods = lists[day] ?? [];
        return {
            [Period.AM]: periods.includes(Period.AM),
            [Period.PM]: periods.includes(Period.PM)
        };
    };

    return {
        Monday: row('Monday'),
        Tuesday: row('Tuesday'),
        Wednesday: row('Wednesday'),
        Thursday: row('Thursday'),
        Friday: row('Friday'),
        Saturday: row('Saturday'),
        Sunday: row('Sunday')
    };
}

/**
 * Inverse of availabilityFromLists, omitting weekdays with nothing listed
 */
export function availabilityToLists(grid: WeeklyAvailability): AvailabilityLists {
    const lists: AvailabilityLists = {};

    for (const day of WEEKDAYS) {
        const periods = PERIODS.filter(period => grid[day][period]);
        if (periods.length > 0) {
            lists[day] = periods;
        }
    }

    return lists;
}

export function hasAnyListed(grid: WeeklyAvailability): boolean {
    return WEEKDAYS.some(day => PERIODS.some(period => grid[day][period]));
}

export function isListed(grid: WeeklyAvailability, day: Weekday, period: Period): boolean {
    return grid[day][period];
}

/**
 * Weekday of a calendar date (YYYY-MM-DD)
 *
 * Dates are calendar days, not instants, so they are read in UTC to keep the
 * result independent of the host time zone.
 *
 * @returns Weekday name or null if the date is not a valid ISO date
 */
export function weekdayOf(date: string): Weekday | null {
    const parsed = DateTime.fromISO(date, { zone: 'utc' });
    if (!parsed.isValid) {
        return null;
    }

    // luxon weekday: 1 = Monday ... 7 = Sunday
    return WEEKDAYS[parsed.weekday - 1];
}

/**
 * Half-day of a clock time (HH:mm): noon onwards is PM
 */
export function periodOf(time: string): Period {
    const hour = Number(time.split(':')[0]);
    return hour >= 12 ? Period.PM : Period.AM;
}
