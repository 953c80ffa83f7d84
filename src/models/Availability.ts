// src/models/Availability.ts

import type { Period } from './Slot';

export const WEEKDAYS = [
    'Monday',
    'Tuesday',
    'Wednesday',
    'Thursday',
    'Friday',
    'Saturday',
    'Sunday'
] as const;

export type Weekday = typeof WEEKDAYS[number];

/**
 * Fixed 7 × 2 grid of half-days a patient listed
 *
 * Whether a listed half-day is acceptable or excluded depends on the
 * patient's availability mode. A grid with nothing listed means "any time".
 */
export type WeeklyAvailability = Readonly<Record<Weekday, Readonly<Record<Period, boolean>>>>;
