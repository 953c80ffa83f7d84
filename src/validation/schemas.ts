// src/validation/schemas.ts

import { DateTime } from 'luxon';
import { z } from 'zod';
import { ValidationError } from '../errors';
import { WEEKDAYS } from '../models/Availability';
import { AvailabilityMode, NO_PREFERENCE, PatientStatus, Urgency } from '../models/Patient';
import { Period, SlotStatus } from '../models/Slot';
import { periodOf } from '../engine/weeklyAvailability';

const requiredText = z.string().trim().min(1, 'Required');

const minutes = z.coerce
    .number()
    .int('Duration must be a whole number of minutes')
    .positive('Duration must be positive');

const isoDate = z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
    .refine(value => DateTime.fromISO(value, { zone: 'utc' }).isValid, 'Not a calendar date');

const clockTime = z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:mm');

export const PatientIntakeSchema = z.object({
    name: requiredText,
    phone: requiredText,
    email: z.string().trim().email().optional(),
    reason: z.string().trim().default(''),
    appointmentType: requiredText,
    duration: minutes,
    providerPreference: requiredText.default(NO_PREFERENCE),
    urgency: z.nativeEnum(Urgency).default(Urgency.MEDIUM),
    availability: z.record(z.enum(WEEKDAYS), z.array(z.nativeEnum(Period))).default({}),
    availabilityMode: z.nativeEnum(AvailabilityMode).default(AvailabilityMode.AVAILABLE)
});

export type PatientIntake = z.infer<typeof PatientIntakeSchema>;

/**
 * Edit of a waitlist entry: any intake field, nothing else
 */
export const PatientUpdateSchema = PatientIntakeSchema.partial().strict();

export type PatientUpdate = z.infer<typeof PatientUpdateSchema>;

const SlotFieldsSchema = z.object({
    provider: requiredText,
    date: isoDate,
    time: clockTime.optional(),
    period: z.nativeEnum(Period).optional(),
    duration: minutes,
    appointmentType: requiredText.optional(),
    notes: z.string().trim().default('')
});

/**
 * New open slot; the period comes from the time when one is given
 */
export const SlotIntakeSchema = SlotFieldsSchema.superRefine((slot, ctx) => {
    if (slot.time === undefined && slot.period === undefined) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['period'],
            message: 'Either time or period is required'
        });
    }
    if (slot.time !== undefined && slot.period !== undefined && periodOf(slot.time) !== slot.period) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['period'],
            message: `Period ${slot.period} does not match time ${slot.time}`
        });
    }
});

export type SlotIntake = z.infer<typeof SlotIntakeSchema>;

export const SlotUpdateSchema = SlotFieldsSchema.partial().strict();

export type SlotUpdate = z.infer<typeof SlotUpdateSchema>;

export const SlotQuerySchema = z.object({
    status: z.nativeEnum(SlotStatus).optional()
});

export const PatientQuerySchema = z.object({
    status: z.nativeEnum(PatientStatus).optional()
});

/**
 * Parse input or throw ValidationError carrying the flattened zod issues
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        const { formErrors, fieldErrors } = parsed.error.flatten();
        throw new ValidationError(`Invalid ${what}`, { formErrors, fieldErrors });
    }
    return parsed.data;
}
