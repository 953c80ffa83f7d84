// src/clock.ts

/**
 * Source of "now", injected so wait times can be tested
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
