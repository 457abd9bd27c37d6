/**
 * backend/src/shared/time/clock.ts
 *
 * WHY:
 * - Services stamp records with "now"; tests need to control it.
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
