/**
 * Conductor Package
 *
 * Pure jam-queue logic with no I/O: domain types, the error taxonomy,
 * ranking and slug helpers. Side effects live in the server layer.
 *
 * Usage:
 *   import { rank, type RankedSong } from '@/conductor';
 */

export * from './types';
export * from './errors';

export { attendeeActor, sessionActor } from './actors';
export { rank, sortForDisplay, compareForPerformance } from './ranking';
export { cleanTextForSlug, generateJamSlug, makeSlugUnique, MAX_SLUG_LENGTH } from './slug';
