import type { TimeInput } from '../types';

/**
 * Convert a time input to milliseconds since the epoch
 */
export function toEpochMillis(time: TimeInput): number {
  return time instanceof Date ? time.getTime() : time;
}
