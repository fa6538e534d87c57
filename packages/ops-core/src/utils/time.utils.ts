import { format, formatISO } from 'date-fns';

/**
 * Directory-safe stamp, e.g. 20240131_235959
 */
export function formatRunStamp(date: Date): string {
  return format(date, 'yyyyMMdd_HHmmss');
}

/**
 * ISO 8601 with seconds precision and local offset
 */
export function isoSeconds(date: Date): string {
  return formatISO(date);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
