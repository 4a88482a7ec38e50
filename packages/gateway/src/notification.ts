import { format } from 'date-fns';
import { UTCDate } from '@date-fns/utc';

/**
 * Button state derived from the raw counter: odd is on.
 */
export function toButtonState(counter: number): boolean {
  return Math.abs(counter) % 2 !== 0;
}

/**
 * `HH:MM:SS DD-MM-YYYY LED on|off`, in UTC.
 */
export function formatLedMessage(state: boolean, at: Date): string {
  return `${format(new UTCDate(at.getTime()), 'HH:mm:ss dd-MM-yyyy')} LED ${state ? 'on' : 'off'}`;
}
