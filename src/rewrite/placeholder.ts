/**
 * Synthesized header lines
 *
 * @packageDocumentation
 */

import { foldHeaderField } from '../mime/fold.js';

const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Formats a time as RFC 1123 with a numeric zone,
 * e.g. `Mon, 02 Jan 2006 15:04:05 -0700`
 *
 * @param date - Instant to format
 * @param offsetMinutes - Zone offset in minutes east of UTC
 */
export function formatRfc1123Z(date: Date, offsetMinutes: number): string {
  // Shift the instant so that the UTC getters read local wall-clock time
  const local = new Date(date.getTime() + offsetMinutes * 60_000);
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);

  return (
    `${DAYS[local.getUTCDay()]}, ${pad2(local.getUTCDate())} ${MONTHS[local.getUTCMonth()]} ` +
    `${local.getUTCFullYear()} ${pad2(local.getUTCHours())}:${pad2(local.getUTCMinutes())}:` +
    `${pad2(local.getUTCSeconds())} ${sign}${pad2(Math.floor(abs / 60))}${pad2(abs % 60)}`
  );
}

/**
 * Header lines that replace the Content-Type of a deleted part, including
 * the blank line that ends the part's header early. Modelled on mutt's
 * `access-type=x-mutt-deleted` (message/external-body, RFC 1521 7.3.3).
 *
 * @param terminator - The part's line terminator
 */
export function deletionPlaceholder(now: Date, offsetMinutes: number, terminator: string): string {
  return (
    'Content-Type: message/external-body; access-type=x-rendmail-deleted;' +
    terminator +
    `\texpiration="${formatRfc1123Z(now, offsetMinutes)}"` +
    terminator +
    terminator
  );
}

/**
 * Folded `X-Rendmail-Subject` field carrying an ASCII subject
 */
export function decodedSubjectField(subject: string, terminator: string): string[] {
  return foldHeaderField(`X-Rendmail-Subject: ${subject}`, terminator);
}
