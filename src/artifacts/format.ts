/**
 * Timestamp and file-name helpers for generated artifacts.
 *
 * Stamps use local time so that file names line up with the operator's
 * calendar day.
 */

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** 2026-10-19 */
export function dayStamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** 20261019-090507 */
export function fileStamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

/** 2026-10-19 09:05 */
export function minuteLabel(date: Date): string {
  return `${dayStamp(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * Keep letters, digits, spaces, dashes and underscores; everything else
 * becomes an underscore. Truncated to 50 characters.
 */
export function safeFileTitle(title: string): string {
  return title.replace(/[^\p{L}\p{N} _-]/gu, '_').slice(0, 50);
}

export function twoDigit(value: number): string {
  return pad(value);
}
