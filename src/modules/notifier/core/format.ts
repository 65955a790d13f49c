const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * `yyyy-MM-dd` in UTC.
 */
export const formatDate = (date: Date): string =>
  `${String(date.getUTCFullYear())}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;

/**
 * `yyyy-MM-dd HH:mm:ss UTC`.
 */
export const formatTimestamp = (date: Date): string =>
  `${formatDate(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} UTC`;
