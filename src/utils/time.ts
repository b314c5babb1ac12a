/**
 * @fileoverview Date formatting with strftime-style patterns.
 * The configuration stores `date_format` and `time_format` in this notation.
 *
 * @module utils/time
 */

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

/**
 * Formats a date in local time. Supported directives: `%Y`, `%y`, `%m`,
 * `%d`, `%H`, `%M`, `%S`, `%f` (milliseconds, three digits) and `%%`.
 * Unknown directives are emitted verbatim.
 *
 * @example
 * formatDate(new Date(2024, 0, 5, 9, 3, 7), '%Y-%m-%d %H:%M:%S');
 * // '2024-01-05 09:03:07'
 */
export function formatDate(date: Date, pattern: string): string {
    return pattern.replace(/%([a-zA-Z%])/g, (directive, code: string) => {
        switch (code) {
            case 'Y': return String(date.getFullYear());
            case 'y': return pad(date.getFullYear() % 100);
            case 'm': return pad(date.getMonth() + 1);
            case 'd': return pad(date.getDate());
            case 'H': return pad(date.getHours());
            case 'M': return pad(date.getMinutes());
            case 'S': return pad(date.getSeconds());
            case 'f': return pad(date.getMilliseconds(), 3);
            case '%': return '%';
            default: return directive;
        }
    });
}

/**
 * Current instant.
 */
export function systemClock(): Date {
    return new Date();
}
