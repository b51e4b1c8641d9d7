import { NOT_AVAILABLE } from '../interfaces/cityWeather';
import { logger } from '../logger';

// Observations closer to "now" than this get the date appended.
export const RECENT_WINDOW_SECONDS = 2 * 60 * 60;

// Local time is produced by shifting the epoch by the city's UTC offset
// and formatting the result as UTC.
const timeFormat = new Intl.DateTimeFormat('en-US', {
    timeZone: 'UTC',
    hour: 'numeric',
    minute: '2-digit',
    hour12: true,
});

const dateFormat = new Intl.DateTimeFormat('en-US', {
    timeZone: 'UTC',
    month: 'short',
    day: '2-digit',
});

function part(parts: Intl.DateTimeFormatPart[], type: Intl.DateTimeFormatPartTypes): string {
    return parts.find((p) => p.type === type)?.value ?? '';
}

/**
 * Formats a UTC epoch (seconds) as wall-clock time in a zone `offsetSeconds`
 * away from UTC, e.g. `6:42pm` or, when within two hours of `now`, `9am, oct 19`.
 */
export function formatLocalTime(
    timestampUtc: number | null | undefined,
    offsetSeconds: number | null | undefined,
    now: number = Date.now()
): string {
    if (timestampUtc == null || offsetSeconds == null) {
        return NOT_AVAILABLE;
    }

    try {
        const local = new Date((timestampUtc + offsetSeconds) * 1000);

        const timeParts = timeFormat.formatToParts(local);
        const hour = part(timeParts, 'hour');
        const minute = part(timeParts, 'minute').padStart(2, '0');
        const period = part(timeParts, 'dayPeriod').toLowerCase();
        const time = minute === '00' ? `${hour}${period}` : `${hour}:${minute}${period}`;

        if (Math.abs(now / 1000 - timestampUtc) < RECENT_WINDOW_SECONDS) {
            const dateParts = dateFormat.formatToParts(local);
            const month = part(dateParts, 'month').toLowerCase();
            const day = part(dateParts, 'day').padStart(2, '0');
            return `${time}, ${month} ${day}`;
        }

        return time;
    } catch (err) {
        logger.warn({ err, timestampUtc, offsetSeconds }, 'Failed to format timestamp');
        return NOT_AVAILABLE;
    }
}
