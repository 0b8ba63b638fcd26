/**
 * Time helpers shared by the provider gateways and message templates.
 */

import { DateTime } from 'luxon';

// Tried in order before falling back to a generic ISO-8601 parse
const PROVIDER_TIMESTAMP_FORMATS = [
    "yyyy-MM-dd'T'HH:mm:ss",
    "yyyy-MM-dd'T'HH:mm:ss'Z'",
    "yyyy-MM-dd'T'HH:mm:ssZZZ",
];

/**
 * Parse a provider timestamp. Providers are not consistent about offsets or
 * fractional seconds; values without an offset are taken as UTC. When
 * nothing parses the fallback clock is used instead of failing the check.
 */
export function parseProviderTimestamp(raw: string | null | undefined, fallback: () => Date = () => new Date()): Date {
    const value = raw?.trim();
    if (!value) return fallback();

    for (const format of PROVIDER_TIMESTAMP_FORMATS) {
        const parsed = DateTime.fromFormat(value, format, { zone: 'utc' });
        if (parsed.isValid) return parsed.toJSDate();
    }

    const iso = DateTime.fromISO(value, { zone: 'utc' });
    if (iso.isValid) return iso.toJSDate();

    return fallback();
}

/** Render as UTC+8 wall-clock time, e.g. `2025-03-01 18:30:00`. */
export function formatUtc8(date: Date): string {
    return DateTime.fromJSDate(date).setZone('UTC+8').toFormat('yyyy-MM-dd HH:mm:ss');
}

export function minutesToMs(minutes: number): number {
    return minutes * 60 * 1000;
}
