export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Parses a compact duration such as `15m`, `12h` or `7d` into seconds.
 * Returns `fallback` when the string does not match.
 */
export function parseDuration(expiry: string, fallback = 900): number {
    const match = expiry.match(/^(\d+)(s|m|h|d)$/);
    if (!match) return fallback;
    const value = parseInt(match[1], 10);
    switch (match[2]) {
        case 's': return value;
        case 'm': return value * 60;
        case 'h': return value * 3600;
        case 'd': return value * 86400;
        default: return fallback;
    }
}

export function toEpochSeconds(date: Date): number {
    return Math.floor(date.getTime() / 1000);
}

export function addSeconds(date: Date, seconds: number): Date {
    return new Date(date.getTime() + seconds * 1000);
}
