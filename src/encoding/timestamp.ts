import {Clock, TimeZone} from "../types";

const NANOS_PER_MILLI = 1_000_000n;
const NANOS_PER_SECOND = 1_000_000_000n;

// RFC 3339 years have four digits: 0000-01-01T00:00:00Z to 9999-12-31T23:59:59Z
const MIN_RFC3339_SECONDS = -62_167_219_200n;
const MAX_RFC3339_SECONDS = 253_402_300_799n;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

let anchor = {
    wall: BigInt(Date.now()) * NANOS_PER_MILLI,
    hr: process.hrtime.bigint(),
};

/**
 * Wall-clock time in nanoseconds since the epoch. `Date.now()` only has
 * millisecond resolution, so the sub-millisecond part comes from the
 * monotonic timer, re-anchored whenever the two disagree by a millisecond.
 */
export const systemClock: Clock = () => {
    const hr = process.hrtime.bigint();
    const wall = BigInt(Date.now()) * NANOS_PER_MILLI;
    const precise = anchor.wall + (hr - anchor.hr);
    const drift = precise > wall ? precise - wall : wall - precise;
    if (drift >= NANOS_PER_MILLI) {
        anchor = {wall, hr};
        return wall;
    }
    return precise;
};

export function fromDate(date: Date): bigint {
    return BigInt(date.getTime()) * NANOS_PER_MILLI;
}

function split(instant: bigint): { seconds: bigint; nanos: number } {
    let seconds = instant / NANOS_PER_SECOND;
    let remainder = instant % NANOS_PER_SECOND;
    if (remainder < 0n) {
        remainder += NANOS_PER_SECOND;
        seconds -= 1n;
    }
    return {seconds, nanos: Number(remainder)};
}

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * RFC 3164 TIMESTAMP, `Mmm dd hh:mm:ss` with the day padded by a space.
 */
export function formatRfc3164Timestamp(instant: bigint, timeZone: TimeZone = 'local'): string {
    const {seconds, nanos} = split(instant);
    const date = new Date(Number(seconds) * 1000 + Math.floor(nanos / 1_000_000));

    const utc = timeZone === 'utc';
    const month = utc ? date.getUTCMonth() : date.getMonth();
    const day = utc ? date.getUTCDate() : date.getDate();
    const hours = utc ? date.getUTCHours() : date.getHours();
    const minutes = utc ? date.getUTCMinutes() : date.getMinutes();
    const secs = utc ? date.getUTCSeconds() : date.getSeconds();

    return `${MONTHS[month]} ${String(day).padStart(2, ' ')} ${pad2(hours)}:${pad2(minutes)}:${pad2(secs)}`;
}

function clampToRfc3339(instant: bigint): { seconds: bigint; nanos: number } {
    const {seconds, nanos} = split(instant);
    if (seconds < MIN_RFC3339_SECONDS) return {seconds: MIN_RFC3339_SECONDS, nanos: 0};
    if (seconds > MAX_RFC3339_SECONDS) return {seconds: MAX_RFC3339_SECONDS, nanos: 999_999_999};
    return {seconds, nanos};
}

/**
 * RFC 3339 timestamp in UTC. The fraction is floored to microseconds (RFC 5424
 * allows at most six digits), trailing zeros are dropped and a zero fraction
 * is left out. Instants outside years 0000-9999 are clamped to that range.
 */
export function formatRfc3339Timestamp(instant: bigint): string {
    const {seconds, nanos} = clampToRfc3339(instant);
    const date = new Date(Number(seconds) * 1000);
    const base = `${String(date.getUTCFullYear()).padStart(4, '0')}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}` +
        `T${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`;

    const micros = Math.floor(nanos / 1000);
    if (micros === 0) {
        return `${base}Z`;
    }
    const fraction = String(micros).padStart(6, '0').replace(/0+$/, '');
    return `${base}.${fraction}Z`;
}
