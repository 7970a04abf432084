import {Facility, FacilityName} from "./Facility";

export type TimeZone = 'local' | 'utc';

/** Nanoseconds since the Unix epoch. */
export type Clock = () => bigint;

export interface FormatterOptions {
    facility?: Facility | FacilityName;
    /** `null` or omitted means no hostname is known. */
    hostname?: string | null;
    process: string;
    pid: number;
    clock?: Clock;
}

export interface Formatter3164Options extends FormatterOptions {
    timeZone?: TimeZone;
}

export interface Formatter5424Options extends FormatterOptions {
    escapeStructuredData?: boolean;
}
