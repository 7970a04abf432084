/**
 * Syslog facilities. Values are already shifted left by three bits so they
 * can be OR-ed with a {@link Severity} to form the PRI value.
 */
export enum Facility {
    KERN = 0 << 3,
    USER = 1 << 3,
    MAIL = 2 << 3,
    DAEMON = 3 << 3,
    AUTH = 4 << 3,
    SYSLOG = 5 << 3,
    LPR = 6 << 3,
    NEWS = 7 << 3,
    UUCP = 8 << 3,
    CRON = 9 << 3,
    AUTHPRIV = 10 << 3,
    FTP = 11 << 3,
    NTP = 12 << 3,
    AUDIT = 13 << 3,
    ALERT = 14 << 3,
    CLOCK = 15 << 3,
    LOCAL0 = 16 << 3,
    LOCAL1 = 17 << 3,
    LOCAL2 = 18 << 3,
    LOCAL3 = 19 << 3,
    LOCAL4 = 20 << 3,
    LOCAL5 = 21 << 3,
    LOCAL6 = 22 << 3,
    LOCAL7 = 23 << 3,
}

export type FacilityName = Lowercase<keyof typeof Facility>;

const FACILITY_BY_NAME: ReadonlyMap<string, Facility> = new Map(
    Object.entries(Facility)
        .filter((entry): entry is [string, Facility] => typeof entry[1] === 'number')
        .map(([key, value]): [string, Facility] => [key.toLowerCase(), value])
);

const FACILITY_VALUES: ReadonlySet<number> = new Set(FACILITY_BY_NAME.values());

export function isFacility(value: number): value is Facility {
    return FACILITY_VALUES.has(value);
}

/**
 * Resolves a facility from its name, e.g. `local3` or `LOG_DAEMON`.
 */
export function parseFacility(name: string): Facility | undefined {
    const normalized = name.trim().toLowerCase();
    const bare = normalized.startsWith('log_') ? normalized.slice(4) : normalized;
    return FACILITY_BY_NAME.get(bare);
}
