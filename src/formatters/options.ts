import {Facility, FacilityName, FormatterOptions, isFacility, parseFacility} from "../types";
import {DEFAULT_FACILITY} from "../constants";
import {ConfigurationError} from "../errors";

export function resolveFacility(facility: Facility | FacilityName | undefined): Facility {
    if (facility === undefined) return DEFAULT_FACILITY;
    if (typeof facility === 'number') {
        // codes are pre-shifted: 16 is MAIL, not local0
        if (!isFacility(facility)) {
            throw new ConfigurationError(`Unknown syslog facility: ${facility}`);
        }
        return facility;
    }

    const parsed = parseFacility(facility);
    if (parsed === undefined) {
        throw new ConfigurationError(`Unknown syslog facility: ${facility}`);
    }
    return parsed;
}

/** A blank hostname counts as unknown. */
export function resolveHostname(hostname: FormatterOptions['hostname']): string | undefined {
    return hostname && hostname.trim() ? hostname : undefined;
}

export function resolvePid(pid: FormatterOptions['pid']): number {
    if (!Number.isSafeInteger(pid) || pid < 0) {
        throw new ConfigurationError(`Process id must be a non-negative integer, got ${pid}`);
    }
    return pid;
}
