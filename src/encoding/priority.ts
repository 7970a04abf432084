import {Facility, Severity} from "../types";

/**
 * PRI value: the (pre-shifted) facility OR-ed with the severity code.
 */
export function encodePriority(severity: Severity, facility: Facility): number {
    return facility | severity;
}
