import {Formatter3164Options, Formatter5424Options, FormatterOptions} from "./types";
import {Formatter3164, Formatter5424} from "./formatters";
import {detectIdentity, IdentityProbe, nodeProbe} from "./identity";

// ============================================================================
// CONVENIENCE FACTORY
// ============================================================================

function withIdentity(overrides: Partial<FormatterOptions>, probe: IdentityProbe): FormatterOptions {
    const identity = detectIdentity(probe);
    return {
        facility: overrides.facility,
        hostname: overrides.hostname === undefined ? identity.hostname : overrides.hostname,
        process: overrides.process ?? identity.process,
        pid: overrides.pid ?? identity.pid,
        clock: overrides.clock,
    };
}

/**
 * Builds an RFC 3164 formatter from the detected host and process identity.
 * Call once at startup; explicit options win over detected values and
 * `hostname: null` drops the hostname.
 */
export function createFormatter3164(
    options: Partial<Formatter3164Options> = {},
    probe: IdentityProbe = nodeProbe()
): Formatter3164 {
    return new Formatter3164({...withIdentity(options, probe), timeZone: options.timeZone});
}

/** RFC 5424 counterpart of {@link createFormatter3164}. */
export function createFormatter5424(
    options: Partial<Formatter5424Options> = {},
    probe: IdentityProbe = nodeProbe()
): Formatter5424 {
    return new Formatter5424({...withIdentity(options, probe), escapeStructuredData: options.escapeStructuredData});
}

export * from './formatters'
export * from './encoding'
export * from './sinks'
export * from './types'
export * from './constants'
export * from './errors'
export * from './identity'
