import {Clock, Displayable, Facility, Formatter3164Options, Severity, TimeZone} from "../types";
import {encodePriority, formatRfc3164Timestamp, systemClock} from "../encoding";
import {SeverityFormat} from "./SeverityFormat";
import {resolveFacility, resolveHostname, resolvePid} from "./options";

/**
 * BSD syslog (RFC 3164):
 * `<PRI>Mmm dd hh:mm:ss HOSTNAME PROCESS[PID]: MESSAGE`
 *
 * Without a hostname the HOSTNAME field is left out.
 *
 * @example
 * const formatter = new Formatter3164({hostname: 'web-1', process: 'api', pid: 4120});
 * formatter.info(sink, 'listening on :8080');
 */
export class Formatter3164 extends SeverityFormat<Displayable> {
    readonly facility: Facility;
    readonly hostname?: string;
    readonly process: string;
    readonly pid: number;
    readonly timeZone: TimeZone;
    private readonly clock: Clock;

    constructor(options: Formatter3164Options) {
        super();
        this.facility = resolveFacility(options.facility);
        this.hostname = resolveHostname(options.hostname);
        this.process = options.process;
        this.pid = resolvePid(options.pid);
        this.timeZone = options.timeZone ?? 'local';
        this.clock = options.clock ?? systemClock;
    }

    render(severity: Severity, message: Displayable, at: bigint = this.clock()): string {
        const pri = encodePriority(severity, this.facility);
        const timestamp = formatRfc3164Timestamp(at, this.timeZone);
        const host = this.hostname === undefined ? '' : `${this.hostname} `;

        return `<${pri}>${timestamp} ${host}${this.process}[${this.pid}]: ${String(message)}`;
    }
}
