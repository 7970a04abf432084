import {Clock, Displayable, Facility, Formatter5424Options, Severity, StructuredData} from "../types";
import {
    encodePriority,
    encodeStructuredData,
    formatRfc3339Timestamp,
    normalizeMessageId,
    systemClock
} from "../encoding";
import {FALLBACK_HOSTNAME, SYSLOG_VERSION} from "../constants";
import {SeverityFormat} from "./SeverityFormat";
import {resolveFacility, resolveHostname, resolvePid} from "./options";

/** A message id given as a number is written in decimal. */
export type Rfc5424Message = readonly [
    messageId: string | number | null | undefined,
    data: StructuredData,
    message: Displayable,
];

/**
 * Structured syslog (RFC 5424):
 * `<PRI>1 TIMESTAMP HOSTNAME APP-NAME PROCID MSGID STRUCTURED-DATA MSG`
 *
 * A missing hostname is written as `localhost`. Structured data values are
 * written verbatim unless `escapeStructuredData` is set.
 */
export class Formatter5424 extends SeverityFormat<Rfc5424Message> {
    readonly facility: Facility;
    readonly hostname?: string;
    /** APP-NAME */
    readonly process: string;
    readonly pid: number;
    readonly escapeStructuredData: boolean;
    private readonly clock: Clock;

    constructor(options: Formatter5424Options) {
        super();
        this.facility = resolveFacility(options.facility);
        this.hostname = resolveHostname(options.hostname);
        this.process = options.process;
        this.pid = resolvePid(options.pid);
        this.escapeStructuredData = options.escapeStructuredData ?? false;
        this.clock = options.clock ?? systemClock;
    }

    render(severity: Severity, message: Rfc5424Message, at: bigint = this.clock()): string {
        const [messageId, data, body] = message;
        if (typeof messageId === 'number') {
            return this.render(severity, [String(messageId), data, body], at);
        }

        const fields = [
            `<${encodePriority(severity, this.facility)}>${SYSLOG_VERSION}`,
            formatRfc3339Timestamp(at),
            this.hostname ?? FALLBACK_HOSTNAME,
            this.process,
            this.pid,
            normalizeMessageId(messageId),
            encodeStructuredData(data, {escape: this.escapeStructuredData}),
            String(body),
        ];
        return fields.join(' ');
    }
}
