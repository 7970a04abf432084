import {Formatter, LogEntry, LogLevel, FormatterOptions, Severity, TimeZone} from "../types";
import {fromDate, isPrintableAscii} from "../encoding";
import {DEFAULT_SD_ID, MAX_SD_NAME_LENGTH} from "../constants";
import {Formatter3164} from "./Formatter3164";
import {Formatter5424} from "./Formatter5424";

export type SyslogProtocol = 'rfc5424' | 'rfc3164';

export interface SyslogFormatterOptions extends Omit<FormatterOptions, 'clock'> {
    protocol?: SyslogProtocol;
    messageId?: string | number;
    /** SD-ID that carries tags and context (RFC 5424 only). */
    sdId?: string;
    /** RFC 3164 only. */
    timeZone?: TimeZone;
}

/**
 * Renders a {@link LogEntry} as a syslog line, stamped with the entry's own
 * timestamp. Under RFC 5424, tags and primitive context values become params
 * of a single SD element.
 */
export class SyslogFormatter implements Formatter {
    private readonly formatter: Formatter3164 | Formatter5424;
    private readonly messageId?: string | number;
    private readonly sdId: string;

    constructor(options: SyslogFormatterOptions) {
        const {protocol = 'rfc5424', messageId, sdId = DEFAULT_SD_ID, ...identity} = options;
        this.formatter = protocol === 'rfc3164'
            ? new Formatter3164(identity)
            : new Formatter5424({...identity, escapeStructuredData: true});
        this.messageId = messageId;
        this.sdId = sdId;
    }

    format(entry: LogEntry): string {
        const severity = this.mapLevelToSyslogSeverity(entry.level);
        const at = fromDate(entry.timestamp);
        const message = this.buildMessage(entry);

        if (this.formatter instanceof Formatter3164) {
            return this.formatter.render(severity, message, at);
        }
        return this.formatter.render(severity, [this.messageId, this.buildStructuredData(entry), message], at);
    }

    private buildMessage(entry: LogEntry): string {
        let msg = entry.message || '';
        if (entry.error) {
            const errStr = entry.error.stack || entry.error.message || String(entry.error);
            msg = msg ? `${msg} ${errStr}` : errStr;
        }
        return msg;
    }

    private buildStructuredData(entry: LogEntry): Map<string, Map<string, string>> {
        const params = new Map<string, string>();
        if (entry.tags && entry.tags.length > 0) {
            params.set('tags', entry.tags.join(','));
        }
        for (const [key, value] of Object.entries(entry.context ?? {})) {
            if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
                const name = this.toParamName(key);
                if (name) params.set(name, String(value));
            }
        }
        return params.size > 0 ? new Map([[this.sdId, params]]) : new Map();
    }

    // PARAM-NAME: printable ASCII except '=', ' ', ']' and '"', at most 32 characters
    private toParamName(key: string): string {
        return [...key]
            .filter(char => isPrintableAscii(char) && !'="]'.includes(char))
            .slice(0, MAX_SD_NAME_LENGTH)
            .join('');
    }

    private mapLevelToSyslogSeverity(level: LogLevel): Severity {
        switch (level) {
            case LogLevel.TRACE:
            case LogLevel.DEBUG: return Severity.DEBUG;
            case LogLevel.INFO:  return Severity.INFO;
            case LogLevel.WARN:  return Severity.WARNING;
            case LogLevel.ERROR: return Severity.ERR;
            case LogLevel.FATAL: return Severity.CRIT;
            default: return Severity.INFO;
        }
    }
}
