import {LogFormat, Severity, Sink} from "../types";
import {FormatError} from "../errors";

/**
 * Base for the wire formats: subclasses render a line, this class writes it
 * and provides one method per severity.
 */
export abstract class SeverityFormat<T> implements LogFormat<T> {
    /**
     * Renders one line without a trailing newline.
     * @param at nanoseconds since the epoch; defaults to the formatter's clock
     */
    abstract render(severity: Severity, message: T, at?: bigint): string;

    format(sink: Sink, severity: Severity, message: T): void {
        const line = this.render(severity, message);
        try {
            sink.write(line);
        } catch (error) {
            throw new FormatError(error);
        }
    }

    emerg(sink: Sink, message: T): void {
        this.format(sink, Severity.EMERG, message);
    }

    alert(sink: Sink, message: T): void {
        this.format(sink, Severity.ALERT, message);
    }

    crit(sink: Sink, message: T): void {
        this.format(sink, Severity.CRIT, message);
    }

    err(sink: Sink, message: T): void {
        this.format(sink, Severity.ERR, message);
    }

    warning(sink: Sink, message: T): void {
        this.format(sink, Severity.WARNING, message);
    }

    notice(sink: Sink, message: T): void {
        this.format(sink, Severity.NOTICE, message);
    }

    info(sink: Sink, message: T): void {
        this.format(sink, Severity.INFO, message);
    }

    debug(sink: Sink, message: T): void {
        this.format(sink, Severity.DEBUG, message);
    }
}
