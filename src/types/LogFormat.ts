import {Severity} from "./Severity";
import {Sink} from "./Sink";

export type Displayable = string | number | bigint | boolean | { toString(): string };

/**
 * A wire format that can render messages of type `T` at any severity.
 */
export interface LogFormat<T> {
    format(sink: Sink, severity: Severity, message: T): void;

    emerg(sink: Sink, message: T): void;

    alert(sink: Sink, message: T): void;

    crit(sink: Sink, message: T): void;

    err(sink: Sink, message: T): void;

    warning(sink: Sink, message: T): void;

    notice(sink: Sink, message: T): void;

    info(sink: Sink, message: T): void;

    debug(sink: Sink, message: T): void;
}
