import {SDParams, StructuredData} from "../types";
import {NILVALUE} from "../constants";

export interface StructuredDataOptions {
    /** Backslash-escape `\`, `"` and `]` in param values (RFC 5424 section 6.3.3). */
    escape?: boolean;
}

type Mapping<V> = Readonly<Record<string, V>> | ReadonlyMap<string, V>;

function isMap<V>(mapping: Mapping<V>): mapping is ReadonlyMap<string, V> {
    return mapping instanceof Map;
}

function entriesOf<V>(mapping: Mapping<V>): Iterable<[string, V]> {
    return isMap(mapping) ? mapping.entries() : Object.entries(mapping);
}

export function escapeParamValue(value: string): string {
    return value
        .replace(/\\/g, '\\\\')
        .replace(/"/g, '\\"')
        .replace(/]/g, '\\]');
}

function encodeElement(id: string, params: SDParams, escape: boolean): string {
    let element = `[${id}`;
    for (const [name, value] of entriesOf(params)) {
        element += ` ${name}="${escape ? escapeParamValue(value) : value}"`;
    }
    return element + ']';
}

/**
 * Renders STRUCTURED-DATA. Values go out verbatim unless `escape` is set.
 * An empty mapping yields NILVALUE.
 */
export function encodeStructuredData(data: StructuredData, options: StructuredDataOptions = {}): string {
    let encoded = '';
    for (const [id, params] of entriesOf(data)) {
        encoded += encodeElement(id, params, options.escape ?? false);
    }
    return encoded || NILVALUE;
}
