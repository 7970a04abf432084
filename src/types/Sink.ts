/**
 * Destination for rendered lines. A write signals failure by throwing.
 */
export interface Sink {
    write(chunk: string): unknown;
}
