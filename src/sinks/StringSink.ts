import {Sink} from "../types";

/**
 * Keeps every written chunk in memory.
 */
export class StringSink implements Sink {
    private readonly chunks: string[] = [];

    write(chunk: string): void {
        this.chunks.push(chunk);
    }

    get lines(): readonly string[] {
        return [...this.chunks];
    }

    clear(): void {
        this.chunks.length = 0;
    }

    toString(): string {
        return this.chunks.join('');
    }
}
