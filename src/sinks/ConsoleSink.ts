import {Sink} from "../types";

export class ConsoleSink implements Sink {
    constructor(
        private readonly binding: Pick<typeof console, 'log'> = console,
    ) {}

    write(chunk: string): void {
        this.binding.log(chunk);
    }
}
