import {closeSync, existsSync, mkdirSync, openSync, writeSync} from "fs";
import {dirname} from "path";
import {Sink} from "../types";

/**
 * Synchronous writes to a file descriptor. Each chunk is followed by
 * `terminator`, which is empty unless given.
 *
 * @example
 * const sink = FdSink.open('./logs/syslog.log');
 * new Formatter5424({process: 'api', pid: process.pid}).info(sink, ['boot', {}, 'ready']);
 * sink.close();
 */
export class FdSink implements Sink {
    constructor(
        readonly fd: number,
        private readonly terminator: string = ''
    ) {}

    /** Opens `filePath` for appending, creating its directory if needed. */
    static open(filePath: string, terminator: string = '\n'): FdSink {
        const dir = dirname(filePath);
        if (!existsSync(dir)) {
            mkdirSync(dir, {recursive: true});
        }
        return new FdSink(openSync(filePath, 'a'), terminator);
    }

    write(chunk: string): void {
        writeSync(this.fd, chunk + this.terminator);
    }

    close(): void {
        closeSync(this.fd);
    }
}
