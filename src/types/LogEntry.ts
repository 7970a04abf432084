import {LogLevel} from "./LogLevel";

export type ContextValue = string | number | boolean | null | undefined | object;

export interface LogEntry {
    level: LogLevel;
    message: string;
    timestamp: Date;
    context?: Record<string, ContextValue>;
    error?: Error;
    tags?: string[];
}
