export class SyslogError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'SyslogError';
    }
}

/**
 * Raised when the sink rejects a rendered line. The sink's error is kept as `cause`.
 */
export class FormatError extends SyslogError {
    constructor(cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to write syslog message: ${reason}`, 'FORMAT', {cause});
        this.name = 'FormatError';
    }
}

export class ConfigurationError extends SyslogError {
    constructor(message: string) {
        super(message, 'CONFIGURATION');
        this.name = 'ConfigurationError';
    }
}
