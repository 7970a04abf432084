// tests/formatters/SyslogFormatter.test.ts
import { describe, it, expect } from 'vitest';
import { Facility, LogLevel, SyslogFormatter } from '../../src';

const identity = {
    facility: Facility.LOCAL0,
    hostname: 'test-host',
    process: 'billing-api',
    pid: 12345,
};

describe('SyslogFormatter (RFC 5424)', () => {
    it('formats a basic entry with its own timestamp', () => {
        const formatter = new SyslogFormatter(identity);
        const output = formatter.format({
            level: LogLevel.INFO,
            message: 'App started',
            timestamp: new Date('2025-10-18T12:00:00.123Z')
        });

        // facility=16, severity=6 → PRI=134
        expect(output).toBe(
            '<134>1 2025-10-18T12:00:00.123Z test-host billing-api 12345 - - App started'
        );
    });

    it('includes structured data when tags or context are present', () => {
        const formatter = new SyslogFormatter(identity);
        const output = formatter.format({
            level: LogLevel.WARN,
            message: 'User action',
            tags: ['auth', 'v2'],
            context: { userId: 123, ip: '192.168.1.1' },
            timestamp: new Date('2025-10-18T12:00:00.000Z')
        });

        expect(output).toBe(
            '<132>1 2025-10-18T12:00:00Z test-host billing-api 12345 - [meta@32473 tags="auth,v2" userId="123" ip="192.168.1.1"] User action'
        );
    });

    it('escapes special characters in structured data', () => {
        const formatter = new SyslogFormatter(identity);
        const output = formatter.format({
            level: LogLevel.INFO,
            message: 'Escape test',
            context: { path: '/api/v1"test\\end]' }, // literal: /api/v1"test\end]
            timestamp: new Date('2025-10-18T12:00:00.000Z')
        });

        expect(output).toBe(
            '<134>1 2025-10-18T12:00:00Z test-host billing-api 12345 - [meta@32473 path="/api/v1\\"test\\\\end\\]"] Escape test'
        );
    });

    it('keeps only primitive context values and cleans param names', () => {
        const formatter = new SyslogFormatter({ ...identity, sdId: 'app@32473' });
        const output = formatter.format({
            level: LogLevel.INFO,
            message: 'ctx',
            context: { nested: { a: 1 }, missing: null, 'user id': 'u1', ok: true },
            timestamp: new Date('2025-10-18T12:00:00.000Z')
        });

        expect(output).toBe(
            '<134>1 2025-10-18T12:00:00Z test-host billing-api 12345 - [app@32473 userid="u1" ok="true"] ctx'
        );
    });

    it('appends the error stack to the message', () => {
        const err = new Error('DB timeout');
        err.stack = 'Error: DB timeout\n    at connect (db.ts:10:1)';

        const formatter = new SyslogFormatter(identity);
        const output = formatter.format({
            level: LogLevel.ERROR,
            message: 'Failed to connect',
            error: err,
            timestamp: new Date('2025-10-18T12:00:00.000Z')
        });

        expect(output).toBe(
            '<131>1 2025-10-18T12:00:00Z test-host billing-api 12345 - - Failed to connect Error: DB timeout\n    at connect (db.ts:10:1)'
        );
    });

    it('uses a configured message id', () => {
        const formatter = new SyslogFormatter({ ...identity, facility: 'user', messageId: 'START' });
        const output = formatter.format({
            level: LogLevel.INFO,
            message: 'Custom',
            timestamp: new Date('2025-10-18T12:00:00.000Z')
        });

        // PRI = 1*8 + 6 = 14
        expect(output).toBe('<14>1 2025-10-18T12:00:00Z test-host billing-api 12345 START - Custom');
    });

    it('maps all log levels to correct syslog severity', () => {
        const cases = [
            { level: LogLevel.TRACE, pri: 16 * 8 + 7 }, // 135
            { level: LogLevel.DEBUG, pri: 135 },
            { level: LogLevel.INFO,  pri: 134 },
            { level: LogLevel.WARN,  pri: 132 },
            { level: LogLevel.ERROR, pri: 131 },
            { level: LogLevel.FATAL, pri: 130 },
        ];

        const formatter = new SyslogFormatter(identity);
        for (const { level, pri } of cases) {
            const output = formatter.format({
                level,
                message: 'test',
                timestamp: new Date('2025-10-18T12:00:00.000Z')
            });
            expect(output.startsWith(`<${pri}>1 `)).toBe(true);
        }
    });
});

describe('SyslogFormatter (RFC 3164)', () => {
    it('formats the entry as a BSD line', () => {
        const formatter = new SyslogFormatter({ ...identity, protocol: 'rfc3164', timeZone: 'utc' });
        const output = formatter.format({
            level: LogLevel.ERROR,
            message: 'Failed',
            tags: ['ignored'],
            timestamp: new Date('2025-10-18T12:00:00.000Z')
        });

        expect(output).toBe('<131>Oct 18 12:00:00 test-host billing-api[12345]: Failed');
    });

    it('leaves out the hostname when none is set', () => {
        const formatter = new SyslogFormatter({ ...identity, hostname: null, protocol: 'rfc3164', timeZone: 'utc' });
        const output = formatter.format({
            level: LogLevel.INFO,
            message: 'ok',
            timestamp: new Date('2025-10-18T09:05:03.000Z')
        });

        expect(output).toBe('<134>Oct 18 09:05:03 billing-api[12345]: ok');
    });
});
