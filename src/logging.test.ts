import { describe, expect, it } from 'vitest';
import { createTestLogger } from './__test__/fakes';
import { componentLogger, LogLevel, parseLogLevel, traceGated } from './logging';

describe('parseLogLevel', () => {
    it('accepts names in any case', () => {
        expect(parseLogLevel('trace')).toBe(LogLevel.TRACE);
        expect(parseLogLevel('Debug')).toBe(LogLevel.DEBUG);
        expect(parseLogLevel('WARNING')).toBe(LogLevel.WARN);
        expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
    });

    it('falls back to info', () => {
        expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    });
});

describe('traceGated', () => {
    it('drops trace lines when disabled', () => {
        const logger = createTestLogger();
        const gated = traceGated(logger, false);
        gated.trace('SocketWrite: {}');
        gated.info('connected');

        expect(logger.trace).not.toHaveBeenCalled();
        expect(logger.info).toHaveBeenCalledWith('connected');
    });

    it('passes trace lines through when enabled', () => {
        const logger = createTestLogger();
        componentLogger('rtclient.socket', { logger, trace: true }).trace('SocketWrite: {}');
        expect(logger.trace).toHaveBeenCalledWith('SocketWrite: {}');
    });
});
