import { describe, it, expect } from 'vitest';
import { CodecError, asCodecError, formatPath } from './codecError';
import { ErrorCode, getErrorCodeName } from './errorCodes';
import { LogLevel, LoggerImpl } from './logger';
import type { LogEntry } from './logger';

describe('CodecError', () => {
    it('carries code and code name', () => {
        const err = CodecError.missingField('name');
        expect(err.code).toBe(ErrorCode.MissingField);
        expect(err.codeName).toBe('MissingField');
        expect(err.message).toBe('missing field `name`');
        expect(err).toBeInstanceOf(Error);
    });

    it('builds the path outermost first as segments are prepended', () => {
        const err = CodecError.invalidType('string "hello"', 'u64');
        err.prependPath({ kind: 'field', name: 'id' });
        err.prependPath({ kind: 'index', index: 2 });
        err.prependPath({ kind: 'field', name: 'items' });
        expect(err.pathString).toBe('items[2].id');
        expect(err.toString()).toBe('InvalidType (70): invalid type: string "hello", expected u64 at items[2].id');
    });

    it('renders an empty path as an empty string', () => {
        expect(formatPath([])).toBe('');
        expect(CodecError.custom('boom').toString()).toBe('Custom (2): boom');
    });

    it('flags malformed input codes', () => {
        expect(CodecError.unterminatedCString(7).isMalformedInput).toBe(true);
        expect(CodecError.lossyConversion('too big').isMalformedInput).toBe(false);
    });

    it('keeps the byte offset of malformed input', () => {
        expect(CodecError.unknownElementType(0x42, 9).offset).toBe(9);
    });

    it('wraps foreign errors as Custom', () => {
        const cause = new RangeError('out of range');
        const err = asCodecError(cause);
        expect(err.code).toBe(ErrorCode.Custom);
        expect(err.message).toBe('out of range');
        expect(err.cause).toBe(cause);

        const same = CodecError.invalidUuid('bad');
        expect(asCodecError(same)).toBe(same);
    });

    it('names every error code', () => {
        expect(getErrorCodeName(ErrorCode.InvalidValue)).toBe('InvalidValue');
        expect(getErrorCodeName(ErrorCode.UnknownVariant)).toBe('UnknownVariant');
        expect(CodecError.invalidSequenceLength(1, 'a tuple of 2 elements').message)
            .toBe('invalid length 1, expected a tuple of 2 elements');
        expect(getErrorCodeName(ErrorCode.DepthLimitExceeded)).toBe('DepthLimitExceeded');
    });
});

describe('LoggerImpl', () => {
    it('lets children follow the parent level', () => {
        const root = new LoggerImpl('test', LogLevel.Warn);
        const child = root.child('raw');
        expect(child.isEnabled(LogLevel.Debug)).toBe(false);
        expect(child.isEnabled(LogLevel.Error)).toBe(true);

        root.setLevel(LogLevel.Debug);
        expect(child.isEnabled(LogLevel.Debug)).toBe(true);
    });

    it('sends child entries to the root sink', () => {
        const root = new LoggerImpl('test', LogLevel.Debug);
        const entries: LogEntry[] = [];
        const child = root.child('raw');
        root.setSink((entry) => entries.push(entry));
        child.debug('replaced', { offset: 3n });
        child.setLevel(LogLevel.Error);
        child.warn('dropped');
        expect(entries.map((e) => [e.name, e.level, e.message, e.context])).toEqual([
            ['test.raw', LogLevel.Debug, 'replaced', { offset: 3n }],
        ]);
        expect(root.level).toBe(LogLevel.Error);
    });

    it('never enables the silent level', () => {
        const root = new LoggerImpl('test', LogLevel.Debug);
        expect(root.isEnabled(LogLevel.Silent)).toBe(false);
    });
});
