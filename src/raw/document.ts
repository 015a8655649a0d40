import { CodecError, MIN_CODE_WITH_SCOPE_SIZE, MIN_DOCUMENT_SIZE, logger } from '../core';
import { DateTime } from '../bson/datetime';
import { BSONType, BinarySubtype, Decimal128, ObjectId, Timestamp, bsonTypeName, isBSONType } from '../bson/types';
import { DataEndian } from './dataEndian';
import { isRawBsonRefOf } from './element';
import type {
    RawBinaryRef,
    RawBsonConvertible,
    RawBsonRef,
    RawBsonRefOf,
    RawRegexRef,
} from './element';

const log = logger.child('raw');

/**
 * 原始迭代选项
 * EN: Raw iteration options
 */
export interface RawIterOptions {
    /** 用 U+FFFD 替换非法 UTF-8 EN: Replace invalid UTF-8 with U+FFFD */
    utf8Lossy?: boolean;
}

function rejected(err: unknown): unknown {
    if (err instanceof CodecError) {
        log.debug('rejected malformed BSON', { code: err.codeName, offset: err.offset, reason: err.message });
    }
    return err;
}

// 只检查能立即发现的截断：最小长度、长度前缀、终止符
// EN: Only the immediately detectable truncation: minimum size, length prefix, terminator
function checkFrame(buf: Buffer): void {
    if (buf.length < MIN_DOCUMENT_SIZE) {
        throw CodecError.invalidLength(
            `document must be at least ${MIN_DOCUMENT_SIZE} bytes, got ${buf.length}`, 0
        );
    }
    const declared = buf.readInt32LE(0);
    if (declared !== buf.length) {
        throw CodecError.invalidLength(
            `declared length ${declared} does not match buffer length ${buf.length}`, 0
        );
    }
    if (buf[buf.length - 1] !== 0) {
        throw CodecError.malformedValue('document is not null-terminated', buf.length - 1);
    }
}

function cstringSize(buf: Buffer, offset: number, limit: number): number {
    const end = buf.indexOf(0, offset);
    if (end === -1 || end >= limit) {
        throw CodecError.unterminatedCString(offset);
    }
    return end - offset + 1;
}

function stringSize(buf: Buffer, offset: number, limit: number): number {
    const len = DataEndian.readInt32LE(buf, offset, limit);
    if (len < 1) {
        throw CodecError.invalidLength(`string length ${len} must be at least 1`, offset);
    }
    return 4 + len;
}

// 值的总字节数（只读取长度字段，不解码）
// EN: Total byte size of a value; reads length fields only
function valueSize(buf: Buffer, type: BSONType, offset: number, limit: number): number {
    switch (type) {
        case BSONType.Undefined:
        case BSONType.Null:
        case BSONType.MinKey:
        case BSONType.MaxKey:
            return 0;
        case BSONType.Boolean:
            return 1;
        case BSONType.Int32:
            return 4;
        case BSONType.Double:
        case BSONType.DateTime:
        case BSONType.Timestamp:
        case BSONType.Int64:
            return 8;
        case BSONType.ObjectId:
            return 12;
        case BSONType.Decimal128:
            return 16;
        case BSONType.String:
        case BSONType.JavaScript:
        case BSONType.Symbol:
            return stringSize(buf, offset, limit);
        case BSONType.Document:
        case BSONType.Array: {
            const len = DataEndian.readInt32LE(buf, offset, limit);
            if (len < MIN_DOCUMENT_SIZE) {
                throw CodecError.invalidLength(`embedded document length ${len} is too small`, offset);
            }
            return len;
        }
        case BSONType.Binary: {
            const len = DataEndian.readInt32LE(buf, offset, limit);
            if (len < 0) {
                throw CodecError.invalidLength(`binary length ${len} is negative`, offset);
            }
            return 5 + len;
        }
        case BSONType.Regex: {
            const pattern = cstringSize(buf, offset, limit);
            return pattern + cstringSize(buf, offset + pattern, limit);
        }
        case BSONType.DBPointer:
            return stringSize(buf, offset, limit) + 12;
        case BSONType.JavaScriptWithScope: {
            const len = DataEndian.readInt32LE(buf, offset, limit);
            if (len < MIN_CODE_WITH_SCOPE_SIZE) {
                throw CodecError.invalidLength(`code with scope length ${len} is too small`, offset);
            }
            return len;
        }
    }
}

function readString(buf: Buffer, offset: number, size: number, lossy: boolean): string {
    const last = offset + size - 1;
    if (buf[last] !== 0) {
        throw CodecError.malformedValue('string is not null-terminated', last);
    }
    return DataEndian.decodeUtf8(buf, offset + 4, last, lossy);
}

function copyBytes(buf: Buffer, offset: number, size: number): Buffer {
    return Buffer.from(buf.subarray(offset, offset + size));
}

function readValue(buf: Buffer, type: BSONType, offset: number, size: number, lossy: boolean): RawBsonRef {
    const end = offset + size;
    switch (type) {
        case BSONType.Double:
            return { type: BSONType.Double, value: buf.readDoubleLE(offset) };
        case BSONType.String:
            return { type: BSONType.String, value: readString(buf, offset, size, lossy) };
        case BSONType.JavaScript:
            return { type: BSONType.JavaScript, value: readString(buf, offset, size, lossy) };
        case BSONType.Symbol:
            return { type: BSONType.Symbol, value: readString(buf, offset, size, lossy) };
        case BSONType.Document:
            return { type: BSONType.Document, value: RawDocument.fromBytes(buf.subarray(offset, end)) };
        case BSONType.Array:
            return { type: BSONType.Array, value: RawArray.fromBytes(buf.subarray(offset, end)) };
        case BSONType.Binary: {
            const subtype = buf[offset + 4];
            let start = offset + 5;
            if (subtype === BinarySubtype.BinaryOld) {
                const outer = size - 5;
                const inner = DataEndian.readInt32LE(buf, start, end);
                if (inner !== outer - 4) {
                    throw CodecError.invalidLength(
                        `old binary inner length ${inner} does not match outer length ${outer}`, start
                    );
                }
                start += 4;
            }
            const value: RawBinaryRef = { subtype, bytes: buf.subarray(start, end) };
            return { type: BSONType.Binary, value };
        }
        case BSONType.Undefined:
            return { type: BSONType.Undefined };
        case BSONType.ObjectId:
            return { type: BSONType.ObjectId, value: new ObjectId(copyBytes(buf, offset, 12)) };
        case BSONType.Boolean: {
            const byte = buf[offset];
            if (byte > 1) {
                throw CodecError.malformedValue(`boolean byte must be 0 or 1, got ${byte}`, offset);
            }
            return { type: BSONType.Boolean, value: byte === 1 };
        }
        case BSONType.DateTime:
            return { type: BSONType.DateTime, value: DateTime.fromMillis(buf.readBigInt64LE(offset)) };
        case BSONType.Null:
            return { type: BSONType.Null };
        case BSONType.Regex: {
            const pattern = DataEndian.readCString(buf, offset, end, lossy);
            const options = DataEndian.readCString(buf, offset + pattern.bytesRead, end, lossy);
            return { type: BSONType.Regex, value: { pattern: pattern.value, options: options.value } };
        }
        case BSONType.DBPointer: {
            const nsSize = size - 12;
            const namespace = readString(buf, offset, nsSize, lossy);
            const id = new ObjectId(copyBytes(buf, offset + nsSize, 12));
            return { type: BSONType.DBPointer, value: { namespace, id } };
        }
        case BSONType.JavaScriptWithScope: {
            const codeSize = stringSize(buf, offset + 4, end);
            DataEndian.ensureAvailable(offset + 4, codeSize, end);
            const code = readString(buf, offset + 4, codeSize, lossy);
            const scopeStart = offset + 4 + codeSize;
            const scopeLen = DataEndian.readInt32LE(buf, scopeStart, end);
            if (4 + codeSize + scopeLen !== size) {
                throw CodecError.invalidLength(
                    `code with scope length ${size} does not match its parts (${4 + codeSize + scopeLen})`, offset
                );
            }
            const scope = RawDocument.fromBytes(buf.subarray(scopeStart, end));
            return { type: BSONType.JavaScriptWithScope, value: { code, scope } };
        }
        case BSONType.Int32:
            return { type: BSONType.Int32, value: buf.readInt32LE(offset) };
        case BSONType.Timestamp: {
            // 线上格式先存递增序号
            // EN: The increment comes first on the wire
            const increment = buf.readUInt32LE(offset);
            const time = buf.readUInt32LE(offset + 4);
            return { type: BSONType.Timestamp, value: new Timestamp({ t: time, i: increment }) };
        }
        case BSONType.Int64:
            return { type: BSONType.Int64, value: buf.readBigInt64LE(offset) };
        case BSONType.Decimal128:
            return { type: BSONType.Decimal128, value: new Decimal128(copyBytes(buf, offset, 16)) };
        case BSONType.MinKey:
            return { type: BSONType.MinKey };
        case BSONType.MaxKey:
            return { type: BSONType.MaxKey };
    }
}

/**
 * 已完成结构校验的元素；值在访问时才解码
 * EN: A structurally checked element whose value is decoded on access
 */
export class RawElement {
    constructor(
        private readonly buf: Buffer,
        readonly key: string,
        readonly type: BSONType,
        readonly offset: number,
        readonly size: number
    ) {}

    value(utf8Lossy: boolean = false): RawBsonRef {
        try {
            return readValue(this.buf, this.type, this.offset, this.size, utf8Lossy);
        } catch (err) {
            throw rejected(err);
        }
    }
}

/**
 * 惰性元素迭代器：每次 `next()` 只校验一个元素，出错后不再产出
 * EN: Lazy element iterator; each `next()` validates one element and the
 * iterator is exhausted after any error
 */
export class RawIter implements IterableIterator<[string, RawBsonRef]> {
    private pos = 4;
    private done = false;
    private readonly end: number;
    private readonly utf8Lossy: boolean;

    constructor(private readonly buf: Buffer, options: RawIterOptions = {}) {
        this.end = buf.length - 1;
        this.utf8Lossy = options.utf8Lossy ?? false;
    }

    /**
     * 读取下一个元素的头部和长度，不解码值
     * EN: Read the next element's header and length without decoding its value
     */
    nextElement(): RawElement | undefined {
        if (this.done) {
            return undefined;
        }
        if (this.pos >= this.end) {
            this.done = true;
            return undefined;
        }
        try {
            const tagOffset = this.pos;
            const tag = this.buf[tagOffset];
            if (!isBSONType(tag)) {
                throw CodecError.unknownElementType(tag, tagOffset);
            }
            const key = DataEndian.readCString(this.buf, tagOffset + 1, this.end, this.utf8Lossy);
            const offset = tagOffset + 1 + key.bytesRead;
            const size = valueSize(this.buf, tag, offset, this.end);
            DataEndian.ensureAvailable(offset, size, this.end);
            this.pos = offset + size;
            return new RawElement(this.buf, key.value, tag, offset, size);
        } catch (err) {
            this.done = true;
            throw rejected(err);
        }
    }

    next(): IteratorResult<[string, RawBsonRef], undefined> {
        const element = this.nextElement();
        if (!element) {
            return { done: true, value: undefined };
        }
        try {
            return { done: false, value: [element.key, element.value(this.utf8Lossy)] };
        } catch (err) {
            this.done = true;
            throw err;
        }
    }

    [Symbol.iterator](): RawIter {
        return this;
    }
}

function expectType<K extends BSONType>(value: RawBsonRef | undefined, key: string, type: K): RawBsonRefOf<K> {
    if (value === undefined) {
        throw CodecError.valueNotPresent(key);
    }
    if (!isRawBsonRefOf(value, type)) {
        throw CodecError.unexpectedType(key, bsonTypeName(type), bsonTypeName(value.type));
    }
    return value;
}

/**
 * 原始 BSON 文档：调用方字节上的零拷贝视图
 * EN: Raw BSON document: a zero-copy view over caller-owned bytes
 *
 * 构造时只检查长度前缀和终止符；元素在访问时逐个校验。
 * `get` 是线性扫描。
 * EN: Construction checks only the length prefix and terminator; elements
 * are validated one at a time as they are reached. `get` is a linear scan.
 */
export class RawDocument implements Iterable<[string, RawBsonRef]>, RawBsonConvertible {
    private constructor(private readonly data: Buffer) {}

    static fromBytes(bytes: Uint8Array): RawDocument {
        const buf = DataEndian.view(bytes);
        try {
            checkFrame(buf);
        } catch (err) {
            throw rejected(err);
        }
        return new RawDocument(buf);
    }

    get byteLength(): number {
        return this.data.length;
    }

    /**
     * 底层字节（不复制）
     * EN: The underlying bytes, not copied
     */
    asBytes(): Buffer {
        return this.data;
    }

    isEmpty(): boolean {
        return this.data.length === MIN_DOCUMENT_SIZE;
    }

    iter(options?: RawIterOptions): RawIter {
        return new RawIter(this.data, options);
    }

    [Symbol.iterator](): RawIter {
        return this.iter();
    }

    *keys(): Generator<string, void, undefined> {
        const it = this.iter();
        for (let el = it.nextElement(); el; el = it.nextElement()) {
            yield el.key;
        }
    }

    get(key: string): RawBsonRef | undefined {
        const it = this.iter();
        for (let el = it.nextElement(); el; el = it.nextElement()) {
            if (el.key === key) {
                return el.value();
            }
        }
        return undefined;
    }

    getDouble(key: string): number {
        return expectType(this.get(key), key, BSONType.Double).value;
    }

    getStr(key: string): string {
        return expectType(this.get(key), key, BSONType.String).value;
    }

    getDocument(key: string): RawDocument {
        return expectType(this.get(key), key, BSONType.Document).value;
    }

    getArray(key: string): RawArray {
        return expectType(this.get(key), key, BSONType.Array).value;
    }

    getBinary(key: string): RawBinaryRef {
        return expectType(this.get(key), key, BSONType.Binary).value;
    }

    getObjectId(key: string): ObjectId {
        return expectType(this.get(key), key, BSONType.ObjectId).value;
    }

    getBool(key: string): boolean {
        return expectType(this.get(key), key, BSONType.Boolean).value;
    }

    getDateTime(key: string): DateTime {
        return expectType(this.get(key), key, BSONType.DateTime).value;
    }

    getRegex(key: string): RawRegexRef {
        return expectType(this.get(key), key, BSONType.Regex).value;
    }

    getTimestamp(key: string): Timestamp {
        return expectType(this.get(key), key, BSONType.Timestamp).value;
    }

    getI32(key: string): number {
        return expectType(this.get(key), key, BSONType.Int32).value;
    }

    getI64(key: string): bigint {
        return expectType(this.get(key), key, BSONType.Int64).value;
    }

    getDecimal128(key: string): Decimal128 {
        return expectType(this.get(key), key, BSONType.Decimal128).value;
    }

    toRawBsonRef(): RawBsonRef {
        return { type: BSONType.Document, value: this };
    }
}

/**
 * 原始 BSON 数组：键为 "0"、"1"… 的文档视图
 * EN: Raw BSON array: a document view whose keys are "0", "1", ...
 *
 * 按下标访问需要迭代计数，复杂度为 O(n)。
 * EN: Index access iterates and counts, so it is O(n).
 */
export class RawArray implements Iterable<RawBsonRef>, RawBsonConvertible {
    private constructor(private readonly doc: RawDocument) {}

    static fromBytes(bytes: Uint8Array): RawArray {
        return new RawArray(RawDocument.fromBytes(bytes));
    }

    static fromRawDocument(doc: RawDocument): RawArray {
        return new RawArray(doc);
    }

    asRawDocument(): RawDocument {
        return this.doc;
    }

    asBytes(): Buffer {
        return this.doc.asBytes();
    }

    get byteLength(): number {
        return this.doc.byteLength;
    }

    isEmpty(): boolean {
        return this.doc.isEmpty();
    }

    iter(options?: RawIterOptions): RawIter {
        return this.doc.iter(options);
    }

    *[Symbol.iterator](): Generator<RawBsonRef, void, undefined> {
        for (const [, value] of this.doc) {
            yield value;
        }
    }

    get(index: number): RawBsonRef | undefined {
        const it = this.doc.iter();
        let i = 0;
        for (let el = it.nextElement(); el; el = it.nextElement()) {
            if (i === index) {
                return el.value();
            }
            i++;
        }
        return undefined;
    }

    length(): number {
        const it = this.doc.iter();
        let count = 0;
        while (it.nextElement()) {
            count++;
        }
        return count;
    }

    getDouble(index: number): number {
        return expectType(this.get(index), String(index), BSONType.Double).value;
    }

    getStr(index: number): string {
        return expectType(this.get(index), String(index), BSONType.String).value;
    }

    getDocument(index: number): RawDocument {
        return expectType(this.get(index), String(index), BSONType.Document).value;
    }

    getArray(index: number): RawArray {
        return expectType(this.get(index), String(index), BSONType.Array).value;
    }

    getBinary(index: number): RawBinaryRef {
        return expectType(this.get(index), String(index), BSONType.Binary).value;
    }

    getObjectId(index: number): ObjectId {
        return expectType(this.get(index), String(index), BSONType.ObjectId).value;
    }

    getBool(index: number): boolean {
        return expectType(this.get(index), String(index), BSONType.Boolean).value;
    }

    getDateTime(index: number): DateTime {
        return expectType(this.get(index), String(index), BSONType.DateTime).value;
    }

    getRegex(index: number): RawRegexRef {
        return expectType(this.get(index), String(index), BSONType.Regex).value;
    }

    getTimestamp(index: number): Timestamp {
        return expectType(this.get(index), String(index), BSONType.Timestamp).value;
    }

    getI32(index: number): number {
        return expectType(this.get(index), String(index), BSONType.Int32).value;
    }

    getI64(index: number): bigint {
        return expectType(this.get(index), String(index), BSONType.Int64).value;
    }

    getDecimal128(index: number): Decimal128 {
        return expectType(this.get(index), String(index), BSONType.Decimal128).value;
    }

    toRawBsonRef(): RawBsonRef {
        return { type: BSONType.Array, value: this };
    }
}
