import { CodecError } from '../core';
import { DataEndian } from './dataEndian';

const INITIAL_CAPACITY = 64;
const GROWTH_FACTOR = 2;

/**
 * 可增长的小端序字节写入器
 * EN: Growable little-endian byte writer
 */
export class BufferWriter {
    private buffer: Buffer;
    private pos: number;

    constructor(initialCapacity: number = INITIAL_CAPACITY) {
        this.buffer = Buffer.alloc(Math.max(initialCapacity, 1));
        this.pos = 0;
    }

    /**
     * 已写入的字节数
     * EN: Number of bytes written
     */
    get length(): number {
        return this.pos;
    }

    /**
     * 已写入字节的视图（不复制，后续写入可能使其失效）
     * EN: View of the written bytes; not a copy, later writes may change it
     */
    bytes(): Buffer {
        return this.buffer.subarray(0, this.pos);
    }

    /**
     * 复制出一个独立的写入器
     * EN: Copy into an independent writer
     */
    clone(): BufferWriter {
        const copy = new BufferWriter(this.buffer.length);
        copy.writeBytes(this.bytes());
        return copy;
    }

    /**
     * 截断到指定长度
     * EN: Truncate to the given length
     */
    truncate(length: number): void {
        if (length < 0 || length > this.pos) {
            throw CodecError.internalError(`cannot truncate ${this.pos} bytes to ${length}`);
        }
        this.pos = length;
    }

    private ensureCapacity(needed: number): void {
        const required = this.pos + needed;
        if (required <= this.buffer.length) {
            return;
        }

        let newCapacity = this.buffer.length * GROWTH_FACTOR;
        while (newCapacity < required) {
            newCapacity *= GROWTH_FACTOR;
        }

        const newBuffer = Buffer.alloc(newCapacity);
        this.buffer.copy(newBuffer, 0, 0, this.pos);
        this.buffer = newBuffer;
    }

    writeUInt8(value: number): void {
        this.ensureCapacity(1);
        DataEndian.writeUInt8(this.buffer, this.pos, value);
        this.pos += 1;
    }

    writeInt32LE(value: number): void {
        this.ensureCapacity(4);
        DataEndian.writeInt32LE(this.buffer, this.pos, value);
        this.pos += 4;
    }

    writeUInt32LE(value: number): void {
        this.ensureCapacity(4);
        DataEndian.writeUInt32LE(this.buffer, this.pos, value);
        this.pos += 4;
    }

    writeInt64LE(value: bigint): void {
        this.ensureCapacity(8);
        DataEndian.writeInt64LE(this.buffer, this.pos, value);
        this.pos += 8;
    }

    writeDoubleLE(value: number): void {
        this.ensureCapacity(8);
        DataEndian.writeDoubleLE(this.buffer, this.pos, value);
        this.pos += 8;
    }

    writeBytes(data: Uint8Array): void {
        this.ensureCapacity(data.length);
        this.buffer.set(data, this.pos);
        this.pos += data.length;
    }

    /**
     * 写入 C 字符串；内部含空字节时拒绝
     * EN: Write a C string; rejects interior null bytes
     */
    writeCString(value: string): void {
        if (value.includes('\0')) {
            throw CodecError.invalidCString(value);
        }
        this.writeBytes(Buffer.from(value, 'utf8'));
        this.writeUInt8(0);
    }

    /**
     * 写入 BSON 字符串：int32 长度（含终止符）+ UTF-8 + 0x00
     * EN: Write a BSON string: int32 length including the terminator, UTF-8, 0x00
     */
    writeString(value: string): void {
        const encoded = Buffer.from(value, 'utf8');
        this.writeInt32LE(encoded.length + 1);
        this.writeBytes(encoded);
        this.writeUInt8(0);
    }

    /**
     * 回填 int32（用于长度前缀）
     * EN: Patch an int32 at an earlier offset (used for length prefixes)
     */
    patchInt32LE(offset: number, value: number): void {
        if (offset < 0 || offset + 4 > this.pos) {
            throw CodecError.internalError(`cannot patch int32 at offset ${offset}`);
        }
        DataEndian.writeInt32LE(this.buffer, offset, value);
    }
}
