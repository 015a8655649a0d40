/**
 * 小端序字节读写工具（带边界检查）
 * EN: Little-endian byte utilities with bounds checks
 */

import { CodecError, logger } from '../core';

const log = logger.child('utf8');

// 模块级单例，避免重复创建
// EN: Module-level singletons to avoid repeated instantiation
const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const lossyDecoder = new TextDecoder('utf-8', { ignoreBOM: true });

export class DataEndian {
    /**
     * 将任意 Uint8Array 包装为 Buffer（零拷贝）
     * EN: Wrap any Uint8Array as a Buffer without copying
     */
    static view(bytes: Uint8Array): Buffer {
        if (Buffer.isBuffer(bytes)) {
            return bytes;
        }
        return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    }

    /**
     * 确认 [offset, offset + needed) 落在 limit 之内
     * EN: Ensure [offset, offset + needed) lies below limit
     */
    static ensureAvailable(offset: number, needed: number, limit: number): void {
        if (needed < 0 || offset + needed > limit) {
            throw CodecError.unexpectedEndOfBuffer(needed, Math.max(0, limit - offset), offset);
        }
    }

    /**
     * 读取小端序 int32
     * EN: Read int32 little-endian
     */
    static readInt32LE(buf: Buffer, offset: number, limit: number = buf.length): number {
        DataEndian.ensureAvailable(offset, 4, limit);
        return buf.readInt32LE(offset);
    }

    static writeUInt8(buf: Buffer, offset: number, value: number): void {
        buf.writeUInt8(value, offset);
    }

    static writeInt32LE(buf: Buffer, offset: number, value: number): void {
        buf.writeInt32LE(value, offset);
    }

    static writeUInt32LE(buf: Buffer, offset: number, value: number): void {
        buf.writeUInt32LE(value, offset);
    }

    static writeInt64LE(buf: Buffer, offset: number, value: bigint): void {
        buf.writeBigInt64LE(value, offset);
    }

    static writeDoubleLE(buf: Buffer, offset: number, value: number): void {
        buf.writeDoubleLE(value, offset);
    }

    /**
     * 解码 UTF-8；宽松模式下用 U+FFFD 替换非法序列
     * EN: Decode UTF-8; lossy mode replaces invalid sequences with U+FFFD
     */
    static decodeUtf8(buf: Buffer, start: number, end: number, lossy: boolean): string {
        const bytes = buf.subarray(start, end);
        try {
            return strictDecoder.decode(bytes);
        } catch (err) {
            if (!lossy) {
                throw CodecError.invalidUtf8(start, err);
            }
            log.debug('replaced invalid UTF-8', { offset: start, length: end - start });
            return lossyDecoder.decode(bytes);
        }
    }

    /**
     * 读取 C 字符串（以 null 结尾）；终止符必须出现在 limit 之前
     * EN: Read a null-terminated C string; the terminator must occur before limit
     */
    static readCString(
        buf: Buffer,
        offset: number,
        limit: number,
        lossy: boolean
    ): { value: string; bytesRead: number } {
        const end = buf.indexOf(0, offset);
        if (end === -1 || end >= limit) {
            throw CodecError.unterminatedCString(offset);
        }
        const value = DataEndian.decodeUtf8(buf, offset, end, lossy);
        return { value, bytesRead: end - offset + 1 };
    }
}
