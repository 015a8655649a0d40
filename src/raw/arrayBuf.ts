import { logger } from '../core';
import { BSONType } from '../bson/types';
import type { Bson } from '../bson/value';
import { RawArray } from './document';
import type { RawIterOptions, RawIter } from './document';
import { RawDocumentBuf } from './documentBuf';
import type { RawBsonConvertible, RawBsonRef } from './element';
import type { RawBsonInput } from './input';

const log = logger.child('raw');

/**
 * 自有、可增长的原始数组缓冲区
 * EN: Owned, growable raw array buffer
 *
 * 元素个数保存在构建器中，下一个键直接取当前个数，无需重新扫描。
 * EN: The element count lives in the builder and the next key is the
 * current count, so a push never rescans the buffer.
 */
export class RawArrayBuf implements Iterable<RawBsonRef>, RawBsonConvertible {
    private inner: RawDocumentBuf;
    private count: number;

    constructor() {
        this.inner = new RawDocumentBuf();
        this.count = 0;
    }

    /**
     * 复制已有文档缓冲区并计数其元素；之后对源的追加不影响本数组
     * EN: Copy an existing document buffer and count its elements; later
     * appends to the source do not reach this array
     */
    static fromRawDocumentBuf(doc: RawDocumentBuf): RawArrayBuf {
        return RawArrayBuf.adopt(doc.clone());
    }

    /**
     * 校验并复制已编码的数组
     * EN: Validate and copy an encoded array
     */
    static fromBytes(bytes: Uint8Array): RawArrayBuf {
        return RawArrayBuf.adopt(RawDocumentBuf.fromBytes(bytes));
    }

    // 调用方须独占 owned
    // EN: The caller must hold the only reference to owned
    private static adopt(owned: RawDocumentBuf): RawArrayBuf {
        const count = owned.elementCount();
        log.debug('counted array elements', { count, byteLength: owned.byteLength });
        const buf = new RawArrayBuf();
        buf.inner = owned;
        buf.count = count;
        return buf;
    }

    static from(values: Iterable<RawBsonInput>): RawArrayBuf {
        const buf = new RawArrayBuf();
        for (const value of values) {
            buf.push(value);
        }
        return buf;
    }

    get length(): number {
        return this.count;
    }

    get byteLength(): number {
        return this.inner.byteLength;
    }

    isEmpty(): boolean {
        return this.count === 0;
    }

    push(value: RawBsonInput): this {
        this.inner.append(String(this.count), value);
        this.count++;
        return this;
    }

    pushBson(value: Bson): this {
        this.inner.appendBson(String(this.count), value);
        this.count++;
        return this;
    }

    get(index: number): RawBsonRef | undefined {
        return this.inner.getAt(index);
    }

    asBytes(): Buffer {
        return this.inner.asBytes();
    }

    asRawArray(): RawArray {
        return RawArray.fromRawDocument(this.inner.asRawDocument());
    }

    toBuffer(): Buffer {
        return this.inner.toBuffer();
    }

    iter(options?: RawIterOptions): RawIter {
        return this.inner.iter(options);
    }

    [Symbol.iterator](): Iterator<RawBsonRef> {
        return this.asRawArray()[Symbol.iterator]();
    }

    toRawBsonRef(): RawBsonRef {
        return { type: BSONType.Array, value: this.asRawArray() };
    }
}
