import { CodecError, MAX_INT32, MIN_DOCUMENT_SIZE } from '../core';
import { BSONType } from '../bson/types';
import type { Bson } from '../bson/value';
import { BufferWriter } from './bufferWriter';
import { RawArray, RawDocument } from './document';
import type { RawIter, RawIterOptions } from './document';
import type { RawBsonConvertible, RawBsonRef } from './element';
import { toRawBsonRef } from './input';
import type { RawBsonInput } from './input';
import { writeBsonElement, writeRawElement } from './writer';

/**
 * 自有、可增长的原始文档缓冲区
 * EN: Owned, growable raw document buffer
 *
 * 每次追加都会写入元素、终止符并回填长度前缀，因此缓冲区在任何时刻
 * 都是一个有效的文档。追加失败时缓冲区保持不变。
 * EN: Every append writes the element, the terminator and the length prefix,
 * so the bytes form a valid document at all times. A failed append leaves
 * the buffer unchanged.
 */
export class RawDocumentBuf implements Iterable<[string, RawBsonRef]>, RawBsonConvertible {
    private writer: BufferWriter;
    // 已交出视图时，下一次追加先复制，避免改写视图下的字节
    // EN: Once a view has been handed out, the next append copies first so the view's bytes stay intact
    private shared = false;

    constructor() {
        this.writer = new BufferWriter();
        this.writer.writeInt32LE(MIN_DOCUMENT_SIZE);
        this.writer.writeUInt8(0);
    }

    /**
     * 校验并复制已编码的文档
     * EN: Validate and copy an encoded document
     */
    static fromBytes(bytes: Uint8Array): RawDocumentBuf {
        const doc = RawDocument.fromBytes(bytes);
        const it = doc.iter();
        for (let el = it.nextElement(); el; el = it.nextElement()) {
            el.value();
        }
        const buf = new RawDocumentBuf();
        buf.writer = new BufferWriter(bytes.length);
        buf.writer.writeBytes(bytes);
        return buf;
    }

    get byteLength(): number {
        return this.writer.length;
    }

    isEmpty(): boolean {
        return this.writer.length === MIN_DOCUMENT_SIZE;
    }

    /**
     * 追加元素
     * EN: Append an element
     */
    append(key: string, value: RawBsonInput): this {
        const ref = toRawBsonRef(value);
        return this.appendEncoded((w) => writeRawElement(w, key, ref));
    }

    /**
     * 追加类型化值
     * EN: Append a typed value
     */
    appendBson(key: string, value: Bson): this {
        return this.appendEncoded((w) => writeBsonElement(w, key, value));
    }

    private appendEncoded(encode: (w: BufferWriter) => void): this {
        // 先在临时写入器中完整编码，失败时不触碰缓冲区
        // EN: Encode fully into a scratch writer; a failure leaves the buffer untouched
        const element = new BufferWriter();
        encode(element);

        const newLength = this.writer.length + element.length;
        if (newLength > MAX_INT32) {
            throw CodecError.invalidLength(`document of ${newLength} bytes exceeds the int32 length prefix`);
        }

        if (this.shared) {
            this.writer = this.writer.clone();
            this.shared = false;
        }
        this.writer.truncate(this.writer.length - 1);
        this.writer.writeBytes(element.bytes());
        this.writer.writeUInt8(0);
        this.writer.patchInt32LE(0, this.writer.length);
        return this;
    }

    /**
     * 底层字节（视图在之后的追加中保持不变）
     * EN: The underlying bytes; later appends do not alter this view
     */
    asBytes(): Buffer {
        this.shared = true;
        return this.writer.bytes();
    }

    asRawDocument(): RawDocument {
        return RawDocument.fromBytes(this.asBytes());
    }

    /**
     * 复制出独立的构建器
     * EN: Copy into an independent builder
     */
    clone(): RawDocumentBuf {
        const copy = new RawDocumentBuf();
        copy.writer = this.writer.clone();
        return copy;
    }

    // 追加只改写长度前缀和终止符，元素内部的字节不变，因此 get 返回的引用无需标记共享
    // EN: An append rewrites only the length prefix and the terminator, never the bytes
    // inside an element, so the refs `get` returns need no sharing flag
    private peek(): RawDocument {
        return RawDocument.fromBytes(this.writer.bytes());
    }

    /**
     * 复制出独立的 Buffer
     * EN: Copy the bytes into an independent Buffer
     */
    toBuffer(): Buffer {
        return Buffer.from(this.writer.bytes());
    }

    get(key: string): RawBsonRef | undefined {
        return this.peek().get(key);
    }

    /**
     * 元素个数（一次扫描，逐个校验）
     * EN: Number of elements; one pass that validates each element header
     */
    elementCount(): number {
        const it = this.peek().iter();
        let count = 0;
        while (it.nextElement()) {
            count++;
        }
        return count;
    }

    /**
     * 按位置取值
     * EN: Value at the given position
     */
    getAt(index: number): RawBsonRef | undefined {
        return RawArray.fromRawDocument(this.peek()).get(index);
    }

    iter(options?: RawIterOptions): RawIter {
        return this.asRawDocument().iter(options);
    }

    [Symbol.iterator](): RawIter {
        return this.iter();
    }

    keys(): Generator<string, void, undefined> {
        return this.asRawDocument().keys();
    }

    toRawBsonRef(): RawBsonRef {
        return { type: BSONType.Document, value: this.asRawDocument() };
    }
}
