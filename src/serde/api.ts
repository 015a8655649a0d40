/**
 * 序列化入口
 * EN: Serialization entry points
 */

import { CodecError, logger } from '../core';
import type { Document } from '../bson/document';
import { BSONType, bsonTypeName } from '../bson/types';
import { Bson } from '../bson/value';
import { RawDocument } from '../raw/document';
import { RawDocumentBuf } from '../raw/documentBuf';
import { deContext, serContext } from './context';
import type { DeserializerOptions, SerializerOptions } from './context';
import type { Codec } from './dataModel';
import { RawDeserializer } from './rawDeserializer';
import { RawSerializer } from './rawSerializer';
import { ValueDeserializer } from './valueDeserializer';
import { ValueSerializer } from './valueSerializer';

const log = logger.child('serde');

/**
 * 序列化为类型化值
 * EN: Serialize into a typed value
 */
export function serializeToBson<T>(value: T, codec: Codec<T>, options?: SerializerOptions): Bson {
    return codec.serialize(value, new ValueSerializer(serContext(options)));
}

/**
 * 序列化为类型化文档；顶层不是文档时失败
 * EN: Serialize into a typed document; fails when the top level is not a document
 */
export function serializeToDocument<T>(value: T, codec: Codec<T>, options?: SerializerOptions): Document {
    const bson = serializeToBson(value, codec, options);
    if (bson.type !== BSONType.Document) {
        throw CodecError.unsupportedTopLevel(bsonTypeName(bson.type));
    }
    return bson.value;
}

/**
 * 直接序列化为原始文档缓冲区
 * EN: Serialize straight into a raw document buffer
 */
export function serializeToRawDocumentBuf<T>(value: T, codec: Codec<T>, options?: SerializerOptions): RawDocumentBuf {
    const ref = codec.serialize(value, new RawSerializer(serContext(options)));
    if (ref.type !== BSONType.Document) {
        throw CodecError.unsupportedTopLevel(bsonTypeName(ref.type));
    }
    return RawDocumentBuf.fromBytes(ref.value.asBytes());
}

/**
 * 序列化为字节
 * EN: Serialize into bytes
 */
export function serializeToBuffer<T>(value: T, codec: Codec<T>, options?: SerializerOptions): Buffer {
    const bytes = serializeToRawDocumentBuf(value, codec, options).toBuffer();
    log.debug('serialized document', { byteLength: bytes.length });
    return bytes;
}

/**
 * 从类型化值反序列化
 * EN: Deserialize from a typed value
 */
export function deserializeFromBson<T>(bson: Bson, codec: Codec<T>, options?: DeserializerOptions): T {
    return codec.deserialize(new ValueDeserializer(bson, deContext(options)));
}

export function deserializeFromDocument<T>(doc: Document, codec: Codec<T>, options?: DeserializerOptions): T {
    return deserializeFromBson(Bson.document(doc), codec, options);
}

/**
 * 从原始文档反序列化，不经过类型化值
 * EN: Deserialize from a raw document without building typed values
 */
export function deserializeFromRawDocument<T>(doc: RawDocument, codec: Codec<T>, options?: DeserializerOptions): T {
    return codec.deserialize(RawDeserializer.forDocument(doc, deContext(options)));
}

/**
 * 从字节反序列化
 * EN: Deserialize from bytes
 */
export function deserializeFromSlice<T>(bytes: Uint8Array, codec: Codec<T>, options?: DeserializerOptions): T {
    log.debug('deserializing document', { byteLength: bytes.length });
    return deserializeFromRawDocument(RawDocument.fromBytes(bytes), codec, options);
}
