/**
 * 序列化框架导出
 * EN: Serialization framework exports
 */

export type {
    Codec,
    Serializer,
    SerializeSeq,
    SerializeMap,
    Deserializer,
    Visitor,
    MapAccess,
    SeqAccess,
} from './dataModel';
export type { SerializerOptions, DeserializerOptions } from './context';
export { codec, expectBson } from './codecs';
export type { ContentVariant, EnumTagging, StructFields, UnitVariant, VariantCase } from './codecs';
export { HumanReadable, Utf8LossyDeserialization, humanReadable, utf8Lossy } from './wrappers';
export * from './helpers';
export * from './api';
