import { HUMAN_READABLE_NEWTYPE_NAME, UTF8_LOSSY_NEWTYPE_NAME } from './context';
import type { Codec } from './dataModel';

/**
 * 以人类可读模式处理内部值
 * EN: Holds a value that is processed in human-readable mode
 *
 * 模式对内部的所有子值生效，且不能在内部被关闭。
 * EN: The mode applies to every child of the value and cannot be switched
 * back off inside it.
 */
export class HumanReadable<T> {
    constructor(readonly value: T) {}
}

/**
 * 读取内部值时用 U+FFFD 替换非法 UTF-8（原始字节输入）
 * EN: Reads the inner value replacing invalid UTF-8 with U+FFFD (raw input)
 *
 * 序列化时不起作用。
 * EN: Has no effect when serializing.
 */
export class Utf8LossyDeserialization<T> {
    constructor(readonly value: T) {}
}

export function humanReadable<T>(inner: Codec<T>): Codec<HumanReadable<T>> {
    return {
        serialize: (wrapped, serializer) => serializer.serializeNewtype(HUMAN_READABLE_NEWTYPE_NAME, wrapped.value, inner),
        deserialize: (de) => new HumanReadable(de.deserializeNewtype(HUMAN_READABLE_NEWTYPE_NAME, inner)),
    };
}

export function utf8Lossy<T>(inner: Codec<T>): Codec<Utf8LossyDeserialization<T>> {
    return {
        serialize: (wrapped, serializer) => serializer.serializeNewtype(UTF8_LOSSY_NEWTYPE_NAME, wrapped.value, inner),
        deserialize: (de) => new Utf8LossyDeserialization(de.deserializeNewtype(UTF8_LOSSY_NEWTYPE_NAME, inner)),
    };
}
