import { CodecError, MAX_BSON_DEPTH, asCodecError } from '../core';

/**
 * 保留的包装名称；用户类型不得使用
 * EN: Reserved wrapper names; user types must never use them
 */
export const HUMAN_READABLE_NEWTYPE_NAME = '$__bsonkit_private_human_readable';
export const UTF8_LOSSY_NEWTYPE_NAME = '$__bsonkit_private_utf8_lossy';

/**
 * 序列化选项
 * EN: Serializer options
 */
export interface SerializerOptions {
    /** 默认 false EN: Defaults to false */
    humanReadable?: boolean;
    /** 在错误中记录字段路径，默认 true EN: Record field paths in errors, defaults to true */
    errorPath?: boolean;
}

/**
 * 反序列化选项
 * EN: Deserializer options
 */
export interface DeserializerOptions {
    humanReadable?: boolean;
    /** 用 U+FFFD 替换非法 UTF-8（仅原始字节）EN: Replace invalid UTF-8 with U+FFFD, raw input only */
    utf8Lossy?: boolean;
    errorPath?: boolean;
}

export interface SerContext {
    readonly humanReadable: boolean;
    readonly errorPath: boolean;
    readonly depth: number;
}

export interface DeContext extends SerContext {
    readonly utf8Lossy: boolean;
}

export function serContext(options: SerializerOptions = {}): SerContext {
    return {
        humanReadable: options.humanReadable ?? false,
        errorPath: options.errorPath ?? true,
        depth: 0,
    };
}

export function deContext(options: DeserializerOptions = {}): DeContext {
    return {
        humanReadable: options.humanReadable ?? false,
        utf8Lossy: options.utf8Lossy ?? false,
        errorPath: options.errorPath ?? true,
        depth: 0,
    };
}

/**
 * 进入下一层文档或数组
 * EN: Enter one more level of document or array nesting
 */
export function nested<C extends SerContext>(ctx: C): C {
    const depth = ctx.depth + 1;
    if (depth > MAX_BSON_DEPTH) {
        throw CodecError.depthLimitExceeded(MAX_BSON_DEPTH);
    }
    return { ...ctx, depth };
}

/**
 * 在字段下运行；出错时把字段名加到路径前端
 * EN: Run under a field; on failure the field name is prepended to the path
 */
export function atField<T>(ctx: SerContext, name: string, run: () => T): T {
    try {
        return run();
    } catch (err) {
        if (!ctx.errorPath) {
            throw err;
        }
        throw asCodecError(err).prependPath({ kind: 'field', name });
    }
}

/**
 * 在数组下标下运行
 * EN: Run under an array index
 */
export function atIndex<T>(ctx: SerContext, index: number, run: () => T): T {
    try {
        return run();
    } catch (err) {
        if (!ctx.errorPath) {
            throw err;
        }
        throw asCodecError(err).prependPath({ kind: 'index', index });
    }
}
