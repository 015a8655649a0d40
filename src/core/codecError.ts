import { ErrorCode, getErrorCodeName, isMalformedInputCode } from './errorCodes';

/**
 * 错误路径片段：字段名或数组下标
 * EN: Error path segment: a field name or an array index
 */
export type PathSegment =
    | { kind: 'field'; name: string }
    | { kind: 'index'; index: number };

/**
 * 将路径渲染为字符串，字段用点号连接，下标用方括号
 * EN: Render a path: fields joined with dots, indices in brackets
 */
export function formatPath(path: readonly PathSegment[]): string {
    let out = '';
    for (const segment of path) {
        if (segment.kind === 'index') {
            out += `[${segment.index}]`;
        } else {
            out += out.length === 0 ? segment.name : `.${segment.name}`;
        }
    }
    return out;
}

/**
 * 编解码错误类
 * EN: Codec error class
 */
export class CodecError extends Error {
    /** 错误码 EN: Error code */
    readonly code: ErrorCode;
    /** 错误码名称 EN: Error code name */
    readonly codeName: string;
    /** 出错字节偏移 EN: Byte offset of malformed input, when known */
    readonly offset?: number;
    /** 出错字段路径 EN: Field path, outermost first */
    readonly path: PathSegment[] = [];

    constructor(code: ErrorCode, message: string, options?: { offset?: number; cause?: unknown }) {
        super(message, options?.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'CodecError';
        this.code = code;
        this.codeName = getErrorCodeName(code);
        this.offset = options?.offset;
    }

    /**
     * 路径字符串，例如 `two.value` 或 `items[2].id`
     * EN: Path string such as `two.value` or `items[2].id`
     */
    get pathString(): string {
        return formatPath(this.path);
    }

    /**
     * 是否为输入格式错误
     * EN: Whether this error reports malformed input
     */
    get isMalformedInput(): boolean {
        return isMalformedInputCode(this.code);
    }

    /**
     * 在路径前端插入片段（由外层调用者逐级添加）
     * EN: Prepend a segment; enclosing visitors add theirs as the error unwinds
     */
    prependPath(segment: PathSegment): this {
        this.path.unshift(segment);
        return this;
    }

    override toString(): string {
        const where = this.path.length > 0 ? ` at ${this.pathString}` : '';
        return `${this.codeName} (${this.code}): ${this.message}${where}`;
    }

    // 静态工厂方法
    // EN: Static factory methods

    static internalError(message: string): CodecError {
        return new CodecError(ErrorCode.InternalError, message);
    }

    static custom(message: string, cause?: unknown): CodecError {
        return new CodecError(ErrorCode.Custom, message, { cause });
    }

    /**
     * 缓冲区提前结束
     * EN: Buffer ended before the value did
     */
    static unexpectedEndOfBuffer(needed: number, available: number, offset: number): CodecError {
        return new CodecError(
            ErrorCode.UnexpectedEndOfBuffer,
            `unexpected end of buffer: needed ${needed} bytes, only ${available} available`,
            { offset }
        );
    }

    static invalidLength(message: string, offset?: number): CodecError {
        return new CodecError(ErrorCode.InvalidLength, message, { offset });
    }

    static invalidUtf8(offset?: number, cause?: unknown): CodecError {
        return new CodecError(ErrorCode.InvalidUtf8, 'invalid UTF-8 sequence', { offset, cause });
    }

    static unterminatedCString(offset: number): CodecError {
        return new CodecError(ErrorCode.UnterminatedCString, 'C string is missing its null terminator', { offset });
    }

    static unknownElementType(tag: number, offset: number): CodecError {
        return new CodecError(
            ErrorCode.UnknownElementType,
            `unrecognized element type 0x${tag.toString(16).padStart(2, '0')}`,
            { offset }
        );
    }

    static malformedValue(message: string, offset?: number): CodecError {
        return new CodecError(ErrorCode.MalformedValue, message, { offset });
    }

    static depthLimitExceeded(limit: number): CodecError {
        return new CodecError(ErrorCode.DepthLimitExceeded, `nesting depth exceeds the limit of ${limit}`);
    }

    static lossyConversion(message: string): CodecError {
        return new CodecError(ErrorCode.LossyConversion, message);
    }

    static invalidDateTime(message: string): CodecError {
        return new CodecError(ErrorCode.InvalidDateTime, message);
    }

    static invalidObjectId(message: string): CodecError {
        return new CodecError(ErrorCode.InvalidObjectId, message);
    }

    static invalidUuid(message: string): CodecError {
        return new CodecError(ErrorCode.InvalidUuid, message);
    }

    static binarySubtypeMismatch(expected: number, actual: number): CodecError {
        return new CodecError(
            ErrorCode.BinarySubtypeMismatch,
            `expected binary subtype 0x${expected.toString(16).padStart(2, '0')}, ` +
                `got 0x${actual.toString(16).padStart(2, '0')}`
        );
    }

    /**
     * 键、正则模式或选项中含有空字节
     * EN: Key, regex pattern or options contain a null byte
     */
    static invalidCString(value: string): CodecError {
        return new CodecError(
            ErrorCode.InvalidCString,
            `C string ${JSON.stringify(value)} contains an interior null byte`
        );
    }

    static unsupportedTopLevel(typeName: string): CodecError {
        return new CodecError(
            ErrorCode.UnsupportedTopLevel,
            `top-level value must be a document, got ${typeName}`
        );
    }

    static valueNotPresent(key: string): CodecError {
        return new CodecError(ErrorCode.ValueNotPresent, `no value present for key '${key}'`);
    }

    static unexpectedType(key: string, expected: string, actual: string): CodecError {
        return new CodecError(
            ErrorCode.UnexpectedType,
            `expected ${expected} for key '${key}', found ${actual}`
        );
    }

    static invalidType(unexpected: string, expecting: string): CodecError {
        return new CodecError(ErrorCode.InvalidType, `invalid type: ${unexpected}, expected ${expecting}`);
    }

    static invalidValue(unexpected: string, expecting: string): CodecError {
        return new CodecError(ErrorCode.InvalidValue, `invalid value: ${unexpected}, expected ${expecting}`);
    }

    static invalidSequenceLength(length: number, expecting: string): CodecError {
        return new CodecError(ErrorCode.InvalidSequenceLength, `invalid length ${length}, expected ${expecting}`);
    }

    static unknownVariant(name: string, expected: readonly string[]): CodecError {
        const names = expected.map((n) => `\`${n}\``).join(', ');
        return new CodecError(ErrorCode.UnknownVariant, `unknown variant \`${name}\`, expected one of ${names}`);
    }

    static missingField(name: string): CodecError {
        return new CodecError(ErrorCode.MissingField, `missing field \`${name}\``);
    }

    static duplicateField(name: string): CodecError {
        return new CodecError(ErrorCode.DuplicateField, `duplicate field \`${name}\``);
    }
}

/**
 * 将任意错误转换为 CodecError
 * EN: Convert any error to CodecError
 */
export function asCodecError(err: unknown): CodecError {
    if (err instanceof CodecError) {
        return err;
    }
    if (err instanceof Error) {
        return CodecError.custom(err.message, err);
    }
    return CodecError.custom(String(err));
}
