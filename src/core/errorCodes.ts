/**
 * 编解码错误码
 * EN: Codec error codes
 *
 * 按错误类别分段：格式错误、有损转换、编码期不变量、取值、数据模型。
 * EN: Grouped by category: malformed input, lossy conversion, encode-time
 * invariants, value access and data-model mismatches.
 */
export enum ErrorCode {
    // 通用错误 (1-9)
    // EN: General errors (1-9)
    /** 内部错误 EN: Internal error */
    InternalError = 1,
    /** 自定义错误 EN: Custom error raised by a codec */
    Custom = 2,

    // 格式错误 (10-29)
    // EN: Malformed input (10-29)
    /** 缓冲区提前结束 EN: Unexpected end of buffer */
    UnexpectedEndOfBuffer = 10,
    /** 长度字段无效 EN: Invalid length field */
    InvalidLength = 11,
    /** 无效 UTF-8 EN: Invalid UTF-8 */
    InvalidUtf8 = 12,
    /** C 字符串未终止 EN: Unterminated C string */
    UnterminatedCString = 13,
    /** 未知元素类型 EN: Unknown element type */
    UnknownElementType = 14,
    /** 值格式错误 EN: Malformed value */
    MalformedValue = 15,
    /** 嵌套过深 EN: Nesting depth limit exceeded */
    DepthLimitExceeded = 16,

    // 有损转换 (30-49)
    // EN: Lossy conversion rejected (30-49)
    /** 数值转换有损 EN: Lossy numeric or timestamp conversion */
    LossyConversion = 30,
    /** 无效日期时间 EN: Invalid date-time */
    InvalidDateTime = 31,
    /** 无效 ObjectId EN: Invalid ObjectId */
    InvalidObjectId = 32,
    /** 无效 UUID EN: Invalid UUID */
    InvalidUuid = 33,
    /** 二进制子类型不匹配 EN: Binary subtype mismatch */
    BinarySubtypeMismatch = 34,

    // 编码期不变量 (50-59)
    // EN: Encode-time invariants (50-59)
    /** C 字符串包含空字节 EN: C string contains a null byte */
    InvalidCString = 50,
    /** 顶层必须是文档 EN: Top-level value must be a document */
    UnsupportedTopLevel = 51,

    // 取值错误 (60-69)
    // EN: Value access errors (60-69)
    /** 键不存在 EN: Value not present */
    ValueNotPresent = 60,
    /** 类型不符 EN: Unexpected type */
    UnexpectedType = 61,

    // 数据模型错误 (70-79)
    // EN: Data model errors (70-79)
    /** 无效类型 EN: Invalid type for the visitor */
    InvalidType = 70,
    /** 缺少字段 EN: Missing field */
    MissingField = 71,
    /** 重复字段 EN: Duplicate field */
    DuplicateField = 72,
    /** 值超出目标类型范围 EN: Value out of range for the target type */
    InvalidValue = 73,
    /** 序列元素个数不符 EN: Sequence has the wrong number of elements */
    InvalidSequenceLength = 74,
    /** 未知的枚举变体 EN: Unknown enum variant */
    UnknownVariant = 75,
}

/**
 * 错误码名称映射
 * EN: Error code name mapping
 */
export const errorCodeNames: Map<ErrorCode, string> = new Map([
    [ErrorCode.InternalError, 'InternalError'],
    [ErrorCode.Custom, 'Custom'],
    [ErrorCode.UnexpectedEndOfBuffer, 'UnexpectedEndOfBuffer'],
    [ErrorCode.InvalidLength, 'InvalidLength'],
    [ErrorCode.InvalidUtf8, 'InvalidUtf8'],
    [ErrorCode.UnterminatedCString, 'UnterminatedCString'],
    [ErrorCode.UnknownElementType, 'UnknownElementType'],
    [ErrorCode.MalformedValue, 'MalformedValue'],
    [ErrorCode.DepthLimitExceeded, 'DepthLimitExceeded'],
    [ErrorCode.LossyConversion, 'LossyConversion'],
    [ErrorCode.InvalidDateTime, 'InvalidDateTime'],
    [ErrorCode.InvalidObjectId, 'InvalidObjectId'],
    [ErrorCode.InvalidUuid, 'InvalidUuid'],
    [ErrorCode.BinarySubtypeMismatch, 'BinarySubtypeMismatch'],
    [ErrorCode.InvalidCString, 'InvalidCString'],
    [ErrorCode.UnsupportedTopLevel, 'UnsupportedTopLevel'],
    [ErrorCode.ValueNotPresent, 'ValueNotPresent'],
    [ErrorCode.UnexpectedType, 'UnexpectedType'],
    [ErrorCode.InvalidType, 'InvalidType'],
    [ErrorCode.MissingField, 'MissingField'],
    [ErrorCode.DuplicateField, 'DuplicateField'],
    [ErrorCode.InvalidValue, 'InvalidValue'],
    [ErrorCode.InvalidSequenceLength, 'InvalidSequenceLength'],
    [ErrorCode.UnknownVariant, 'UnknownVariant'],
]);

/**
 * 获取错误码名称
 * EN: Get error code name
 */
export function getErrorCodeName(code: ErrorCode): string {
    return errorCodeNames.get(code) ?? 'UnknownError';
}

/**
 * 格式错误类错误码
 * EN: Error codes that denote malformed input
 */
const MALFORMED_CODES: ReadonlySet<ErrorCode> = new Set([
    ErrorCode.UnexpectedEndOfBuffer,
    ErrorCode.InvalidLength,
    ErrorCode.InvalidUtf8,
    ErrorCode.UnterminatedCString,
    ErrorCode.UnknownElementType,
    ErrorCode.MalformedValue,
    ErrorCode.DepthLimitExceeded,
]);

/**
 * 判断错误码是否表示输入格式错误
 * EN: Whether an error code denotes malformed input
 */
export function isMalformedInputCode(code: ErrorCode): boolean {
    return MALFORMED_CODES.has(code);
}
