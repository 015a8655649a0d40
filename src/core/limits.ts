/**
 * 编解码限制和数值边界
 * EN: Codec limits and numeric bounds
 */

// 文档限制
// EN: Document limits

/** 最小文档大小（长度前缀 + 终止符）EN: Min document size (length prefix + terminator) */
export const MIN_DOCUMENT_SIZE = 5;
/** 最大 BSON 嵌套深度 EN: Max BSON nesting depth */
export const MAX_BSON_DEPTH = 100;
/** 带作用域代码的最小长度 EN: Min size of a code-with-scope value */
export const MIN_CODE_WITH_SCOPE_SIZE = 14;

// 数值边界
// EN: Numeric bounds

export const MIN_INT32 = -0x80000000;
export const MAX_INT32 = 0x7fffffff;
export const MAX_UINT32 = 0xffffffff;
export const MIN_INT64 = -(2n ** 63n);
export const MAX_INT64 = 2n ** 63n - 1n;
export const MAX_UINT64 = 2n ** 64n - 1n;

/**
 * 检查整数是否落在 int32 范围内
 * EN: Whether a number is an integer within int32 range
 */
export function isInt32(value: number): boolean {
    return Number.isInteger(value) && value >= MIN_INT32 && value <= MAX_INT32;
}

/**
 * 检查整数是否落在 uint32 范围内
 * EN: Whether a number is an integer within uint32 range
 */
export function isUint32(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value <= MAX_UINT32;
}

export function isInt64(value: bigint): boolean {
    return value >= MIN_INT64 && value <= MAX_INT64;
}
