import type { Document } from './document';
import type { ObjectId } from './types';

/**
 * 正则表达式：模式 + 选项，两者都不能含空字节
 * EN: Regular expression: pattern and options, neither may contain a null byte
 *
 * 选项按原样保存，以便原始字节逐字节往返。
 * EN: Options are kept as given so raw bytes round-trip exactly.
 */
export class Regex {
    constructor(readonly pattern: string, readonly options: string) {}

    /**
     * 创建并按字母顺序排列选项
     * EN: Create with options sorted alphabetically
     */
    static sorted(pattern: string, options: string): Regex {
        return new Regex(pattern, [...options].sort().join(''));
    }

    equals(other: Regex): boolean {
        return this.pattern === other.pattern && this.options === other.options;
    }

    toString(): string {
        return `/${this.pattern}/${this.options}`;
    }
}

/**
 * 数据库指针（已废弃）
 * EN: Database pointer (deprecated)
 */
export class DbPointer {
    constructor(readonly namespace: string, readonly id: ObjectId) {}

    equals(other: DbPointer): boolean {
        return this.namespace === other.namespace && this.id.equals(other.id);
    }
}

/**
 * 带作用域的 JavaScript 代码
 * EN: JavaScript code with a scope document
 */
export class JavaScriptCodeWithScope {
    constructor(readonly code: string, readonly scope: Document) {}
}
