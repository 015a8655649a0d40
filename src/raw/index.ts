/**
 * 原始视图与构建器导出
 * EN: Raw view and builder exports
 */

export * from './element';
export * from './document';
export * from './input';
export * from './documentBuf';
export * from './arrayBuf';
export * from './convert';
export { BufferWriter } from './bufferWriter';
