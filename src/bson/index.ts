/**
 * BSON 类型化值模型导出
 * EN: Typed BSON value model exports
 */

export * from './types';
export * from './datetime';
export * from './binary';
export * from './extended';
export * from './value';
export * from './document';
export * from './compare';
