// src/core/common/errors/index.ts
// 领域错误统一出口；校验管道与格式化属于 HTTP 边界，按路径单独引入

export * from './domain-error';
