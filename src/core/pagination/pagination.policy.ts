// src/core/pagination/pagination.policy.ts
// 页码分页规则：默认值、上限与越界判定

import {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  type PageParams,
} from '@app-types/common/pagination.types';
import { DomainError, PAGINATION_ERROR } from '@core/common/errors/domain-error';

/**
 * 归一分页参数：page 最小为 1；pageSize 缺省 20，落在 [1, 100]
 * 非有限数值按缺省处理
 */
export function normalizePageParams(raw: {
  readonly page?: number;
  readonly pageSize?: number;
}): PageParams {
  const page = raw.page !== undefined && Number.isFinite(raw.page) ? Math.floor(raw.page) : 1;
  const size =
    raw.pageSize !== undefined && Number.isFinite(raw.pageSize)
      ? Math.floor(raw.pageSize)
      : DEFAULT_PAGE_SIZE;
  return {
    page: Math.max(page, 1),
    pageSize: Math.min(Math.max(size, 1), MAX_PAGE_SIZE),
  };
}

/**
 * 第 1 页永远合法（即使没有数据）；其余页起点必须落在总数之内
 */
export function assertPageInRange(total: number, params: PageParams): void {
  if (params.page === 1) return;
  if ((params.page - 1) * params.pageSize < total) return;
  throw new DomainError(PAGINATION_ERROR.INVALID_PAGE, 'Invalid page.', {
    page: params.page,
    total,
  });
}
