// src/types/common/pagination.types.ts

/** 页码分页参数（已归一） */
export interface PageParams {
  readonly page: number;
  readonly pageSize: number;
}

/**
 * 页码分页结果
 */
export interface PageResult<T> {
  readonly count: number;
  readonly page: number;
  // eslint-disable-next-line @typescript-eslint/naming-convention
  readonly page_size: number;
  readonly results: ReadonlyArray<T>;
}

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

/**
 * 对已在内存中的列表做页码切片
 * @param rows 全量行
 * @param params 分页参数
 */
export function paginateRows<T>(rows: ReadonlyArray<T>, params: PageParams): PageResult<T> {
  const start = (params.page - 1) * params.pageSize;
  return {
    count: rows.length,
    page: params.page,
    page_size: params.pageSize,
    results: rows.slice(start, start + params.pageSize),
  };
}
