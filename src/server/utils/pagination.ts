/**
 * Pagination utility functions for list endpoints
 */

import { BadRequestError } from '../types/errors.js';

export interface PaginationParams {
  page?: number;
  limit?: number;
  offset?: number;
}

export interface PaginationOptions {
  defaultLimit: number;
  maxLimit: number;
}

export interface ResolvedPagination {
  limit: number;
  offset: number;
  page: number;
}

/**
 * Resolve pagination parameters against the configured bounds.
 * Supports both page-based and offset-based pagination; offset takes
 * precedence when both are provided. Limits above the maximum are capped.
 *
 * @throws BadRequestError for non-integer, zero or negative values
 */
export function resolvePagination(
  params: PaginationParams,
  options: PaginationOptions
): ResolvedPagination {
  const { defaultLimit, maxLimit } = options;

  let limit = defaultLimit;
  if (params.limit !== undefined) {
    if (!Number.isInteger(params.limit) || params.limit < 1) {
      throw new BadRequestError('limit must be a positive integer', { limit: params.limit });
    }
    limit = Math.min(params.limit, maxLimit);
  }

  if (params.offset !== undefined) {
    if (!Number.isInteger(params.offset) || params.offset < 0) {
      throw new BadRequestError('offset must be a non-negative integer', { offset: params.offset });
    }
    return {
      limit,
      offset: params.offset,
      page: Math.floor(params.offset / limit) + 1,
    };
  }

  let page = 1;
  if (params.page !== undefined) {
    if (!Number.isInteger(params.page) || params.page < 1) {
      throw new BadRequestError('page must be a positive integer', { page: params.page });
    }
    page = params.page;
  }

  return { limit, offset: (page - 1) * limit, page };
}
