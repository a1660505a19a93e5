import { z } from 'zod';

/** ISO-8601 date-time with an offset, or a calendar date */
export const timestampSchema = z.union([z.string().datetime({ offset: true }), z.string().date()]);

/**
 * Epoch milliseconds of an ISO-8601 string, 0 when it does not parse.
 */
export const timestampMs = (value: string): number => {
  const parsed = Date.parse(value);
  return Number.isFinite(parsed) ? parsed : 0;
};

/**
 * Page envelope used by list endpoints.
 */
export const paginatedSchema = <T extends z.ZodTypeAny>(item: T) =>
  z.object({
    data: z.array(item),
    pagination: z.object({
      page: z.number().int(),
      limit: z.number().int(),
      totalPages: z.number().int(),
      totalItems: z.number().int(),
    }),
  });

export interface Page<T> {
  readonly data: T[];
  readonly pagination: {
    readonly page: number;
    readonly limit: number;
    readonly totalPages: number;
    readonly totalItems: number;
  };
}

export const hasNextPage = <T>(page: Page<T>): boolean =>
  page.pagination.page < page.pagination.totalPages;

/** Largest page the API serves */
export const MAX_PAGE_SIZE = 100;
