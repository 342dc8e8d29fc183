import { z } from "zod";
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from "@caseflow/shared";

// ─── Query params schema ────────────────────────────────────────────

export const paginationSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
});

export type PaginationParams = z.infer<typeof paginationSchema>;

export interface Page<T> {
  data: T[];
  total: number;
}

export function pageOffset(params: PaginationParams): number {
  return (params.page - 1) * params.limit;
}

/** Slices an in-memory list the way a LIMIT/OFFSET query would. */
export function paginate<T>(items: readonly T[], params: PaginationParams): Page<T> {
  const offset = pageOffset(params);
  return { data: items.slice(offset, offset + params.limit), total: items.length };
}

// ─── Paginated response builder ─────────────────────────────────────

export function buildPaginatedResponse<T>(
  data: T[],
  total: number,
  params: Pick<PaginationParams, "page" | "limit">,
) {
  return {
    data,
    pagination: {
      page: params.page,
      limit: params.limit,
      total,
      totalPages: Math.ceil(total / params.limit),
    },
  };
}
