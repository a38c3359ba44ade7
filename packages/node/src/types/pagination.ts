/**
 * Cursor-based pagination.
 *
 * Cursors are opaque base64url strings wrapping the last position
 * returned. List endpoints return { data, pagination: { cursor, hasMore } }.
 */

// =============================================================================
// Types
// =============================================================================

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

export function encodeCursor(position: number): string {
  return Buffer.from(JSON.stringify({ p: position })).toString("base64url");
}

/**
 * @returns The position, or undefined if the cursor is not one of ours.
 */
export function decodeCursor(cursor: string): number | undefined {
  try {
    const data: unknown = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
    if (
      typeof data === "object" &&
      data !== null &&
      "p" in data &&
      typeof data.p === "number" &&
      Number.isSafeInteger(data.p)
    ) {
      return data.p;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Page through items sorted by ascending position.
 *
 * An unreadable cursor is ignored and paging starts from the beginning.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  positionOf: (item: T) => number,
): PaginatedResponse<T> {
  const after = query.cursor !== undefined ? decodeCursor(query.cursor) : undefined;
  const remaining = after === undefined ? items : items.filter((item) => positionOf(item) > after);

  // One extra to detect hasMore
  const page = remaining.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data.at(-1);

  return {
    data,
    pagination: {
      cursor: hasMore && last !== undefined ? encodeCursor(positionOf(last)) : null,
      hasMore,
    },
  };
}
