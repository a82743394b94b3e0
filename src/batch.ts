import type { PaginationCursor, SongBatch } from "./types";

// Largest page the saved tracks endpoint serves.
export const DEFAULT_PAGE_SIZE = 50;

export function emptySongBatch(batchSize: number): SongBatch {
  return {
    batch: { offset: 0, batchSize, total: 0 },
    songs: []
  };
}

/**
 * Describes a page that was just fetched. A page shorter than requested ends
 * the list even when the server did not report a total.
 */
export function cursorForPage(
  offset: number,
  batchSize: number,
  received: number,
  total: number | null
): PaginationCursor {
  if (total === null && received < batchSize) {
    return { offset, batchSize, total: offset + received };
  }

  return { offset, batchSize, total };
}

export function nextBatch(cursor: PaginationCursor): PaginationCursor | null {
  const nextOffset = cursor.offset + cursor.batchSize;
  if (cursor.total !== null && nextOffset >= cursor.total) {
    return null;
  }

  return { offset: nextOffset, batchSize: cursor.batchSize, total: cursor.total };
}
