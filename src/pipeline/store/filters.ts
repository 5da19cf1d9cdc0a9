import { ModelMismatchError } from '../errors';
import type { IndexSpec, MediaItem, Neighbor, SearchFilters } from '../types';

/** Shared filter semantics: date bounds are inclusive and exclude undated media. */
export function matchesFilters(item: MediaItem, filters: SearchFilters = {}): boolean {
  if (filters.projectName !== undefined && item.projectName !== filters.projectName) return false;
  if (filters.mediaIds && !filters.mediaIds.includes(item.id)) return false;
  if (filters.dateFrom !== undefined || filters.dateTo !== undefined) {
    if (!item.eventDate) return false;
    if (filters.dateFrom !== undefined && item.eventDate < filters.dateFrom) return false;
    if (filters.dateTo !== undefined && item.eventDate > filters.dateTo) return false;
  }
  return true;
}

export function sameSpec(a: IndexSpec, b: IndexSpec): boolean {
  return a.model === b.model && a.dimension === b.dimension && a.metric === b.metric;
}

/**
 * Throws when vectors produced under `configured` cannot be compared with the index.
 */
export function assertCompatible(stored: IndexSpec, configured: IndexSpec): void {
  if (sameSpec(stored, configured)) return;
  throw new ModelMismatchError(
    `Index was built with ${stored.model}/${stored.dimension}/${stored.metric}, ` +
      `configured ${configured.model}/${configured.dimension}/${configured.metric}`,
    { stored, configured }
  );
}

/** Distance ascending, then more recent event date (undated last), media id, chunk index. */
export function compareNeighbors(
  a: Neighbor & { eventDate?: string },
  b: Neighbor & { eventDate?: string }
): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  if (a.eventDate !== b.eventDate) {
    if (!a.eventDate) return 1;
    if (!b.eventDate) return -1;
    return a.eventDate < b.eventDate ? 1 : -1;
  }
  if (a.chunk.mediaId !== b.chunk.mediaId) return a.chunk.mediaId < b.chunk.mediaId ? -1 : 1;
  return a.chunk.index - b.chunk.index;
}
