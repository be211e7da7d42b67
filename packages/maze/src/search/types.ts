import type { Cell } from "../core/geometry/types";
import type { TraceOptions } from "../trace/types";

export interface PathFound {
  readonly found: true;
  /** Start first, end last; consecutive cells share a passage */
  readonly path: readonly Cell[];
  /** Cells in the order the search finalized them; ends with the end cell */
  readonly exploredOrder: readonly Cell[];
}

export interface PathNotFound {
  readonly found: false;
  readonly path: null;
  /** Every cell reachable from start, in finalization order */
  readonly exploredOrder: readonly Cell[];
}

/**
 * Outcome of one search. Discriminated on `found`; an unreachable end is a
 * normal result, not an error.
 */
export type SearchResult = PathFound | PathNotFound;

export type SearchOptions = TraceOptions;
