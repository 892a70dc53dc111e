/**
 * fastscroll - Scroller Domain
 * Overlay fast scroll control and the capabilities it consumes
 */

export { createFastScroller } from "./scroller";
export { isSectionIndexer, isRefreshLayout } from "./capabilities";
export type {
  FastScroller,
  FastScrollListener,
  RefreshLayout,
  SectionIndexer,
} from "./types";
