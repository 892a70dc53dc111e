/**
 * fastscroll - List View Types
 */

import type { EventHandler, EventMap, Unsubscribe, View } from "../types";

// =============================================================================
// Adapter
// =============================================================================

/**
 * Supplies item views to a list view.
 *
 * The list recycles item elements: `bindView` receives an element that may
 * have shown another position before and must fully overwrite its content.
 */
export interface ListAdapter {
  /** Number of items */
  getItemCount(): number;

  /** Fill `element` with the item at `position` */
  bindView(element: HTMLElement, position: number): void;

  /**
   * Optional change notification. The list subscribes while the adapter is
   * assigned and re-renders whenever `listener` is called.
   */
  observe?(listener: () => void): Unsubscribe;
}

// =============================================================================
// Layout Manager
// =============================================================================

/** Positions items along the scroll axis */
export interface LayoutManager {
  /** Offset of the item's leading edge, in pixels */
  getItemOffset(position: number): number;

  /** Size of the item along the scroll axis, in pixels */
  getItemSize(position: number): number;

  /** Total content size for `itemCount` items */
  getTotalSize(itemCount: number): number;

  /** Position of the item covering `offset`, clamped to `[0, itemCount - 1]` */
  findPositionAtOffset(offset: number, itemCount: number): number;
}

// =============================================================================
// Events
// =============================================================================

/** List view events */
export interface ListViewEvents extends EventMap {
  /** Scroll offset changed */
  scroll: { offset: number; direction: "up" | "down" };

  /** Content or viewport size, or item count, changed */
  layout: { contentSize: number; viewportSize: number; itemCount: number };
}

// =============================================================================
// List View
// =============================================================================

/** Visible range, inclusive */
export interface Range {
  start: number;
  end: number;
}

/** Virtualized, scrollable item list */
export interface ListView extends View {
  /** The scrolling element */
  readonly viewport: HTMLElement;

  /** Current adapter, or null */
  adapter: ListAdapter | null;

  /** Current layout manager, or null */
  layoutManager: LayoutManager | null;

  setAdapter(adapter: ListAdapter | null): void;
  setLayoutManager(layoutManager: LayoutManager | null): void;

  /** Number of items the current adapter reports (0 without adapter) */
  getItemCount(): number;

  /** Current scroll offset in pixels */
  getScrollOffset(): number;

  /** Total content size in pixels (0 without layout manager) */
  getContentSize(): number;

  /** Visible size of the viewport in pixels */
  getViewportSize(): number;

  /** First position intersecting the viewport, or -1 when empty */
  findFirstVisiblePosition(): number;

  /** Range of positions currently rendered (overscan included) */
  getRenderRange(): Range;

  /** Scroll to an offset, clamped to the scrollable range */
  scrollTo(offset: number): void;

  /** Scroll so that `position` is at the top */
  scrollToPosition(position: number): void;

  /** Re-measure and re-render */
  refresh(): void;

  on<K extends keyof ListViewEvents>(
    event: K,
    handler: EventHandler<ListViewEvents[K]>,
  ): Unsubscribe;

  off<K extends keyof ListViewEvents>(
    event: K,
    handler: EventHandler<ListViewEvents[K]>,
  ): void;

  /** Remove listeners and elements */
  destroy(): void;
}
