/**
 * fastscroll - Scroll Indicator Types
 */

import type { Color, View } from "../types";
import type { ListView } from "../list/types";

// =============================================================================
// Capabilities
// =============================================================================

/**
 * Section-index capability. An adapter that implements it provides the
 * short label shown in the bubble for an item position.
 */
export interface SectionIndexer {
  /** Label of the section containing `position` (usually one or two characters) */
  getSectionText(position: number): string;
}

/** Receives fast scroll drag notifications */
export interface FastScrollListener {
  /** The handle was grabbed */
  onFastScrollStart(fastScroller: FastScroller): void;

  /** The handle was released */
  onFastScrollStop(fastScroller: FastScroller): void;
}

/**
 * A pull-to-refresh container. The scroller disables it while the handle is
 * dragged so the drag is not taken for a refresh gesture.
 */
export interface RefreshLayout {
  /** Root element of the refresh container */
  readonly element: HTMLElement;

  /** Marks the object as a refresh container */
  readonly isRefreshLayout: true;

  isEnabled(): boolean;
  setEnabled(enabled: boolean): void;
}

// =============================================================================
// Scroll Indicator
// =============================================================================

/** Overlay fast scroll control: handle, track and section bubble */
export interface FastScroller extends View {
  /** Bind to a list view placed in a parent element, and observe its scrolling */
  attachListView(listView: ListView): void;

  /** Stop observing the list view, release drag and timer state, and leave the list's parent */
  detachListView(): void;

  /** True while bound to a list view */
  isBound(): boolean;

  /** Bound list view, or null */
  getListView(): ListView | null;

  setSectionIndexer(sectionIndexer: SectionIndexer | null): void;
  getSectionIndexer(): SectionIndexer | null;

  /**
   * Section label for `position`, or null when the scroller is not bound,
   * has no section indexer, or the position is outside the list.
   */
  getSectionText(position: number): string | null;

  /** Replace the listener, or clear it with null */
  setFastScrollListener(listener: FastScrollListener | null): void;
  getFastScrollListener(): FastScrollListener | null;

  setRefreshLayout(refreshLayout: RefreshLayout | null): void;
  getRefreshLayout(): RefreshLayout | null;

  setEnabled(enabled: boolean): void;
  isEnabled(): boolean;

  /** Hide the scroller while the list is idle */
  setHideScrollbar(hideScrollbar: boolean): void;

  setTrackVisible(visible: boolean): void;
  setTrackColor(color: Color): void;
  setHandleColor(color: Color): void;

  /**
   * @param visible - Show the bubble at all
   * @param always - Show it whenever the scroller shows, not only while dragging
   */
  setBubbleVisible(visible: boolean, always?: boolean): void;
  setBubbleColor(color: Color): void;
  setBubbleTextColor(color: Color): void;

  /** Bubble text size in pixels */
  setBubbleTextSize(size: number): void;

  /** Whether the scroller is currently shown */
  isVisible(): boolean;

  /** Whether the handle is being dragged */
  isDragging(): boolean;

  /** Detach, cancel timers and remove elements */
  destroy(): void;
}
