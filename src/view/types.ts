/**
 * fastscroll - View Tree Types
 */

import type {
  AttachmentState,
  Color,
  LayoutParams,
  StyleAttributes,
  View,
} from "../types";
import type { LayoutManager, ListAdapter, ListView } from "../list/types";
import type {
  FastScrollListener,
  FastScroller,
  RefreshLayout,
} from "../scroller/types";

/** Where a view group can be attached: a plain element or a refresh layout */
export type ViewParent = HTMLElement | RefreshLayout;

// =============================================================================
// View Group
// =============================================================================

/** A view that holds child views and can be attached to a parent */
export interface ViewGroup extends View {
  /** Current attachment state */
  readonly state: AttachmentState;

  /** Parent while attached, otherwise null */
  readonly parent: ViewParent | null;

  /** Number of child views */
  readonly childCount: number;

  /** Sizing requested from the parent, or null to leave it to the host */
  layoutParams: LayoutParams | null;

  getChildAt(index: number): View | null;

  /** Append a child, optionally sizing it */
  addView(child: View, params?: LayoutParams): void;

  /** Remove every child */
  removeAllViews(): void;

  /** Insert the root into `parent` and enter the attached state */
  attach(parent: ViewParent): void;

  /** Remove the root from its parent and enter the detached state */
  detach(): void;
}

// =============================================================================
// Composite Container
// =============================================================================

/** Options shared by the framework adapters */
export interface FastScrollViewOptions {
  /** Attribute bag applied to both children */
  attrs?: StyleAttributes | null;

  /** Style default applied under `attrs` */
  defStyle?: StyleAttributes | null;

  /** Item adapter */
  adapter?: ListAdapter | null;

  /** Layout manager */
  layoutManager?: LayoutManager | null;
}

/**
 * A container that owns a list view and a fast scroller, and binds the
 * scroller to the list while attached.
 */
export interface FastScrollView extends ViewGroup {
  /** The owned fast scroller */
  readonly fastScroller: FastScroller;

  /** The owned list view */
  readonly recyclerView: ListView;

  /** Same as `recyclerView` */
  readonly listView: ListView;

  /**
   * The list adapter. Assigning an adapter that implements SectionIndexer
   * also makes it the scroller's section indexer; any other value clears it.
   */
  adapter: ListAdapter | null;

  /** The list layout manager */
  layoutManager: LayoutManager | null;

  setAdapter(adapter: ListAdapter | null): void;
  setLayoutManager(layoutManager: LayoutManager | null): void;

  /** Whether native nested scrolling was enabled on attach */
  isNestedScrollingEnabled(): boolean;

  setFastScrollListener(listener: FastScrollListener | null): void;
  setFastScrollEnabled(enabled: boolean): void;
  setHideScrollbar(hideScrollbar: boolean): void;
  setTrackVisible(visible: boolean): void;
  setTrackColor(color: Color): void;
  setHandleColor(color: Color): void;
  setBubbleVisible(visible: boolean, always?: boolean): void;
  setBubbleColor(color: Color): void;
  setBubbleTextColor(color: Color): void;
  setBubbleTextSize(size: number): void;

  /** Detach if attached, then destroy both children */
  destroy(): void;
}
