/**
 * fastscroll - List view with an overlay fast scroller
 * A container that owns a virtualized list and a fast scroll handle, track
 * and section bubble, and binds them while attached
 *
 * @packageDocumentation
 */

// Container
export {
  createFastScrollView,
  createViewGroup,
  setViewId,
  findViewById,
  resolveCompatibilityAction,
  applyLayoutParams,
  MATCH_PARENT,
  MATCH_WIDTH_WRAP_HEIGHT,
} from "./view";
export type {
  FastScrollView,
  FastScrollViewOptions,
  ViewGroup,
  ViewGroupOptions,
  ViewParent,
  CompatibilityAction,
} from "./view";

// Scroll indicator
export {
  createFastScroller,
  isSectionIndexer,
  isRefreshLayout,
} from "./scroller";
export type {
  FastScroller,
  FastScrollListener,
  RefreshLayout,
  SectionIndexer,
} from "./scroller";

// List view
export {
  createListView,
  createLinearLayoutManager,
  isLayoutManager,
} from "./list";
export type {
  ListAdapter,
  LayoutManager,
  LinearLayoutConfig,
  LinearLayoutManager,
  ListView,
  ListViewEvents,
  Range,
} from "./list";

// Platform & attributes
export { createPlatformContext } from "./context";
export type { PlatformContextOptions } from "./context";
export {
  DEFAULT_STYLE_ATTRIBUTES,
  resolveStyleAttributes,
  readStyleAttributes,
} from "./attrs";

// Events
export { createEmitter, type Emitter } from "./events";

// Constants
export {
  VIEW_ID_FAST_SCROLLER,
  VIEW_ID_RECYCLER_VIEW,
  VIEW_ID_ATTRIBUTE,
  FEATURE_LEVEL_NESTED_SCROLL,
  FEATURE_LEVEL_CURRENT,
  DEFAULT_CLASS_PREFIX,
} from "./constants";

// Core Types
export type {
  AttachmentState,
  Color,
  Dimension,
  EventHandler,
  EventMap,
  LayoutParams,
  PlatformContext,
  ResolvedStyleAttributes,
  StyleAttributes,
  Unsubscribe,
  View,
} from "./types";
