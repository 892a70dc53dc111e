/**
 * fastscroll - Constants
 * All default values and magic numbers in one place
 */

// =============================================================================
// View Identifiers
// =============================================================================

/** Stable id of the scroll indicator child (`data-view-id`) */
export const VIEW_ID_FAST_SCROLLER = "fast_scroller";

/** Stable id of the list view child (`data-view-id`) */
export const VIEW_ID_RECYCLER_VIEW = "recycler_view";

/** Attribute that carries a view id */
export const VIEW_ID_ATTRIBUTE = "data-view-id";

// =============================================================================
// Platform Feature Levels
// =============================================================================

/** First feature level with native nested scrolling */
export const FEATURE_LEVEL_NESTED_SCROLL = 21;

/** Feature level assumed when the host does not pass one */
export const FEATURE_LEVEL_CURRENT = 34;

// =============================================================================
// General
// =============================================================================

/** Default CSS class prefix */
export const DEFAULT_CLASS_PREFIX = "fastscroll";

/** Log and error message prefix */
export const LOG_PREFIX = "[fastscroll]";

// =============================================================================
// List View
// =============================================================================

/** Default number of extra items to render outside viewport */
export const DEFAULT_OVERSCAN = 3;

/** Maximum pooled item elements kept for reuse */
export const DEFAULT_POOL_SIZE = 100;

// =============================================================================
// Scroll Indicator
// =============================================================================

/** Delay before an idle scroller hides itself, in milliseconds */
export const DEFAULT_HIDE_DELAY = 1000;

/** Minimum handle size in pixels */
export const DEFAULT_MIN_HANDLE_SIZE = 30;

/** Default track color */
export const DEFAULT_TRACK_COLOR = "rgba(0, 0, 0, 0.12)";

/** Default handle color */
export const DEFAULT_HANDLE_COLOR = "#757575";

/** Default bubble background color */
export const DEFAULT_BUBBLE_COLOR = "#757575";

/** Default bubble text color */
export const DEFAULT_BUBBLE_TEXT_COLOR = "#ffffff";

/** Default bubble text size in pixels */
export const DEFAULT_BUBBLE_TEXT_SIZE = 32;
