/**
 * fastscroll - Core Types
 * Shared interfaces for the list view, the scroll indicator and their container
 */

// =============================================================================
// Event Map Base Type
// =============================================================================

/** Base event map with index signature */
export type EventMap = Record<string, unknown>;

/** Event handler type */
export type EventHandler<T> = (payload: T) => void;

/** Unsubscribe function */
export type Unsubscribe = () => void;

// =============================================================================
// Platform
// =============================================================================

/**
 * Platform context shared by every view a container creates.
 * Created with `createPlatformContext`.
 */
export interface PlatformContext {
  /** Document used to create elements */
  readonly document: Document;

  /**
   * Platform feature level. Levels at or above
   * `FEATURE_LEVEL_NESTED_SCROLL` support native nested scrolling.
   */
  readonly featureLevel: number;

  /** CSS class prefix for every element created by the library */
  readonly classPrefix: string;
}

/** Whether a view is currently part of the visible tree */
export type AttachmentState = "detached" | "attached";

/** CSS color string (`#rrggbb`, `rgb()`, named color...) */
export type Color = string;

// =============================================================================
// Layout Params
// =============================================================================

/** One axis of a layout param: fill the parent, fit the content, or pixels */
export type Dimension = "match_parent" | "wrap_content" | number;

/** Sizing requested by a view from its parent */
export interface LayoutParams {
  width: Dimension;
  height: Dimension;
}

// =============================================================================
// Style Attributes
// =============================================================================

/**
 * Attribute bag applied to both children of a container.
 * Every field is optional; missing fields fall back to the style default,
 * then to the library defaults.
 */
export interface StyleAttributes {
  /** Track color */
  trackColor?: Color;

  /** Handle color */
  handleColor?: Color;

  /** Section bubble background color */
  bubbleColor?: Color;

  /** Section bubble text color */
  bubbleTextColor?: Color;

  /** Section bubble text size in pixels */
  bubbleTextSize?: number;

  /** Hide the scroller while the list is idle */
  hideScrollbar?: boolean;

  /** Show the track behind the handle */
  trackVisible?: boolean;

  /** Show the section bubble */
  bubbleVisible?: boolean;

  /** Show the bubble whenever the scroller is shown, not only while dragging */
  bubbleAlwaysVisible?: boolean;

  /** Fast scrolling enabled */
  fastScrollEnabled?: boolean;

  /** Extra items rendered outside the viewport */
  overscan?: number;

  /** Accessible label of the list */
  ariaLabel?: string;
}

/** Style attributes with every field resolved */
export type ResolvedStyleAttributes = Required<Omit<StyleAttributes, "ariaLabel">> &
  Pick<StyleAttributes, "ariaLabel">;

// =============================================================================
// Views
// =============================================================================

/** Anything with a root element that can be placed in a view group */
export interface View {
  /** Root DOM element */
  readonly element: HTMLElement;

  /** Stable identifier (`data-view-id`), or null */
  readonly id: string | null;
}
