/**
 * fastscroll - Fast Scroller
 * Overlay scroll indicator bound to a list view
 *
 * Features:
 * - Handle size proportional to visible content
 * - Drag handle to scroll, click track to jump
 * - Section bubble fed by a SectionIndexer
 * - Auto-hide after idle (optional)
 * - Disables a surrounding refresh layout while dragging
 */

import type { Color, PlatformContext, StyleAttributes, Unsubscribe } from "../types";
import type { ListView, ListViewEvents } from "../list/types";
import type {
  FastScrollListener,
  FastScroller,
  RefreshLayout,
  SectionIndexer,
} from "./types";
import { resolveStyleAttributes } from "../attrs";
import {
  DEFAULT_HIDE_DELAY,
  DEFAULT_MIN_HANDLE_SIZE,
  LOG_PREFIX,
  VIEW_ID_ATTRIBUTE,
} from "../constants";

// =============================================================================
// DOM Structure
// =============================================================================

interface DOMStructure {
  root: HTMLElement;
  track: HTMLElement;
  handle: HTMLElement;
  bubble: HTMLElement;
}

const createDOMStructure = (context: PlatformContext): DOMStructure => {
  const { document: doc, classPrefix } = context;

  const root = doc.createElement("div");
  root.className = `${classPrefix}-fastscroller`;
  root.style.position = "absolute";
  root.style.top = "0";
  root.style.right = "0";
  root.style.bottom = "0";

  const track = doc.createElement("div");
  track.className = `${classPrefix}-fastscroller-track`;

  const handle = doc.createElement("div");
  handle.className = `${classPrefix}-fastscroller-handle`;

  const bubble = doc.createElement("div");
  bubble.className = `${classPrefix}-fastscroller-bubble`;
  bubble.setAttribute("aria-hidden", "true");

  track.appendChild(handle);
  root.appendChild(track);
  root.appendChild(bubble);

  return { root, track, handle, bubble };
};

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a fast scroller.
 *
 * The scroller is inert until `attachListView` binds it to a list view that
 * already sits in a parent element; its root is inserted next to the list.
 */
export const createFastScroller = (
  context: PlatformContext,
  attrs?: StyleAttributes | null,
): FastScroller => {
  const style = resolveStyleAttributes(attrs);
  const { classPrefix } = context;
  const doc = context.document;

  // State
  let listView: ListView | null = null;
  let unsubscribers: Unsubscribe[] = [];
  let sectionIndexer: SectionIndexer | null = null;
  let listener: FastScrollListener | null = null;
  let refreshLayout: RefreshLayout | null = null;
  let refreshWasEnabled = false;

  let enabled = style.fastScrollEnabled;
  let hideScrollbar = style.hideScrollbar;
  let trackVisible = style.trackVisible;
  let bubbleVisible = style.bubbleVisible;
  let bubbleAlways = style.bubbleAlwaysVisible;
  let trackColor: Color = style.trackColor;

  let contentSize = 0;
  let viewportSize = 0;
  let handleSize = 0;
  let maxHandleTravel = 0;
  let currentOffset = 0;

  let dragging = false;
  let dragStartPos = 0;
  let dragStartOffset = 0;
  let lastRequestedOffset: number | null = null;
  let animationFrameId: number | null = null;
  let hideTimeout: ReturnType<typeof setTimeout> | null = null;
  let visible = false;
  let isDestroyed = false;

  const dom = createDOMStructure(context);
  const visibleClass = `${classPrefix}-fastscroller--visible`;
  const draggingClass = `${classPrefix}-fastscroller--dragging`;
  const bubbleVisibleClass = `${classPrefix}-fastscroller-bubble--visible`;

  // =============================================================================
  // Style
  // =============================================================================

  const applyTrackVisibility = (): void => {
    dom.track.style.backgroundColor = trackVisible ? trackColor : "transparent";
  };

  dom.handle.style.backgroundColor = style.handleColor;
  dom.bubble.style.backgroundColor = style.bubbleColor;
  dom.bubble.style.color = style.bubbleTextColor;
  dom.bubble.style.fontSize = `${style.bubbleTextSize}px`;
  applyTrackVisibility();

  // =============================================================================
  // Hide timeout helpers
  // =============================================================================

  const clearHideTimeout = (): void => {
    if (hideTimeout) {
      clearTimeout(hideTimeout);
      hideTimeout = null;
    }
  };

  const scheduleHide = (): void => {
    if (!hideScrollbar) return;
    clearHideTimeout();
    hideTimeout = setTimeout(hide, DEFAULT_HIDE_DELAY);
  };

  // =============================================================================
  // Visibility
  // =============================================================================

  const isScrollable = (): boolean => contentSize > viewportSize;

  const updateBubble = (): void => {
    const label = listView ? getSectionText(positionForOffset(currentOffset)) : null;
    const show =
      bubbleVisible &&
      label !== null &&
      (dragging || (bubbleAlways && visible));

    if (label !== null) dom.bubble.textContent = label;
    dom.bubble.classList.toggle(bubbleVisibleClass, show);
  };

  const show = (): void => {
    if (!enabled || !listView || !isScrollable()) return;

    clearHideTimeout();

    if (!visible) {
      dom.root.classList.add(visibleClass);
      visible = true;
    }

    if (!dragging) scheduleHide();
    updateBubble();
  };

  const hide = (): void => {
    hideTimeout = null;
    if (dragging) return;

    dom.root.classList.remove(visibleClass);
    visible = false;
    updateBubble();
  };

  const hideNow = (): void => {
    clearHideTimeout();
    dom.root.classList.remove(visibleClass);
    visible = false;
    updateBubble();
  };

  const applyVisibilityMode = (): void => {
    if (!enabled || !listView || !isScrollable()) {
      hideNow();
      return;
    }
    if (hideScrollbar) {
      if (visible) scheduleHide();
    } else {
      clearHideTimeout();
      dom.root.classList.add(visibleClass);
      visible = true;
      updateBubble();
    }
  };

  // =============================================================================
  // Size & Position Calculations
  // =============================================================================

  const positionForOffset = (offset: number): number => {
    if (!listView) return -1;
    const itemCount = listView.getItemCount();
    if (itemCount === 0) return -1;
    const maxScroll = contentSize - viewportSize;
    const ratio = maxScroll > 0 ? Math.min(1, Math.max(0, offset / maxScroll)) : 0;
    return Math.min(itemCount - 1, Math.floor(ratio * itemCount));
  };

  const placeHandle = (offset: number): void => {
    const maxScroll = contentSize - viewportSize;
    if (maxScroll <= 0 || maxHandleTravel <= 0) return;

    const ratio = Math.min(1, Math.max(0, offset / maxScroll));
    const handlePosition = ratio * maxHandleTravel;
    dom.handle.style.transform = `translateY(${handlePosition}px)`;
    dom.bubble.style.transform = `translateY(${handlePosition}px)`;
  };

  const updateBounds = (newContentSize: number, newViewportSize: number): void => {
    contentSize = newContentSize;
    viewportSize = newViewportSize;

    const scrollable = isScrollable();
    dom.root.style.display = scrollable && enabled ? "" : "none";

    if (!scrollable) {
      handleSize = 0;
      maxHandleTravel = 0;
      applyVisibilityMode();
      return;
    }

    handleSize = Math.max(
      DEFAULT_MIN_HANDLE_SIZE,
      (viewportSize / contentSize) * viewportSize,
    );
    dom.handle.style.height = `${handleSize}px`;
    maxHandleTravel = Math.max(0, viewportSize - handleSize);

    placeHandle(currentOffset);
    applyVisibilityMode();
  };

  // =============================================================================
  // List observation
  // =============================================================================

  const handleListScroll = ({ offset }: ListViewEvents["scroll"]): void => {
    currentOffset = offset;
    if (dragging) return;
    placeHandle(offset);
    show();
  };

  const handleListLayout = ({
    contentSize: nextContent,
    viewportSize: nextViewport,
  }: ListViewEvents["layout"]): void => {
    updateBounds(nextContent, nextViewport);
  };

  // =============================================================================
  // Refresh layout coordination
  // =============================================================================

  const suspendRefresh = (): void => {
    if (!refreshLayout) return;
    refreshWasEnabled = refreshLayout.isEnabled();
    if (refreshWasEnabled) refreshLayout.setEnabled(false);
  };

  const resumeRefresh = (): void => {
    if (refreshLayout && refreshWasEnabled) refreshLayout.setEnabled(true);
    refreshWasEnabled = false;
  };

  // =============================================================================
  // Track Click Handler
  // =============================================================================

  const handleTrackClick = (e: MouseEvent): void => {
    if (!enabled || !listView) return;
    if (e.target === dom.handle) return;

    const trackRect = dom.track.getBoundingClientRect();
    const clickPos = e.clientY - trackRect.top;
    const targetHandleStart = Math.max(
      0,
      Math.min(clickPos - handleSize / 2, maxHandleTravel),
    );

    const ratio = maxHandleTravel > 0 ? targetHandleStart / maxHandleTravel : 0;
    listView.scrollTo(ratio * (contentSize - viewportSize));
    show();
  };

  // =============================================================================
  // Handle Drag Handlers
  // =============================================================================

  const cancelFrame = (): void => {
    if (animationFrameId !== null) {
      cancelAnimationFrame(animationFrameId);
      animationFrameId = null;
    }
  };

  const handleMouseDown = (e: MouseEvent): void => {
    if (!enabled || !listView || !isScrollable()) return;

    e.preventDefault();
    e.stopPropagation();

    dragging = true;
    dragStartPos = e.clientY;
    dragStartOffset = currentOffset;

    clearHideTimeout();
    suspendRefresh();
    dom.root.classList.add(draggingClass);

    doc.addEventListener("mousemove", handleMouseMove);
    doc.addEventListener("mouseup", handleMouseUp);

    show();
    listener?.onFastScrollStart(scroller);
  };

  const handleMouseMove = (e: MouseEvent): void => {
    if (!dragging || !listView) return;

    const delta = e.clientY - dragStartPos;
    const maxScroll = contentSize - viewportSize;
    const deltaScroll = maxHandleTravel > 0 ? (delta / maxHandleTravel) * maxScroll : 0;
    const target = Math.max(0, Math.min(dragStartOffset + deltaScroll, maxScroll));

    currentOffset = target;
    placeHandle(target);
    updateBubble();

    lastRequestedOffset = target;
    if (animationFrameId === null) {
      animationFrameId = requestAnimationFrame(() => {
        animationFrameId = null;
        if (lastRequestedOffset !== null && listView) {
          listView.scrollTo(lastRequestedOffset);
        }
      });
    }
  };

  const endDrag = (notify: boolean): void => {
    if (!dragging) return;
    dragging = false;

    cancelFrame();
    if (lastRequestedOffset !== null && listView) {
      listView.scrollTo(lastRequestedOffset);
    }
    lastRequestedOffset = null;

    dom.root.classList.remove(draggingClass);
    doc.removeEventListener("mousemove", handleMouseMove);
    doc.removeEventListener("mouseup", handleMouseUp);
    resumeRefresh();
    updateBubble();

    if (notify) listener?.onFastScrollStop(scroller);
  };

  const handleMouseUp = (): void => {
    endDrag(true);
    if (visible) scheduleHide();
  };

  // =============================================================================
  // Binding
  // =============================================================================

  const attachListView = (next: ListView): void => {
    if (isDestroyed) return;
    if (listView === next) return;
    if (listView) detachListView();

    const parent = next.element.parentElement;
    if (!parent) {
      throw new Error(
        `${LOG_PREFIX} The list view must be placed in a parent element before a fast scroller can attach to it`,
      );
    }

    next.element.after(dom.root);
    listView = next;
    currentOffset = next.getScrollOffset();
    unsubscribers = [
      next.on("scroll", handleListScroll),
      next.on("layout", handleListLayout),
    ];

    updateBounds(next.getContentSize(), next.getViewportSize());
  };

  const detachListView = (): void => {
    if (!listView) return;

    // Release the drag without notifying: the list is going away
    endDrag(false);
    for (const unsubscribe of unsubscribers) unsubscribe();
    unsubscribers = [];
    listView = null;
    dom.root.remove();

    hideNow();
    contentSize = 0;
    viewportSize = 0;
    currentOffset = 0;
  };

  // =============================================================================
  // Section index
  // =============================================================================

  const getSectionText = (position: number): string | null => {
    if (!listView || !sectionIndexer) return null;
    if (!Number.isInteger(position) || position < 0) return null;
    if (position >= listView.getItemCount()) return null;
    return sectionIndexer.getSectionText(position);
  };

  // =============================================================================
  // Cleanup
  // =============================================================================

  const destroy = (): void => {
    if (isDestroyed) return;
    detachListView();
    clearHideTimeout();
    cancelFrame();

    dom.track.removeEventListener("click", handleTrackClick);
    dom.handle.removeEventListener("mousedown", handleMouseDown);
    dom.root.remove();

    listener = null;
    sectionIndexer = null;
    refreshLayout = null;
    isDestroyed = true;
  };

  // =============================================================================
  // Initialize
  // =============================================================================

  dom.root.style.display = "none";
  dom.track.addEventListener("click", handleTrackClick);
  dom.handle.addEventListener("mousedown", handleMouseDown);

  // =============================================================================
  // Public API
  // =============================================================================

  const scroller: FastScroller = {
    get element() {
      return dom.root;
    },

    get id() {
      return dom.root.getAttribute(VIEW_ID_ATTRIBUTE);
    },

    attachListView,
    detachListView,
    isBound: () => listView !== null,
    getListView: () => listView,

    setSectionIndexer: (indexer) => {
      sectionIndexer = indexer;
      updateBubble();
    },
    getSectionIndexer: () => sectionIndexer,
    getSectionText,

    setFastScrollListener: (next) => {
      listener = next;
    },
    getFastScrollListener: () => listener,

    setRefreshLayout: (next) => {
      if (dragging) resumeRefresh();
      refreshLayout = next;
      if (dragging) suspendRefresh();
    },
    getRefreshLayout: () => refreshLayout,

    setEnabled: (next) => {
      enabled = next;
      if (!enabled) endDrag(true);
      dom.root.style.display = isScrollable() && enabled ? "" : "none";
      applyVisibilityMode();
    },
    isEnabled: () => enabled,

    setHideScrollbar: (next) => {
      hideScrollbar = next;
      applyVisibilityMode();
    },

    setTrackVisible: (next) => {
      trackVisible = next;
      applyTrackVisibility();
    },
    setTrackColor: (color) => {
      trackColor = color;
      applyTrackVisibility();
    },
    setHandleColor: (color) => {
      dom.handle.style.backgroundColor = color;
    },

    setBubbleVisible: (next, always = false) => {
      bubbleVisible = next;
      bubbleAlways = always;
      updateBubble();
    },
    setBubbleColor: (color) => {
      dom.bubble.style.backgroundColor = color;
    },
    setBubbleTextColor: (color) => {
      dom.bubble.style.color = color;
    },
    setBubbleTextSize: (size) => {
      dom.bubble.style.fontSize = `${size}px`;
    },

    isVisible: () => visible,
    isDragging: () => dragging,

    destroy,
  };

  return scroller;
};
