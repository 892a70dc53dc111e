/**
 * fastscroll - List View
 * Virtualized, scrollable item list with adapter and layout manager slots
 *
 * Only the items intersecting the viewport (plus overscan) exist in the DOM.
 * Item elements are recycled through a pool and filled by the adapter.
 */

import type {
  EventHandler,
  PlatformContext,
  StyleAttributes,
  Unsubscribe,
} from "../types";
import type {
  LayoutManager,
  ListAdapter,
  ListView,
  ListViewEvents,
  Range,
} from "./types";
import { createEmitter } from "../events";
import { createElementPool } from "./pool";
import { isLayoutManager } from "./layout";
import { DEFAULT_OVERSCAN, LOG_PREFIX, VIEW_ID_ATTRIBUTE } from "../constants";

// =============================================================================
// DOM Structure
// =============================================================================

interface DOMStructure {
  root: HTMLElement;
  viewport: HTMLElement;
  content: HTMLElement;
  items: HTMLElement;
}

const createDOMStructure = (
  context: PlatformContext,
  ariaLabel?: string,
): DOMStructure => {
  const { document: doc, classPrefix } = context;

  const root = doc.createElement("div");
  root.className = `${classPrefix}-list`;
  root.setAttribute("role", "list");
  if (ariaLabel) root.setAttribute("aria-label", ariaLabel);
  // Column flex so a parent bounded only by max-height still bounds the viewport
  root.style.display = "flex";
  root.style.flexDirection = "column";
  root.style.minHeight = "0";

  const viewport = doc.createElement("div");
  viewport.className = `${classPrefix}-list-viewport`;
  viewport.style.overflow = "auto";
  viewport.style.height = "100%";
  viewport.style.width = "100%";
  viewport.style.flex = "1 1 auto";
  viewport.style.minHeight = "0";

  const content = doc.createElement("div");
  content.className = `${classPrefix}-list-content`;
  content.style.position = "relative";
  content.style.width = "100%";

  const items = doc.createElement("div");
  items.className = `${classPrefix}-list-items`;
  items.style.position = "relative";
  items.style.width = "100%";

  content.appendChild(items);
  viewport.appendChild(content);
  root.appendChild(viewport);

  return { root, viewport, content, items };
};

// =============================================================================
// Range Calculation
// =============================================================================

const calculateVisibleRange = (
  offset: number,
  viewportSize: number,
  layout: LayoutManager,
  itemCount: number,
  out: Range,
): void => {
  if (itemCount === 0) {
    out.start = 0;
    out.end = -1;
    return;
  }
  const start = layout.findPositionAtOffset(offset, itemCount);
  let end = start;
  let accumulated = layout.getItemOffset(start) + layout.getItemSize(start) - offset;
  while (end < itemCount - 1 && accumulated < viewportSize) {
    end++;
    accumulated += layout.getItemSize(end);
  }
  out.start = start;
  out.end = end;
};

const applyOverscan = (
  visible: Range,
  overscan: number,
  itemCount: number,
  out: Range,
): void => {
  if (visible.end < visible.start) {
    out.start = 0;
    out.end = -1;
    return;
  }
  out.start = Math.max(0, visible.start - overscan);
  out.end = Math.min(itemCount - 1, visible.end + overscan);
};

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a list view.
 *
 * The view renders nothing until both an adapter and a layout manager are
 * assigned. It can be placed in any element; its root fills the parent.
 */
export const createListView = (
  context: PlatformContext,
  attrs?: StyleAttributes | null,
): ListView => {
  const overscan = attrs?.overscan ?? DEFAULT_OVERSCAN;
  const { classPrefix } = context;

  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  let adapter: ListAdapter | null = null;
  let layoutManager: LayoutManager | null = null;
  let unobserveAdapter: (() => void) | null = null;
  let lastOffset = 0;
  let lastContentSize = -1;
  let lastViewportSize = -1;
  let lastItemCount = -1;
  let warnedNoLayout = false;
  let isDestroyed = false;

  const dom = createDOMStructure(context, attrs?.ariaLabel);
  const emitter = createEmitter<ListViewEvents>();
  const pool = createElementPool(context.document);
  const rendered = new Map<number, HTMLElement>();

  const visibleRange: Range = { start: 0, end: -1 };
  const renderRange: Range = { start: 0, end: -1 };

  const itemClass = `${classPrefix}-list-item`;

  // ---------------------------------------------------------------------------
  // Measurements
  // ---------------------------------------------------------------------------

  const getItemCount = (): number => adapter?.getItemCount() ?? 0;

  const getContentSize = (): number =>
    layoutManager ? layoutManager.getTotalSize(getItemCount()) : 0;

  const getViewportSize = (): number => dom.viewport.clientHeight;

  const getMaxOffset = (): number =>
    Math.max(0, getContentSize() - getViewportSize());

  // ---------------------------------------------------------------------------
  // Rendering
  // ---------------------------------------------------------------------------

  const releaseAll = (): void => {
    for (const [, element] of rendered) {
      element.remove();
      pool.release(element);
    }
    rendered.clear();
  };

  const render = (force: boolean): void => {
    if (isDestroyed) return;

    const itemCount = getItemCount();

    if (!adapter || !layoutManager) {
      if (adapter && !layoutManager && !warnedNoLayout) {
        warnedNoLayout = true;
        console.warn(`${LOG_PREFIX} No layout manager attached; skipping layout`);
      }
      releaseAll();
      renderRange.start = 0;
      renderRange.end = -1;
      return;
    }

    calculateVisibleRange(lastOffset, getViewportSize(), layoutManager, itemCount, visibleRange);
    applyOverscan(visibleRange, overscan, itemCount, renderRange);

    for (const [position, element] of rendered) {
      if (force || position < renderRange.start || position > renderRange.end) {
        element.remove();
        pool.release(element);
        rendered.delete(position);
      }
    }

    const fragment = context.document.createDocumentFragment();
    for (let i = renderRange.start; i <= renderRange.end; i++) {
      if (rendered.has(i)) continue;
      const element = pool.acquire();
      element.className = itemClass;
      element.dataset.position = String(i);
      element.style.position = "absolute";
      element.style.left = "0";
      element.style.right = "0";
      element.style.height = `${layoutManager.getItemSize(i)}px`;
      element.style.transform = `translateY(${Math.round(layoutManager.getItemOffset(i))}px)`;
      adapter.bindView(element, i);
      fragment.appendChild(element);
      rendered.set(i, element);
    }
    dom.items.appendChild(fragment);
  };

  const emitLayoutIfChanged = (): void => {
    const contentSize = getContentSize();
    const viewportSize = getViewportSize();
    const itemCount = getItemCount();
    if (
      contentSize === lastContentSize &&
      viewportSize === lastViewportSize &&
      itemCount === lastItemCount
    ) {
      return;
    }
    lastContentSize = contentSize;
    lastViewportSize = viewportSize;
    lastItemCount = itemCount;
    emitter.emit("layout", { contentSize, viewportSize, itemCount });
  };

  const refresh = (): void => {
    if (isDestroyed) return;
    dom.content.style.height = `${getContentSize()}px`;
    lastOffset = Math.min(lastOffset, getMaxOffset());
    render(true);
    emitLayoutIfChanged();
  };

  // ---------------------------------------------------------------------------
  // Scroll handling
  // ---------------------------------------------------------------------------

  const syncScroll = (): void => {
    if (isDestroyed) return;

    const offset = Math.max(0, dom.viewport.scrollTop);
    if (offset === lastOffset) return;

    const direction = offset >= lastOffset ? "down" : "up";
    lastOffset = offset;
    render(false);
    emitter.emit("scroll", { offset, direction });
  };

  dom.viewport.addEventListener("scroll", syncScroll, { passive: true });

  // ---------------------------------------------------------------------------
  // Resize handling
  // ---------------------------------------------------------------------------

  // The viewport measures 0 until it is in a laid-out document, so the first
  // real size usually arrives here rather than from setAdapter.
  const resizeObserver = new ResizeObserver(() => {
    if (isDestroyed) return;
    if (getViewportSize() !== lastViewportSize) {
      refresh();
    }
  });
  resizeObserver.observe(dom.viewport);

  const scrollTo = (offset: number): void => {
    if (isDestroyed) return;
    dom.viewport.scrollTop = Math.max(0, Math.min(offset, getMaxOffset()));
    syncScroll();
  };

  const scrollToPosition = (position: number): void => {
    if (!layoutManager) return;
    const itemCount = getItemCount();
    if (itemCount === 0) return;
    const clamped = Math.max(0, Math.min(position, itemCount - 1));
    scrollTo(layoutManager.getItemOffset(clamped));
  };

  const findFirstVisiblePosition = (): number => {
    const itemCount = getItemCount();
    if (!layoutManager || itemCount === 0) return -1;
    return layoutManager.findPositionAtOffset(lastOffset, itemCount);
  };

  // ---------------------------------------------------------------------------
  // Slots
  // ---------------------------------------------------------------------------

  const setAdapter = (next: ListAdapter | null): void => {
    if (unobserveAdapter) {
      unobserveAdapter();
      unobserveAdapter = null;
    }
    adapter = next;
    if (next?.observe) {
      unobserveAdapter = next.observe(refresh);
    }
    refresh();
  };

  const setLayoutManager = (next: LayoutManager | null): void => {
    if (next !== null && !isLayoutManager(next)) {
      throw new Error(
        `${LOG_PREFIX} Layout manager must implement getItemOffset, getItemSize, getTotalSize and findPositionAtOffset`,
      );
    }
    layoutManager = next;
    warnedNoLayout = false;
    refresh();
  };

  // ---------------------------------------------------------------------------
  // Destroy
  // ---------------------------------------------------------------------------

  const destroy = (): void => {
    if (isDestroyed) return;

    if (unobserveAdapter) {
      unobserveAdapter();
      unobserveAdapter = null;
    }
    dom.viewport.removeEventListener("scroll", syncScroll);
    resizeObserver.disconnect();
    releaseAll();
    pool.clear();
    emitter.clear();
    dom.root.remove();
    isDestroyed = true;
  };

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  return {
    get element() {
      return dom.root;
    },

    get viewport() {
      return dom.viewport;
    },

    get id() {
      return dom.root.getAttribute(VIEW_ID_ATTRIBUTE);
    },

    get adapter() {
      return adapter;
    },
    set adapter(value: ListAdapter | null) {
      setAdapter(value);
    },

    get layoutManager() {
      return layoutManager;
    },
    set layoutManager(value: LayoutManager | null) {
      setLayoutManager(value);
    },

    setAdapter,
    setLayoutManager,

    getItemCount,
    getScrollOffset: () => lastOffset,
    getContentSize,
    getViewportSize,
    findFirstVisiblePosition,
    getRenderRange: () => ({ start: renderRange.start, end: renderRange.end }),

    scrollTo,
    scrollToPosition,
    refresh,

    on: <K extends keyof ListViewEvents>(
      event: K,
      handler: EventHandler<ListViewEvents[K]>,
    ): Unsubscribe => emitter.on(event, handler),

    off: <K extends keyof ListViewEvents>(
      event: K,
      handler: EventHandler<ListViewEvents[K]>,
    ): void => emitter.off(event, handler),

    destroy,
  };
};
