/**
 * fastscroll - FastScrollView
 * A container that creates a list view and a fast scroller and manages the
 * scroller's lifecycle.
 *
 * Use it instead of wiring the two by hand, or where a parent accepts a
 * single child (a refresh layout, for instance).
 */

import type { PlatformContext, StyleAttributes } from "../types";
import type { LayoutManager, ListAdapter } from "../list/types";
import type { FastScrollView, ViewParent } from "./types";
import { createListView } from "../list";
import { createFastScroller, isSectionIndexer } from "../scroller";
import { resolveStyleAttributes } from "../attrs";
import { createViewGroup, setViewId } from "./group";
import { resolveCompatibilityAction } from "./compat";
import { MATCH_PARENT, MATCH_WIDTH_WRAP_HEIGHT } from "./layout-params";
import { VIEW_ID_FAST_SCROLLER, VIEW_ID_RECYCLER_VIEW } from "../constants";

/**
 * Create a FastScrollView.
 *
 * Both children are built here, from the same context and attribute bag, and
 * live as long as the container. Without `attrs` or `defStyle` the
 * container fills the parent's width and wraps its content's height, up to
 * the parent's height; with either, sizing is left to the host.
 *
 * @param context - Platform context
 * @param attrs - Attribute bag applied to both children
 * @param defStyle - Style default applied under `attrs`
 */
export const createFastScrollView = (
  context: PlatformContext,
  attrs?: StyleAttributes | null,
  defStyle?: StyleAttributes | null,
): FastScrollView => {
  const group = createViewGroup(context, {
    className: `${context.classPrefix}-view`,
  });

  const childAttrs =
    attrs != null || defStyle != null
      ? resolveStyleAttributes(attrs, defStyle)
      : null;

  const fastScroller = createFastScroller(context, childAttrs);
  const listView = createListView(context, childAttrs);
  setViewId(fastScroller, VIEW_ID_FAST_SCROLLER);
  setViewId(listView, VIEW_ID_RECYCLER_VIEW);

  if (attrs == null && defStyle == null) {
    group.layoutParams = MATCH_WIDTH_WRAP_HEIGHT;
  }

  let nestedScrollingEnabled = false;

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  const attach = (parent: ViewParent): void => {
    group.attach(parent);

    group.addView(listView, MATCH_PARENT);
    // Measure in place before the scroller reads the list's bounds
    listView.refresh();
    fastScroller.attachListView(listView);

    const action = resolveCompatibilityAction(context.featureLevel, parent);
    switch (action.kind) {
      case "nested-scroll":
        nestedScrollingEnabled = true;
        group.element.dataset.nestedScroll = "true";
        break;
      case "delegate-refresh":
        fastScroller.setRefreshLayout(action.refreshLayout);
        break;
      case "none":
        break;
    }
  };

  const detach = (): void => {
    fastScroller.detachListView();
    group.removeAllViews();
    group.detach();
  };

  // ---------------------------------------------------------------------------
  // Adapter routing
  // ---------------------------------------------------------------------------

  const setAdapter = (adapter: ListAdapter | null): void => {
    listView.setAdapter(adapter);
    fastScroller.setSectionIndexer(isSectionIndexer(adapter) ? adapter : null);
  };

  const setLayoutManager = (layoutManager: LayoutManager | null): void => {
    listView.setLayoutManager(layoutManager);
  };

  const destroy = (): void => {
    if (group.state === "attached") detach();
    fastScroller.destroy();
    listView.destroy();
  };

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  return {
    get element() {
      return group.element;
    },
    get id() {
      return group.id;
    },
    get state() {
      return group.state;
    },
    get parent() {
      return group.parent;
    },
    get childCount() {
      return group.childCount;
    },
    get layoutParams() {
      return group.layoutParams;
    },
    set layoutParams(params) {
      group.layoutParams = params;
    },
    getChildAt: (index) => group.getChildAt(index),
    addView: (child, params) => group.addView(child, params),
    removeAllViews: () => group.removeAllViews(),

    attach,
    detach,

    get fastScroller() {
      return fastScroller;
    },
    get recyclerView() {
      return listView;
    },
    get listView() {
      return listView;
    },

    get adapter() {
      return listView.adapter;
    },
    set adapter(adapter) {
      setAdapter(adapter);
    },

    get layoutManager() {
      return listView.layoutManager;
    },
    set layoutManager(layoutManager) {
      setLayoutManager(layoutManager);
    },

    setAdapter,
    setLayoutManager,
    isNestedScrollingEnabled: () => nestedScrollingEnabled,

    setFastScrollListener: (listener) => fastScroller.setFastScrollListener(listener),
    setFastScrollEnabled: (enabled) => fastScroller.setEnabled(enabled),
    setHideScrollbar: (hideScrollbar) => fastScroller.setHideScrollbar(hideScrollbar),
    setTrackVisible: (visible) => fastScroller.setTrackVisible(visible),
    setTrackColor: (color) => fastScroller.setTrackColor(color),
    setHandleColor: (color) => fastScroller.setHandleColor(color),
    setBubbleVisible: (visible, always = false) =>
      fastScroller.setBubbleVisible(visible, always),
    setBubbleColor: (color) => fastScroller.setBubbleColor(color),
    setBubbleTextColor: (color) => fastScroller.setBubbleTextColor(color),
    setBubbleTextSize: (size) => fastScroller.setBubbleTextSize(size),

    destroy,
  };
};
