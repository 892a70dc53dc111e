/**
 * fastscroll - View Group
 * Root element, child list and the default attach / detach behavior
 */

import type { AttachmentState, LayoutParams, PlatformContext, View } from "../types";
import type { ViewGroup, ViewParent } from "./types";
import { isRefreshLayout } from "../scroller/capabilities";
import { applyLayoutParams } from "./layout-params";
import { LOG_PREFIX, VIEW_ID_ATTRIBUTE } from "../constants";

/** View group options */
export interface ViewGroupOptions {
  /** Class name of the root element */
  className: string;
}

const parentElementOf = (parent: ViewParent): HTMLElement =>
  isRefreshLayout(parent) ? parent.element : parent;

/**
 * Create a view group. Attaching twice, or detaching while detached, throws.
 */
export const createViewGroup = (
  context: PlatformContext,
  options: ViewGroupOptions,
): ViewGroup => {
  const root = context.document.createElement("div");
  root.className = options.className;
  root.style.position = "relative";
  root.style.display = "flex";
  root.style.flexDirection = "column";

  const children: View[] = [];
  let state: AttachmentState = "detached";
  let parent: ViewParent | null = null;
  let layoutParams: LayoutParams | null = null;

  const addView = (child: View, params?: LayoutParams): void => {
    if (children.includes(child)) {
      throw new Error(`${LOG_PREFIX} View is already a child of this group`);
    }
    root.appendChild(child.element);
    if (params) applyLayoutParams(child.element, params);
    children.push(child);
  };

  const removeAllViews = (): void => {
    for (const child of children) child.element.remove();
    children.length = 0;
  };

  const attach = (next: ViewParent): void => {
    if (state === "attached") {
      throw new Error(`${LOG_PREFIX} View is already attached`);
    }
    parentElementOf(next).appendChild(root);
    parent = next;
    state = "attached";
  };

  const detach = (): void => {
    if (state === "detached") {
      throw new Error(`${LOG_PREFIX} View is not attached`);
    }
    root.remove();
    parent = null;
    state = "detached";
  };

  return {
    get element() {
      return root;
    },
    get id() {
      return root.getAttribute(VIEW_ID_ATTRIBUTE);
    },
    get state() {
      return state;
    },
    get parent() {
      return parent;
    },
    get childCount() {
      return children.length;
    },
    get layoutParams() {
      return layoutParams;
    },
    set layoutParams(params: LayoutParams | null) {
      layoutParams = params;
      if (params) applyLayoutParams(root, params);
    },
    getChildAt: (index) => children[index] ?? null,
    addView,
    removeAllViews,
    attach,
    detach,
  };
};

/** Assign a stable id to a view */
export const setViewId = (view: View, id: string): void => {
  view.element.setAttribute(VIEW_ID_ATTRIBUTE, id);
};

/** Find a view's element by its stable id below `root` */
export const findViewById = (root: ParentNode, id: string): HTMLElement | null =>
  root.querySelector<HTMLElement>(`[${VIEW_ID_ATTRIBUTE}="${id}"]`);
