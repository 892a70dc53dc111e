/**
 * fastscroll - Test helpers
 * Fake layout metrics and small adapters shared by the suites
 */

import type { ListAdapter } from "../src/list/types";
import type { RefreshLayout, SectionIndexer } from "../src/scroller/types";

/**
 * jsdom has no layout: give a viewport a client height and a scrollTop that
 * stores what is written to it. A function height is read on every access.
 */
export const mockViewportMetrics = (
  viewport: HTMLElement,
  clientHeight: number | (() => number),
): void => {
  let scrollTop = 0;
  Object.defineProperty(viewport, "clientHeight", {
    configurable: true,
    get: () => (typeof clientHeight === "function" ? clientHeight() : clientHeight),
  });
  Object.defineProperty(viewport, "scrollTop", {
    configurable: true,
    get: () => scrollTop,
    set: (value: number) => {
      scrollTop = value;
    },
  });
};

/** Measure `height` only while the viewport is in the document, as a browser does */
export const mockConnectedViewportHeight = (
  viewport: HTMLElement,
  height: number,
): void => {
  mockViewportMetrics(viewport, () => (viewport.isConnected ? height : 0));
};

/** Adapter over `count` items labelled "Item n" */
export const createPlainAdapter = (count: number): ListAdapter => ({
  getItemCount: () => count,
  bindView: (element, position) => {
    element.textContent = `Item ${position}`;
  },
});

export interface LetterAdapter extends ListAdapter, SectionIndexer {
  readonly items: readonly string[];
}

/**
 * Adapter with `perLetter` items for each letter A-Z, sectioned by letter.
 */
export const createLetterAdapter = (perLetter = 5): LetterAdapter => {
  const items: string[] = [];
  for (let i = 0; i < 26; i++) {
    for (let j = 0; j < perLetter; j++) {
      items.push(`${String.fromCharCode(65 + i)} example item`);
    }
  }

  return {
    items,
    getItemCount: () => items.length,
    bindView: (element, position) => {
      element.textContent = items[position] ?? "";
    },
    getSectionText: (position) => (items[position] ?? "").charAt(0),
  };
};

export interface FakeRefreshLayout extends RefreshLayout {
  /** Every value passed to setEnabled, in order */
  readonly history: boolean[];
}

/** In-process stand-in for a pull-to-refresh container */
export const createFakeRefreshLayout = (): FakeRefreshLayout => {
  const element = document.createElement("div");
  const history: boolean[] = [];
  let enabled = true;

  return {
    element,
    isRefreshLayout: true,
    history,
    isEnabled: () => enabled,
    setEnabled: (value) => {
      enabled = value;
      history.push(value);
    },
  };
};

/** Fire a mouse event on a target */
export const fireMouse = (
  target: EventTarget,
  type: "mousedown" | "mousemove" | "mouseup" | "click",
  clientY = 0,
): void => {
  target.dispatchEvent(
    new MouseEvent(type, { clientY, bubbles: true, cancelable: true }),
  );
};
