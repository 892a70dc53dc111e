/**
 * fastscroll - Fast Scroller Tests
 * Binding, section text, drag, refresh coordination, auto-hide and style
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createFastScroller } from "../../src/scroller/scroller";
import { isRefreshLayout, isSectionIndexer } from "../../src/scroller/capabilities";
import { createListView } from "../../src/list/view";
import { createLinearLayoutManager } from "../../src/list/layout";
import { createPlatformContext } from "../../src/context";
import type { ListView } from "../../src/list/types";
import type { FastScroller } from "../../src/scroller/types";
import type { StyleAttributes } from "../../src/types";
import {
  createFakeRefreshLayout,
  createLetterAdapter,
  createPlainAdapter,
  fireMouse,
  mockViewportMetrics,
} from "../helpers";

// =============================================================================
// Test Utilities
// =============================================================================

let host: HTMLElement;
let list: ListView;
let scroller: FastScroller;

/** 130 lettered items of 40px in a 400px viewport placed in `host` */
const createPlacedList = (itemCount?: number): ListView => {
  const created = createListView(createPlatformContext());
  mockViewportMetrics(created.viewport, 400);
  created.setLayoutManager(createLinearLayoutManager({ itemSize: 40 }));
  created.setAdapter(itemCount === undefined ? createLetterAdapter() : createPlainAdapter(itemCount));
  host.appendChild(created.element);
  return created;
};

const setup = (attrs?: StyleAttributes): void => {
  list = createPlacedList();
  scroller = createFastScroller(createPlatformContext(), attrs);
  scroller.setSectionIndexer(createLetterAdapter());
};

const part = (name: "track" | "handle" | "bubble"): HTMLElement => {
  const el = scroller.element.querySelector<HTMLElement>(`.fastscroll-fastscroller-${name}`);
  if (!el) throw new Error(`${name} element missing`);
  return el;
};

const createListener = () => ({
  onFastScrollStart: vi.fn(),
  onFastScrollStop: vi.fn(),
});

beforeEach(() => {
  host = document.createElement("div");
  document.body.appendChild(host);
});

afterEach(() => {
  scroller?.destroy();
  list?.destroy();
  host.remove();
  vi.useRealTimers();
  vi.restoreAllMocks();
});

// =============================================================================
// Capabilities
// =============================================================================

describe("capabilities", () => {
  it("should detect the section-index capability", () => {
    expect(isSectionIndexer(createLetterAdapter())).toBe(true);
    expect(isSectionIndexer(createPlainAdapter(3))).toBe(false);
    expect(isSectionIndexer({ getSectionText: "A" })).toBe(false);
    expect(isSectionIndexer(null)).toBe(false);
  });

  it("should detect a refresh layout", () => {
    expect(isRefreshLayout(createFakeRefreshLayout())).toBe(true);
    expect(isRefreshLayout(document.createElement("div"))).toBe(false);
    expect(isRefreshLayout({ isRefreshLayout: true })).toBe(false);
    expect(isRefreshLayout(undefined)).toBe(false);
  });
});

// =============================================================================
// Binding
// =============================================================================

describe("binding", () => {
  beforeEach(() => setup());

  it("should start unbound and hidden", () => {
    expect(scroller.isBound()).toBe(false);
    expect(scroller.getListView()).toBeNull();
    expect(scroller.element.style.display).toBe("none");
    expect(scroller.element.parentElement).toBeNull();
  });

  it("should place its root beside the list", () => {
    scroller.attachListView(list);

    expect(scroller.isBound()).toBe(true);
    expect(scroller.getListView()).toBe(list);
    expect(list.element.nextElementSibling).toBe(scroller.element);
    expect(scroller.element.style.display).toBe("");
  });

  it("should size the handle to the visible share of the content", () => {
    scroller.attachListView(list);

    // 400 / 5200 * 400
    expect(parseFloat(part("handle").style.height)).toBeCloseTo(30.77, 2);
  });

  it("should keep the minimum handle size for long lists", () => {
    list.setAdapter(createPlainAdapter(10000));
    scroller.attachListView(list);

    expect(part("handle").style.height).toBe("30px");
  });

  it("should stay hidden for a list that does not scroll", () => {
    list.setAdapter(createPlainAdapter(5));
    scroller.attachListView(list);

    expect(scroller.element.style.display).toBe("none");
  });

  it("should throw for a list without a parent", () => {
    const loose = createListView(createPlatformContext());

    expect(() => scroller.attachListView(loose)).toThrow(
      "[fastscroll] The list view must be placed in a parent element before a fast scroller can attach to it",
    );
    expect(scroller.isBound()).toBe(false);
    loose.destroy();
  });

  it("should ignore a second bind to the same list", () => {
    scroller.attachListView(list);
    scroller.attachListView(list);

    expect(host.querySelectorAll(".fastscroll-fastscroller").length).toBe(1);
  });

  it("should move to another list", () => {
    const other = createPlacedList();
    scroller.attachListView(list);

    scroller.attachListView(other);

    expect(scroller.getListView()).toBe(other);
    expect(other.element.nextElementSibling).toBe(scroller.element);
    expect(list.element.nextElementSibling).toBe(other.element);
    other.destroy();
  });

  it("should leave the list's parent on unbind", () => {
    scroller.attachListView(list);

    scroller.detachListView();

    expect(scroller.isBound()).toBe(false);
    expect(scroller.element.parentElement).toBeNull();
    expect(list.element.nextElementSibling).toBeNull();
  });

  it("should treat unbind while unbound as a no-op", () => {
    expect(() => scroller.detachListView()).not.toThrow();
    expect(scroller.isBound()).toBe(false);
  });

  it("should follow list layout changes", () => {
    scroller.attachListView(list);

    list.setAdapter(createPlainAdapter(5));
    expect(scroller.element.style.display).toBe("none");

    list.setAdapter(createLetterAdapter());
    expect(scroller.element.style.display).toBe("");
  });
});

// =============================================================================
// Section text
// =============================================================================

describe("section text", () => {
  beforeEach(() => setup());

  it("should be null while unbound", () => {
    expect(scroller.getSectionText(0)).toBeNull();
  });

  it("should be null without a section indexer", () => {
    scroller.attachListView(list);
    scroller.setSectionIndexer(null);

    expect(scroller.getSectionIndexer()).toBeNull();
    expect(scroller.getSectionText(0)).toBeNull();
  });

  it("should ask the indexer for positions in the list", () => {
    scroller.attachListView(list);

    expect(scroller.getSectionText(0)).toBe("A");
    expect(scroller.getSectionText(12)).toBe("C");
    expect(scroller.getSectionText(129)).toBe("Z");
  });

  it("should be null outside the list", () => {
    scroller.attachListView(list);

    expect(scroller.getSectionText(-1)).toBeNull();
    expect(scroller.getSectionText(130)).toBeNull();
    expect(scroller.getSectionText(1.5)).toBeNull();
  });
});

// =============================================================================
// Drag
// =============================================================================

describe("drag", () => {
  beforeEach(() => {
    setup();
    scroller.attachListView(list);
  });

  it("should scroll the list proportionally and show the section bubble", () => {
    const listener = createListener();
    scroller.setFastScrollListener(listener);

    fireMouse(part("handle"), "mousedown", 0);

    expect(scroller.isDragging()).toBe(true);
    expect(scroller.element.classList.contains("fastscroll-fastscroller--dragging")).toBe(true);
    expect(listener.onFastScrollStart).toHaveBeenCalledWith(scroller);

    fireMouse(document, "mousemove", 1000);

    expect(part("bubble").textContent).toBe("Z");
    expect(part("bubble").classList.contains("fastscroll-fastscroller-bubble--visible")).toBe(true);

    fireMouse(document, "mouseup", 1000);

    expect(list.getScrollOffset()).toBe(4800);
    expect(scroller.isDragging()).toBe(false);
    expect(part("bubble").classList.contains("fastscroll-fastscroller-bubble--visible")).toBe(false);
    expect(listener.onFastScrollStop).toHaveBeenCalledTimes(1);
    expect(listener.onFastScrollStop).toHaveBeenCalledWith(scroller);
  });

  it("should stop following the pointer after release", () => {
    fireMouse(part("handle"), "mousedown", 0);
    fireMouse(document, "mouseup", 0);

    fireMouse(document, "mousemove", 1000);

    expect(list.getScrollOffset()).toBe(0);
  });

  it("should ignore drags while disabled", () => {
    const listener = createListener();
    scroller.setFastScrollListener(listener);
    scroller.setEnabled(false);

    fireMouse(part("handle"), "mousedown", 0);

    expect(scroller.isEnabled()).toBe(false);
    expect(scroller.isDragging()).toBe(false);
    expect(scroller.element.style.display).toBe("none");
    expect(listener.onFastScrollStart).not.toHaveBeenCalled();
  });

  it("should end the drag when disabled mid-drag", () => {
    const listener = createListener();
    scroller.setFastScrollListener(listener);
    fireMouse(part("handle"), "mousedown", 0);

    scroller.setEnabled(false);

    expect(scroller.isDragging()).toBe(false);
    expect(listener.onFastScrollStop).toHaveBeenCalledTimes(1);
  });

  it("should release the drag silently on unbind", () => {
    const listener = createListener();
    scroller.setFastScrollListener(listener);
    fireMouse(part("handle"), "mousedown", 0);

    scroller.detachListView();

    expect(scroller.isDragging()).toBe(false);
    expect(listener.onFastScrollStop).not.toHaveBeenCalled();
  });

  it("should jump when the track is clicked", () => {
    // jsdom reports a zero rect, so clientY is the offset into the track
    fireMouse(part("track"), "click", 200);

    expect(list.getScrollOffset()).toBeCloseTo(2400, 5);
  });
});

// =============================================================================
// Refresh layout
// =============================================================================

describe("refresh layout", () => {
  beforeEach(() => {
    setup();
    scroller.attachListView(list);
  });

  it("should be disabled for the duration of a drag", () => {
    const refresh = createFakeRefreshLayout();
    scroller.setRefreshLayout(refresh);

    fireMouse(part("handle"), "mousedown", 0);
    expect(refresh.history).toEqual([false]);

    fireMouse(document, "mouseup", 0);
    expect(refresh.history).toEqual([false, true]);
    expect(scroller.getRefreshLayout()).toBe(refresh);
  });

  it("should stay disabled when it was disabled before the drag", () => {
    const refresh = createFakeRefreshLayout();
    refresh.setEnabled(false);
    scroller.setRefreshLayout(refresh);

    fireMouse(part("handle"), "mousedown", 0);
    fireMouse(document, "mouseup", 0);

    expect(refresh.history).toEqual([false]);
  });

  it("should be re-enabled when the scroller unbinds mid-drag", () => {
    const refresh = createFakeRefreshLayout();
    scroller.setRefreshLayout(refresh);
    fireMouse(part("handle"), "mousedown", 0);

    scroller.detachListView();

    expect(refresh.history).toEqual([false, true]);
  });

  it("should hand the drag over when replaced mid-drag", () => {
    const first = createFakeRefreshLayout();
    const second = createFakeRefreshLayout();
    scroller.setRefreshLayout(first);
    fireMouse(part("handle"), "mousedown", 0);

    scroller.setRefreshLayout(second);
    fireMouse(document, "mouseup", 0);

    expect(first.history).toEqual([false, true]);
    expect(second.history).toEqual([false, true]);
  });
});

// =============================================================================
// Visibility
// =============================================================================

describe("visibility", () => {
  it("should hide after the list stops scrolling", () => {
    vi.useFakeTimers();
    setup();
    scroller.attachListView(list);

    list.scrollTo(400);
    expect(scroller.isVisible()).toBe(true);
    expect(scroller.element.classList.contains("fastscroll-fastscroller--visible")).toBe(true);

    vi.advanceTimersByTime(999);
    expect(scroller.isVisible()).toBe(true);

    vi.advanceTimersByTime(1);
    expect(scroller.isVisible()).toBe(false);
    expect(scroller.element.classList.contains("fastscroll-fastscroller--visible")).toBe(false);
  });

  it("should stay visible when auto-hide is off", () => {
    vi.useFakeTimers();
    setup({ hideScrollbar: false });
    scroller.attachListView(list);

    expect(scroller.isVisible()).toBe(true);

    list.scrollTo(400);
    vi.advanceTimersByTime(5000);

    expect(scroller.isVisible()).toBe(true);
  });

  it("should switch auto-hide at runtime", () => {
    setup();
    scroller.attachListView(list);
    expect(scroller.isVisible()).toBe(false);

    scroller.setHideScrollbar(false);

    expect(scroller.isVisible()).toBe(true);
  });

  it("should show the bubble with the scroller when always visible", () => {
    setup();
    scroller.attachListView(list);
    scroller.setBubbleVisible(true, true);

    // 400 / 4800 of 130 items is position 10, in section "C"
    list.scrollTo(400);

    expect(part("bubble").textContent).toBe("C");
    expect(part("bubble").classList.contains("fastscroll-fastscroller-bubble--visible")).toBe(true);
  });

  it("should never show a hidden bubble", () => {
    setup();
    scroller.attachListView(list);
    scroller.setBubbleVisible(false);

    fireMouse(part("handle"), "mousedown", 0);
    fireMouse(document, "mousemove", 100);

    expect(part("bubble").classList.contains("fastscroll-fastscroller-bubble--visible")).toBe(false);
    fireMouse(document, "mouseup", 100);
  });
});

// =============================================================================
// Style
// =============================================================================

describe("style", () => {
  it("should apply defaults", () => {
    setup();

    expect(part("handle").style.backgroundColor).toBe("rgb(117, 117, 117)");
    expect(part("bubble").style.color).toBe("rgb(255, 255, 255)");
    expect(part("bubble").style.fontSize).toBe("32px");
    expect(part("track").style.backgroundColor).toBe("transparent");
  });

  it("should apply the attribute bag", () => {
    setup({ trackVisible: true, trackColor: "#0000ff", bubbleTextSize: 18 });

    expect(part("track").style.backgroundColor).toBe("rgb(0, 0, 255)");
    expect(part("bubble").style.fontSize).toBe("18px");
  });

  it("should only paint the track while it is visible", () => {
    setup();

    scroller.setTrackColor("#ff0000");
    expect(part("track").style.backgroundColor).toBe("transparent");

    scroller.setTrackVisible(true);
    expect(part("track").style.backgroundColor).toBe("rgb(255, 0, 0)");

    scroller.setTrackVisible(false);
    expect(part("track").style.backgroundColor).toBe("transparent");
  });

  it("should apply handle and bubble setters", () => {
    setup();

    scroller.setHandleColor("#00ff00");
    scroller.setBubbleColor("#0000ff");
    scroller.setBubbleTextColor("#000000");
    scroller.setBubbleTextSize(24);

    expect(part("handle").style.backgroundColor).toBe("rgb(0, 255, 0)");
    expect(part("bubble").style.backgroundColor).toBe("rgb(0, 0, 255)");
    expect(part("bubble").style.color).toBe("rgb(0, 0, 0)");
    expect(part("bubble").style.fontSize).toBe("24px");
  });
});

// =============================================================================
// Destroy
// =============================================================================

describe("destroy", () => {
  it("should unbind, remove its root and forget collaborators", () => {
    setup();
    scroller.attachListView(list);
    scroller.setFastScrollListener(createListener());

    scroller.destroy();

    expect(scroller.isBound()).toBe(false);
    expect(scroller.element.parentElement).toBeNull();
    expect(scroller.getFastScrollListener()).toBeNull();
    expect(scroller.getSectionIndexer()).toBeNull();
  });

  it("should not bind again once destroyed", () => {
    setup();
    scroller.destroy();

    scroller.attachListView(list);

    expect(scroller.isBound()).toBe(false);
  });
});
