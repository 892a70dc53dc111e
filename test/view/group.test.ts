/**
 * fastscroll - View Group Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createViewGroup, findViewById, setViewId } from "../../src/view/group";
import { applyLayoutParams, MATCH_PARENT } from "../../src/view/layout-params";
import { createPlatformContext } from "../../src/context";
import type { View } from "../../src/types";
import type { ViewGroup } from "../../src/view/types";
import { createFakeRefreshLayout } from "../helpers";

const createChild = (): View => {
  const element = document.createElement("div");
  return {
    element,
    get id() {
      return element.getAttribute("data-view-id");
    },
  };
};

let group: ViewGroup;
let host: HTMLElement;

beforeEach(() => {
  group = createViewGroup(createPlatformContext(), { className: "test-group" });
  host = document.createElement("div");
});

describe("children", () => {
  it("should append children in order and size them", () => {
    const a = createChild();
    const b = createChild();

    group.addView(a, MATCH_PARENT);
    group.addView(b);

    expect(group.childCount).toBe(2);
    expect(group.getChildAt(0)).toBe(a);
    expect(group.getChildAt(1)).toBe(b);
    expect(group.getChildAt(2)).toBeNull();
    expect(group.element.firstElementChild).toBe(a.element);
    expect(a.element.style.width).toBe("100%");
    expect(a.element.style.height).toBe("100%");
    expect(b.element.style.width).toBe("");
  });

  it("should reject a child added twice", () => {
    const a = createChild();
    group.addView(a);

    expect(() => group.addView(a)).toThrow("[fastscroll] View is already a child of this group");
  });

  it("should remove every child", () => {
    group.addView(createChild());
    group.addView(createChild());

    group.removeAllViews();

    expect(group.childCount).toBe(0);
    expect(group.element.children.length).toBe(0);
  });
});

describe("attach / detach", () => {
  it("should insert and remove the root", () => {
    expect(group.element.className).toBe("test-group");
    expect(group.element.style.position).toBe("relative");
    expect(group.element.style.display).toBe("flex");

    group.attach(host);
    expect(group.state).toBe("attached");
    expect(group.parent).toBe(host);
    expect(host.firstElementChild).toBe(group.element);

    group.detach();
    expect(group.state).toBe("detached");
    expect(group.parent).toBeNull();
    expect(host.children.length).toBe(0);
  });

  it("should attach into a refresh layout's element", () => {
    const refresh = createFakeRefreshLayout();

    group.attach(refresh);

    expect(group.parent).toBe(refresh);
    expect(group.element.parentElement).toBe(refresh.element);
  });

  it("should reject attach while attached and detach while detached", () => {
    expect(() => group.detach()).toThrow("[fastscroll] View is not attached");

    group.attach(host);

    expect(() => group.attach(host)).toThrow("[fastscroll] View is already attached");
  });
});

describe("layout params", () => {
  it("should apply params to the root", () => {
    group.layoutParams = { width: 320, height: "wrap_content" };

    expect(group.layoutParams).toEqual({ width: 320, height: "wrap_content" });
    expect(group.element.style.width).toBe("320px");
    expect(group.element.style.height).toBe("auto");
    expect(group.element.style.maxHeight).toBe("100%");
  });

  it("should drop the wrap_content bound when params change", () => {
    group.layoutParams = { width: "match_parent", height: "wrap_content" };
    group.layoutParams = MATCH_PARENT;

    expect(group.element.style.height).toBe("100%");
    expect(group.element.style.maxHeight).toBe("");
  });

  it("should map each dimension to css", () => {
    const element = document.createElement("div");

    applyLayoutParams(element, { width: "wrap_content", height: 48 });

    expect(element.style.width).toBe("auto");
    expect(element.style.maxWidth).toBe("100%");
    expect(element.style.height).toBe("48px");
    expect(element.style.maxHeight).toBe("");
  });
});

describe("view ids", () => {
  it("should find a child by its id", () => {
    const child = createChild();
    setViewId(child, "recycler_view");
    group.addView(child);

    expect(child.id).toBe("recycler_view");
    expect(findViewById(group.element, "recycler_view")).toBe(child.element);
    expect(findViewById(group.element, "fast_scroller")).toBeNull();
  });
});
