/**
 * fastscroll - Event Emitter Tests
 * Dispatch of the list view's scroll and layout events
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { createEmitter } from "../../src/events";
import type { ListViewEvents } from "../../src/list/types";

const layout = { contentSize: 4000, viewportSize: 400, itemCount: 100 };

afterEach(() => {
  vi.restoreAllMocks();
});

describe("dispatch", () => {
  it("should deliver a scroll payload to every scroll handler in order", () => {
    const emitter = createEmitter<ListViewEvents>();
    const calls: string[] = [];
    emitter.on("scroll", ({ offset }) => calls.push(`first:${offset}`));
    emitter.on("scroll", ({ direction }) => calls.push(`second:${direction}`));

    emitter.emit("scroll", { offset: 120, direction: "down" });

    expect(calls).toEqual(["first:120", "second:down"]);
  });

  it("should keep scroll and layout handlers apart", () => {
    const emitter = createEmitter<ListViewEvents>();
    const onScroll = vi.fn();
    const onLayout = vi.fn();
    emitter.on("scroll", onScroll);
    emitter.on("layout", onLayout);

    emitter.emit("layout", layout);

    expect(onLayout).toHaveBeenCalledWith(layout);
    expect(onScroll).not.toHaveBeenCalled();
  });

  it("should call a handler subscribed twice only once", () => {
    const emitter = createEmitter<ListViewEvents>();
    const onLayout = vi.fn();
    emitter.on("layout", onLayout);
    emitter.on("layout", onLayout);

    emitter.emit("layout", layout);

    expect(onLayout).toHaveBeenCalledTimes(1);
  });

  it("should do nothing for an event nobody listens to", () => {
    const emitter = createEmitter<ListViewEvents>();

    expect(() => emitter.emit("scroll", { offset: 0, direction: "up" })).not.toThrow();
  });
});

describe("unsubscribing", () => {
  it("should stop a handler through off or the returned function", () => {
    const emitter = createEmitter<ListViewEvents>();
    const viaOff = vi.fn();
    const viaReturn = vi.fn();
    emitter.on("scroll", viaOff);
    const unsubscribe = emitter.on("scroll", viaReturn);

    emitter.off("scroll", viaOff);
    unsubscribe();
    emitter.emit("scroll", { offset: 40, direction: "down" });

    expect(viaOff).not.toHaveBeenCalled();
    expect(viaReturn).not.toHaveBeenCalled();
  });

  it("should ignore off for a handler that was never added", () => {
    const emitter = createEmitter<ListViewEvents>();

    expect(() => emitter.off("layout", vi.fn())).not.toThrow();
  });

  it("should finish the current emit when a handler unsubscribes another", () => {
    const emitter = createEmitter<ListViewEvents>();
    const second = vi.fn();
    emitter.on("scroll", () => emitter.off("scroll", second));
    emitter.on("scroll", second);

    emitter.emit("scroll", { offset: 80, direction: "down" });
    emitter.emit("scroll", { offset: 0, direction: "up" });

    expect(second).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledWith({ offset: 80, direction: "down" });
  });

  it("should not call a handler added during an emit until the next one", () => {
    const emitter = createEmitter<ListViewEvents>();
    const late = vi.fn();
    emitter.on("layout", () => {
      emitter.on("layout", late);
    });

    emitter.emit("layout", layout);
    expect(late).not.toHaveBeenCalled();

    emitter.emit("layout", layout);
    expect(late).toHaveBeenCalledTimes(1);
  });

  it("should drop every handler on clear", () => {
    const emitter = createEmitter<ListViewEvents>();
    const onScroll = vi.fn();
    const onLayout = vi.fn();
    emitter.on("scroll", onScroll);
    emitter.on("layout", onLayout);

    emitter.clear();
    emitter.emit("scroll", { offset: 0, direction: "down" });
    emitter.emit("layout", layout);

    expect(onScroll).not.toHaveBeenCalled();
    expect(onLayout).not.toHaveBeenCalled();
  });
});

describe("error handling", () => {
  it("should log a throwing handler and keep calling the others", () => {
    const emitter = createEmitter<ListViewEvents>();
    const error = new Error("layout handler failed");
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    const after = vi.fn();
    emitter.on("layout", () => {
      throw error;
    });
    emitter.on("layout", after);

    expect(() => emitter.emit("layout", layout)).not.toThrow();
    expect(after).toHaveBeenCalledWith(layout);
    expect(consoleError).toHaveBeenCalledWith(
      '[fastscroll] Error in "layout" handler:',
      error,
    );
  });
});
