/**
 * fastscroll adapters: shared mount logic
 *
 * Every framework wrapper does the same thing at mount time: build a
 * container in the host element's document, route the adapter and layout
 * manager, and attach it. Only the lifecycle hooks differ.
 */

import { createPlatformContext, type PlatformContextOptions } from "../context";
import { createFastScrollView } from "../view";
import type { FastScrollView, FastScrollViewOptions } from "../view";

/** Options accepted by every framework adapter */
export interface FastScrollMountOptions extends FastScrollViewOptions {
  /** Platform context options; the document defaults to the host element's */
  context?: Omit<PlatformContextOptions, "document">;
}

/**
 * Route adapter and layout manager into the container when they differ from
 * what it holds. The layout manager goes first so the adapter's first render
 * can lay out.
 */
export const syncBindings = (
  view: FastScrollView,
  options: FastScrollViewOptions,
): void => {
  const layoutManager = options.layoutManager ?? null;
  if (view.layoutManager !== layoutManager) {
    view.setLayoutManager(layoutManager);
  }

  const adapter = options.adapter ?? null;
  if (view.adapter !== adapter) {
    view.setAdapter(adapter);
  }
};

/** Create a container for `host`, bind its slots and attach it to `host` */
export const mountFastScrollView = (
  host: HTMLElement,
  options: FastScrollMountOptions,
): FastScrollView => {
  const context = createPlatformContext({
    ...options.context,
    document: host.ownerDocument,
  });
  const view = createFastScrollView(context, options.attrs, options.defStyle);
  syncBindings(view, options);
  view.attach(host);
  return view;
};
