// src/adapters/svelte.ts
/**
 * fastscroll/svelte: thin Svelte wrapper for FastScrollView
 *
 * Provides a `fastScrollView` action. The element the action is bound to
 * becomes the container's parent: the container attaches when the element
 * mounts, and detaches and is destroyed when it unmounts.
 *
 * Works with both Svelte 4 and Svelte 5 (actions are framework-stable).
 * No Svelte imports needed; actions are plain functions.
 *
 * @packageDocumentation
 */

import { mountFastScrollView, syncBindings, type FastScrollMountOptions } from "./shared";
import type { FastScrollView } from "../view";

// =============================================================================
// Types
// =============================================================================

/**
 * Callback invoked once the container is attached.
 * Use this to call style setters or store a reference.
 */
export type OnInstanceCallback = (instance: FastScrollView) => void;

/** Full options passed to the fastScrollView action */
export interface FastScrollViewActionOptions extends FastScrollMountOptions {
  /**
   * Called once the container is attached (on mount), and again on every
   * update with the same instance.
   *
   * ```svelte
   * <div use:fastScrollView={{ adapter, layoutManager, onInstance: (v) => (view = v) }} />
   * <button on:click={() => view?.setHandleColor('#e91e63')}>Pink</button>
   * ```
   */
  onInstance?: OnInstanceCallback;
}

/** Svelte action return type */
export interface FastScrollViewActionReturn {
  /** Called by Svelte when the action parameter changes */
  update?: (newOptions: FastScrollViewActionOptions) => void;

  /** Called by Svelte when the element is removed from the DOM */
  destroy?: () => void;
}

// =============================================================================
// Action
// =============================================================================

/**
 * Svelte action for FastScrollView integration.
 *
 * ```svelte
 * <script>
 *   import { fastScrollView } from 'fastscroll/svelte';
 *   import { createLinearLayoutManager } from 'fastscroll';
 *
 *   const layoutManager = createLinearLayoutManager({ itemSize: 48 });
 *   const adapter = {
 *     getItemCount: () => names.length,
 *     bindView: (el, i) => { el.textContent = names[i]; },
 *     getSectionText: (i) => names[i].charAt(0),
 *   };
 * </script>
 *
 * <div use:fastScrollView={{ adapter, layoutManager }} style="height: 400px" />
 * ```
 *
 * Attribute bag, style default and context are read once, on mount.
 * Updates only re-route the adapter and layout manager.
 *
 * @param node - The DOM element Svelte binds the action to
 * @param options - Bindings and callbacks
 * @returns Action lifecycle object (update + destroy)
 */
export function fastScrollView(
  node: HTMLElement,
  options: FastScrollViewActionOptions = {},
): FastScrollViewActionReturn {
  const instance = mountFastScrollView(node, options);

  options.onInstance?.(instance);

  return {
    update(newOptions: FastScrollViewActionOptions) {
      syncBindings(instance, newOptions);
      newOptions.onInstance?.(instance);
    },

    destroy() {
      instance.destroy();
    },
  };
}
