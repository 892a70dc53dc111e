// src/adapters/react.ts
/**
 * fastscroll/react: thin React wrapper for FastScrollView
 *
 * Provides a `useFastScrollView` hook. The ref'd element becomes the
 * container's parent: the container is created and attached on mount, and
 * detached and destroyed on unmount.
 *
 * @packageDocumentation
 */

import { useRef, useEffect, useCallback, type MutableRefObject } from "react";
import { mountFastScrollView, syncBindings, type FastScrollMountOptions } from "./shared";
import type { FastScrollView } from "../view";

// =============================================================================
// Types
// =============================================================================

/** Options for useFastScrollView */
export type UseFastScrollViewOptions = FastScrollMountOptions;

/** Return value from the useFastScrollView hook */
export interface UseFastScrollViewReturn {
  /**
   * Ref to attach to the parent element.
   *
   * ```tsx
   * const { containerRef } = useFastScrollView({ adapter, layoutManager });
   * return <div ref={containerRef} style={{ height: 400 }} />;
   * ```
   */
  containerRef: MutableRefObject<HTMLDivElement | null>;

  /**
   * Ref holding the container. Populated after mount, `null` before.
   */
  viewRef: MutableRefObject<FastScrollView | null>;

  /** Stable helper returning the container (or null) */
  getView: () => FastScrollView | null;
}

// =============================================================================
// Hook
// =============================================================================

/**
 * React hook for FastScrollView integration.
 *
 * ```tsx
 * import { useFastScrollView } from 'fastscroll/react';
 *
 * function Contacts({ adapter, layoutManager }) {
 *   const { containerRef, getView } = useFastScrollView({
 *     adapter,
 *     layoutManager,
 *     attrs: { handleColor: '#e91e63', bubbleVisible: true },
 *   });
 *
 *   return (
 *     <div
 *       ref={containerRef}
 *       style={{ height: 400 }}
 *       onDoubleClick={() => getView()?.setTrackVisible(true)}
 *     />
 *   );
 * }
 * ```
 *
 * Attribute bag, style default and context are read once, on mount.
 * `adapter` and `layoutManager` are re-routed whenever they change by
 * reference.
 */
export function useFastScrollView(
  options: UseFastScrollViewOptions = {},
): UseFastScrollViewReturn {
  const containerRef = useRef<HTMLDivElement | null>(null);
  const viewRef = useRef<FastScrollView | null>(null);

  // Latest options for the mount effect, without re-running it
  const optionsRef = useRef(options);
  optionsRef.current = options;

  // --- Lifecycle: attach on mount, destroy on unmount ---
  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    const view = mountFastScrollView(container, optionsRef.current);
    viewRef.current = view;

    return () => {
      view.destroy();
      viewRef.current = null;
    };
  }, []);

  // --- Re-route bindings when they change ---
  useEffect(() => {
    const view = viewRef.current;
    if (!view) return;
    syncBindings(view, {
      adapter: options.adapter,
      layoutManager: options.layoutManager,
    });
  }, [options.adapter, options.layoutManager]);

  const getView = useCallback((): FastScrollView | null => {
    return viewRef.current;
  }, []);

  return {
    containerRef,
    viewRef,
    getView,
  };
}
