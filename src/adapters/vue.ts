// src/adapters/vue.ts
/**
 * fastscroll/vue: thin Vue 3 wrapper for FastScrollView
 *
 * Provides a `useFastScrollView` composable. The template ref'd element
 * becomes the container's parent: the container is created and attached on
 * mount, and detached and destroyed before unmount.
 *
 * @packageDocumentation
 */

import {
  ref,
  shallowRef,
  onMounted,
  onBeforeUnmount,
  watch,
  isRef,
  unref,
  type Ref,
  type ShallowRef,
} from "vue";
import { mountFastScrollView, syncBindings, type FastScrollMountOptions } from "./shared";
import type { FastScrollView } from "../view";

// =============================================================================
// Types
// =============================================================================

/** Options for useFastScrollView */
export type UseFastScrollViewOptions = FastScrollMountOptions;

/** Accepted options input: plain object or reactive ref */
export type UseFastScrollViewInput =
  | UseFastScrollViewOptions
  | Ref<UseFastScrollViewOptions>;

/** Return value from the useFastScrollView composable */
export interface UseFastScrollViewReturn {
  /**
   * Template ref to bind to the parent element.
   *
   * ```vue
   * <template>
   *   <div ref="containerRef" style="height: 400px" />
   * </template>
   * ```
   */
  containerRef: Ref<HTMLElement | null>;

  /** Shallow ref holding the container. Populated after mount. */
  view: ShallowRef<FastScrollView | null>;
}

// =============================================================================
// Composable
// =============================================================================

/**
 * Vue 3 composable for FastScrollView integration.
 *
 * ```vue
 * <script setup lang="ts">
 * import { computed } from 'vue';
 * import { useFastScrollView } from 'fastscroll/vue';
 *
 * const options = computed(() => ({ adapter: adapter.value, layoutManager }));
 * const { containerRef, view } = useFastScrollView(options);
 * </script>
 * ```
 *
 * With a reactive input, `adapter` and `layoutManager` are re-routed when
 * they change. Attribute bag, style default and context are read on mount.
 */
export function useFastScrollView(
  input: UseFastScrollViewInput = {},
): UseFastScrollViewReturn {
  const containerRef = ref<HTMLElement | null>(null);
  const view = shallowRef<FastScrollView | null>(null);

  onMounted(() => {
    const container = containerRef.value;
    if (!container) return;
    view.value = mountFastScrollView(container, unref(input));
  });

  onBeforeUnmount(() => {
    view.value?.destroy();
    view.value = null;
  });

  if (isRef(input)) {
    watch(
      () => [input.value.adapter, input.value.layoutManager] as const,
      ([adapter, layoutManager]) => {
        if (view.value) {
          syncBindings(view.value, { adapter, layoutManager });
        }
      },
    );
  }

  return {
    containerRef,
    view,
  };
}
