/**
 * fastscroll - Linear Layout Manager
 * Fixed-size items stacked along the vertical axis
 */

import type { LayoutManager } from "./types";
import { LOG_PREFIX } from "../constants";

/** Linear layout configuration */
export interface LinearLayoutConfig {
  /** Size of every item along the scroll axis, in pixels */
  itemSize: number;
}

/** Linear layout manager instance */
export interface LinearLayoutManager extends LayoutManager {
  readonly itemSize: number;
}

/**
 * Create a linear layout manager.
 * Throws when `itemSize` is not a positive finite number.
 */
export const createLinearLayoutManager = (
  config: LinearLayoutConfig,
): LinearLayoutManager => {
  const { itemSize } = config;

  if (typeof itemSize !== "number" || !Number.isFinite(itemSize) || itemSize <= 0) {
    throw new Error(`${LOG_PREFIX} itemSize must be a positive number`);
  }

  return {
    itemSize,
    getItemOffset: (position) => position * itemSize,
    getItemSize: () => itemSize,
    getTotalSize: (itemCount) => Math.max(0, itemCount) * itemSize,
    findPositionAtOffset: (offset, itemCount) => {
      if (itemCount <= 0) return 0;
      return Math.max(0, Math.min(Math.floor(offset / itemSize), itemCount - 1));
    },
  };
};

const LAYOUT_MANAGER_METHODS = [
  "getItemOffset",
  "getItemSize",
  "getTotalSize",
  "findPositionAtOffset",
] as const;

/**
 * Check that a value satisfies the LayoutManager contract.
 * Used to reject layout managers from untyped callers.
 */
export const isLayoutManager = (value: unknown): value is LayoutManager => {
  if (value === null || typeof value !== "object") return false;
  return LAYOUT_MANAGER_METHODS.every(
    (method) => typeof Reflect.get(value, method) === "function",
  );
};
