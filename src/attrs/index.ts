/**
 * fastscroll - Style Attributes
 * Defaults, precedence and `data-*` parsing for the attribute bag
 */

import type { ResolvedStyleAttributes, StyleAttributes } from "../types";
import {
  DEFAULT_BUBBLE_COLOR,
  DEFAULT_BUBBLE_TEXT_COLOR,
  DEFAULT_BUBBLE_TEXT_SIZE,
  DEFAULT_HANDLE_COLOR,
  DEFAULT_OVERSCAN,
  DEFAULT_TRACK_COLOR,
  LOG_PREFIX,
} from "../constants";

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_STYLE_ATTRIBUTES: Readonly<ResolvedStyleAttributes> = {
  trackColor: DEFAULT_TRACK_COLOR,
  handleColor: DEFAULT_HANDLE_COLOR,
  bubbleColor: DEFAULT_BUBBLE_COLOR,
  bubbleTextColor: DEFAULT_BUBBLE_TEXT_COLOR,
  bubbleTextSize: DEFAULT_BUBBLE_TEXT_SIZE,
  hideScrollbar: true,
  trackVisible: false,
  bubbleVisible: true,
  bubbleAlwaysVisible: false,
  fastScrollEnabled: true,
  overscan: DEFAULT_OVERSCAN,
};

// =============================================================================
// Precedence
// =============================================================================

const STYLE_KEYS = [
  "trackColor",
  "handleColor",
  "bubbleColor",
  "bubbleTextColor",
  "bubbleTextSize",
  "hideScrollbar",
  "trackVisible",
  "bubbleVisible",
  "bubbleAlwaysVisible",
  "fastScrollEnabled",
  "overscan",
  "ariaLabel",
] as const satisfies readonly (keyof StyleAttributes)[];

const copyDefined = <K extends keyof StyleAttributes>(
  target: StyleAttributes,
  source: StyleAttributes,
  key: K,
): void => {
  const value = source[key];
  if (value !== undefined) target[key] = value;
};

/**
 * Resolve an attribute bag: library defaults, then `defStyle`, then `attrs`.
 * Undefined fields never erase a lower layer.
 */
export const resolveStyleAttributes = (
  attrs?: StyleAttributes | null,
  defStyle?: StyleAttributes | null,
): ResolvedStyleAttributes => {
  const merged: StyleAttributes = {};
  for (const layer of [defStyle, attrs]) {
    if (!layer) continue;
    for (const key of STYLE_KEYS) copyDefined(merged, layer, key);
  }
  return { ...DEFAULT_STYLE_ATTRIBUTES, ...merged };
};

// =============================================================================
// Parsing
// =============================================================================

type ColorKey = "trackColor" | "handleColor" | "bubbleColor" | "bubbleTextColor";
type BooleanKey =
  | "hideScrollbar"
  | "trackVisible"
  | "bubbleVisible"
  | "bubbleAlwaysVisible"
  | "fastScrollEnabled";
type NumberKey = "bubbleTextSize" | "overscan";

const COLOR_ATTRIBUTES: ReadonlyArray<readonly [ColorKey, string]> = [
  ["trackColor", "data-track-color"],
  ["handleColor", "data-handle-color"],
  ["bubbleColor", "data-bubble-color"],
  ["bubbleTextColor", "data-bubble-text-color"],
];

const BOOLEAN_ATTRIBUTES: ReadonlyArray<readonly [BooleanKey, string]> = [
  ["hideScrollbar", "data-hide-scrollbar"],
  ["trackVisible", "data-track-visible"],
  ["bubbleVisible", "data-bubble-visible"],
  ["bubbleAlwaysVisible", "data-bubble-always-visible"],
  ["fastScrollEnabled", "data-fast-scroll-enabled"],
];

const NUMBER_ATTRIBUTES: ReadonlyArray<readonly [NumberKey, string]> = [
  ["bubbleTextSize", "data-bubble-text-size"],
  ["overscan", "data-overscan"],
];

const parseBoolean = (value: string): boolean | undefined => {
  const normalized = value.trim().toLowerCase();
  if (normalized === "" || normalized === "true") return true;
  if (normalized === "false") return false;
  return undefined;
};

const parseNumber = (value: string): number | undefined => {
  const n = Number(value.trim());
  return value.trim() !== "" && Number.isFinite(n) && n >= 0 ? n : undefined;
};

/**
 * Read an attribute bag from an element's `data-*` attributes.
 *
 * ```html
 * <div data-handle-color="#e91e63" data-bubble-text-size="28" data-hide-scrollbar="false"></div>
 * ```
 *
 * A present but empty boolean attribute reads as `true`. Values that do not
 * parse are skipped with a warning.
 */
export const readStyleAttributes = (element: Element): StyleAttributes => {
  const attrs: StyleAttributes = {};

  for (const [key, name] of COLOR_ATTRIBUTES) {
    const value = element.getAttribute(name);
    if (value !== null && value.trim() !== "") {
      attrs[key] = value.trim();
    }
  }

  for (const [key, name] of BOOLEAN_ATTRIBUTES) {
    const value = element.getAttribute(name);
    if (value === null) continue;
    const parsed = parseBoolean(value);
    if (parsed === undefined) {
      console.warn(`${LOG_PREFIX} Ignoring ${name}="${value}": expected true or false`);
      continue;
    }
    attrs[key] = parsed;
  }

  for (const [key, name] of NUMBER_ATTRIBUTES) {
    const value = element.getAttribute(name);
    if (value === null) continue;
    const parsed = parseNumber(value);
    if (parsed === undefined) {
      console.warn(`${LOG_PREFIX} Ignoring ${name}="${value}": expected a non-negative number`);
      continue;
    }
    attrs[key] = parsed;
  }

  const ariaLabel = element.getAttribute("aria-label");
  if (ariaLabel) attrs.ariaLabel = ariaLabel;

  return attrs;
};
