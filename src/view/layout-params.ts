/**
 * fastscroll - Layout Params
 * Map match_parent / wrap_content / pixel sizes onto inline styles
 */

import type { Dimension, LayoutParams } from "../types";

/** Fill both axes of the parent */
export const MATCH_PARENT: Readonly<LayoutParams> = {
  width: "match_parent",
  height: "match_parent",
};

/** Fill the parent's width, size the height to the content */
export const MATCH_WIDTH_WRAP_HEIGHT: Readonly<LayoutParams> = {
  width: "match_parent",
  height: "wrap_content",
};

const toCss = (dimension: Dimension): string => {
  if (dimension === "match_parent") return "100%";
  if (dimension === "wrap_content") return "auto";
  return `${dimension}px`;
};

// wrap_content grows with the content but never past the parent
const toMaxCss = (dimension: Dimension): string =>
  dimension === "wrap_content" ? "100%" : "";

/** Apply layout params to an element's inline size */
export const applyLayoutParams = (
  element: HTMLElement,
  params: LayoutParams,
): void => {
  element.style.width = toCss(params.width);
  element.style.maxWidth = toMaxCss(params.width);
  element.style.height = toCss(params.height);
  element.style.maxHeight = toMaxCss(params.height);
};
