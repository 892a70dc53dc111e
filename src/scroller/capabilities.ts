/**
 * fastscroll - Capability checks
 * Structural tests for the optional contracts hosts may implement
 */

import type { RefreshLayout, SectionIndexer } from "./types";

/** Whether `value` implements the section-index capability */
export const isSectionIndexer = (value: unknown): value is SectionIndexer =>
  typeof value === "object" &&
  value !== null &&
  "getSectionText" in value &&
  typeof value.getSectionText === "function";

/** Whether `value` is a pull-to-refresh container */
export const isRefreshLayout = (value: unknown): value is RefreshLayout =>
  typeof value === "object" &&
  value !== null &&
  "isRefreshLayout" in value &&
  value.isRefreshLayout === true &&
  "setEnabled" in value &&
  typeof value.setEnabled === "function";
