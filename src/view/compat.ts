/**
 * fastscroll - Nested scrolling compatibility
 *
 * Platforms with native nested scrolling let the container enable it
 * directly. Older ones need the scroller to coordinate with a surrounding
 * refresh layout itself.
 */

import type { RefreshLayout } from "../scroller/types";
import type { ViewParent } from "./types";
import { isRefreshLayout } from "../scroller/capabilities";
import { FEATURE_LEVEL_NESTED_SCROLL } from "../constants";

/** What the container does about nested scrolling once attached */
export type CompatibilityAction =
  | { kind: "nested-scroll" }
  | { kind: "delegate-refresh"; refreshLayout: RefreshLayout }
  | { kind: "none" };

/**
 * Decide the compatibility action for a container attached to `parent`
 * on a platform at `featureLevel`.
 */
export const resolveCompatibilityAction = (
  featureLevel: number,
  parent: ViewParent | null,
): CompatibilityAction => {
  if (featureLevel >= FEATURE_LEVEL_NESTED_SCROLL) {
    return { kind: "nested-scroll" };
  }
  if (isRefreshLayout(parent)) {
    return { kind: "delegate-refresh", refreshLayout: parent };
  }
  return { kind: "none" };
};
