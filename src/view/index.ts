/**
 * fastscroll - View Domain
 * The composite container and the view tree pieces it is built from
 */

export { createFastScrollView } from "./fastscroll-view";
export { createViewGroup, setViewId, findViewById, type ViewGroupOptions } from "./group";
export {
  resolveCompatibilityAction,
  type CompatibilityAction,
} from "./compat";
export {
  applyLayoutParams,
  MATCH_PARENT,
  MATCH_WIDTH_WRAP_HEIGHT,
} from "./layout-params";
export type {
  FastScrollView,
  FastScrollViewOptions,
  ViewGroup,
  ViewParent,
} from "./types";
