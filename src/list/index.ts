/**
 * fastscroll - List Domain
 * Virtualized list view, layout managers and the element pool
 */

export { createListView } from "./view";
export {
  createLinearLayoutManager,
  isLayoutManager,
  type LinearLayoutConfig,
  type LinearLayoutManager,
} from "./layout";
export { createElementPool, type ElementPool } from "./pool";
export type {
  ListAdapter,
  LayoutManager,
  ListView,
  ListViewEvents,
  Range,
} from "./types";
