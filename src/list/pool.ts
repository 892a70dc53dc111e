/**
 * fastscroll - Element Pool
 * Recycling pool for item elements to reduce allocation during scrolling.
 */

import { DEFAULT_POOL_SIZE } from "../constants";

export const createElementPool = (doc: Document, maxSize = DEFAULT_POOL_SIZE) => {
  const pool: HTMLElement[] = [];

  return {
    acquire: (): HTMLElement => {
      const el = pool.pop();
      if (el) return el;
      const newEl = doc.createElement("div");
      newEl.setAttribute("role", "listitem");
      return newEl;
    },
    release: (el: HTMLElement): void => {
      if (pool.length < maxSize) {
        el.className = "";
        el.textContent = "";
        el.removeAttribute("style");
        el.removeAttribute("data-position");
        pool.push(el);
      }
    },
    size: (): number => pool.length,
    clear: (): void => {
      pool.length = 0;
    },
  };
};

export type ElementPool = ReturnType<typeof createElementPool>;
