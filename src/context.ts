/**
 * fastscroll - Platform Context
 * The handle every view is created from: document, feature level, class prefix
 */

import type { PlatformContext } from "./types";
import {
  DEFAULT_CLASS_PREFIX,
  FEATURE_LEVEL_CURRENT,
  LOG_PREFIX,
} from "./constants";

/** Options for createPlatformContext */
export interface PlatformContextOptions {
  /** Document to create elements in (default: global `document`) */
  document?: Document;

  /** Platform feature level (default: FEATURE_LEVEL_CURRENT) */
  featureLevel?: number;

  /** CSS class prefix (default: 'fastscroll') */
  classPrefix?: string;
}

/**
 * Create a platform context.
 * Throws when no document is available and none was passed.
 */
export const createPlatformContext = (
  options: PlatformContextOptions = {},
): PlatformContext => {
  const doc =
    options.document ??
    (typeof document !== "undefined" ? document : undefined);
  if (!doc) {
    throw new Error(`${LOG_PREFIX} A document is required to create views`);
  }

  const featureLevel = options.featureLevel ?? FEATURE_LEVEL_CURRENT;
  if (!Number.isInteger(featureLevel) || featureLevel < 0) {
    throw new Error(
      `${LOG_PREFIX} featureLevel must be a non-negative integer, got ${featureLevel}`,
    );
  }

  return {
    document: doc,
    featureLevel,
    classPrefix: options.classPrefix ?? DEFAULT_CLASS_PREFIX,
  };
};
