/**
 * Remote Object Normalizer
 *
 * Flattens a parsed OpenNebula element into a lower-cased string map.
 */

import type { FlatAttributes, RawObject } from './types.js';
import { isRawObject } from './types.js';

/**
 * Key fast-xml-parser (and other XML-to-object converters) use for the text
 * content of an element that also has children or attributes.
 */
export const TEXT_NODE_KEY = '#text';

/**
 * Flatten a raw element.
 *
 * - `#text` keys are skipped
 * - non-empty string values are kept under the lower-cased key
 * - nested elements are flattened into the same output, in document order,
 *   so a later key overwrites an earlier one
 * - empty strings, lists and anything else are dropped
 *
 * @param raw - Parsed element
 * @returns Flat attribute map
 */
export function normalize(raw: RawObject): FlatAttributes {
  const result: FlatAttributes = {};
  collect(raw, result);
  return result;
}

function collect(raw: RawObject, into: FlatAttributes): void {
  for (const [key, value] of Object.entries(raw)) {
    if (key === TEXT_NODE_KEY) {
      continue;
    }

    if (typeof value === 'string') {
      if (value.length > 0) {
        into[key.toLowerCase()] = value;
      }
    } else if (isRawObject(value)) {
      collect(value, into);
    }
  }
}
