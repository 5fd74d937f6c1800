/**
 * The item model: one record as an ordered collection of attributes.
 */

import type { Attribute } from "../marshalling/types.js";

/**
 * An ordered, append-only collection of attributes.
 *
 * Attribute names are unique by convention; the item does not enforce it.
 * An item is not synchronized, so share one across async flows only if
 * nothing appends to it concurrently.
 */
export interface Item {
  /** Appends one attribute. Returns the same item for chaining. */
  readonly addAttribute: (attribute: Attribute) => Item;
  /** Appends attributes in iteration order. */
  readonly addAttributes: (attributes: Iterable<Attribute>) => Item;
  /**
   * Appends every value of a name-to-attribute mapping, following the
   * mapping's iteration order. Keys are ignored; each attribute carries
   * its own name.
   */
  readonly addAttributesFromMap: (
    attributes:
      | ReadonlyMap<string, Attribute>
      | Readonly<Record<string, Attribute>>,
  ) => Item;
  /** Snapshot of the attributes in insertion order. */
  readonly attributes: () => readonly Attribute[];
  /** The first attribute with the given name, if any. */
  readonly getAttribute: (name: string) => Attribute | undefined;
  /**
   * Sum of the UTF-8 byte lengths of scalar attribute values.
   *
   * Set-valued attributes count as zero. Used only for client-side limit
   * checks, never sent.
   */
  readonly size: () => number;
}
