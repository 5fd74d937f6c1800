/**
 * Primary key values for a single item.
 *
 * The values are untyped text; the table definition supplies the wire
 * type of each (a numeric key is still written as its decimal string).
 */
export interface Key {
  readonly partitionKey: string;
  /** Required when the table has a sort key, rejected otherwise. */
  readonly sortKey?: string | undefined;
}
