/**
 * A value whose shape is described by the wire itself.
 *
 * Generic maps (extension envelope) are `Map`s; bare maps are structures and
 * become plain objects keyed by field name. 64-bit integer formats are
 * `bigint`, every other number is a `number`.
 */
export type Value =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | Value[]
  | Map<Value, Value>
  | { [field: string]: Value };
