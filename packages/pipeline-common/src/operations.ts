import { OPERATION_KINDS, type OperationKind } from './types'

const OPERATION_ORDER = new Map<string, number>(OPERATION_KINDS.map((kind, index) => [kind, index]))

export const isOperationKind = (value: string): value is OperationKind => OPERATION_ORDER.has(value)

/** Sort comparator following the canonical Insert, Update, Read order. */
export const compareOperations = (a: OperationKind, b: OperationKind): number =>
  (OPERATION_ORDER.get(a) ?? 0) - (OPERATION_ORDER.get(b) ?? 0)

/**
 * Splits items into one bucket per operation kind, keeping input order inside each bucket.
 * Kinds without items are left out; buckets come back in canonical order.
 */
export const groupByOperation = <T extends { operation: OperationKind }>(
  items: readonly T[]
): Map<OperationKind, T[]> => {
  const buckets = new Map<OperationKind, T[]>()
  for (const kind of OPERATION_KINDS) {
    const matching = items.filter((item) => item.operation === kind)
    if (matching.length > 0) {
      buckets.set(kind, matching)
    }
  }
  return buckets
}
