import {
  ChangeRecord,
  Classification,
  DiffOutcome,
  MalformedSnapshotError,
  NewItemRecord,
  Snapshot,
} from '../contracts'
import { debugLog } from '../debug/debugLog'

const quantityOf = (snapshot: Snapshot, identifier: string): number => {
  const value = snapshot.get(identifier)
  if (value === undefined) {
    return 0
  }
  if (!Number.isInteger(value)) {
    throw new MalformedSnapshotError(identifier, value)
  }
  return value
}

/**
 * Same set of (identifier, quantity) pairs, regardless of insertion order.
 */
export function snapshotsEqual(before: Snapshot, after: Snapshot): boolean {
  if (before.size !== after.size) {
    return false
  }
  for (const [identifier, quantity] of before) {
    if (!after.has(identifier) || after.get(identifier) !== quantity) {
      return false
    }
  }
  return true
}

/**
 * Classify one identifier. The new-item rule is checked first, so an item
 * going from 0 to a positive quantity is new rather than changed. Items that
 * only exist in `before` are unchanged.
 */
export function classify(identifier: string, before: Snapshot, after: Snapshot): Classification {
  const oldQty = quantityOf(before, identifier)
  const newQty = quantityOf(after, identifier)

  if (!before.has(identifier) || (oldQty === 0 && newQty > 0)) {
    return { kind: 'new', record: { identifier, amount: newQty } }
  }

  if (after.has(identifier) && oldQty !== newQty) {
    return {
      kind: 'changed',
      record: { identifier, delta: newQty - oldQty, newTotal: newQty },
    }
  }

  return { kind: 'unchanged' }
}

export class InventoryDiffer {
  diff(before: Snapshot, after: Snapshot): DiffOutcome {
    if (snapshotsEqual(before, after)) {
      debugLog({ event: 'snapshots_identical', itemCount: before.size })
      return { identical: true }
    }

    const identifiers = [...new Set([...before.keys(), ...after.keys()])].sort()
    const changes: ChangeRecord[] = []
    const newItems: NewItemRecord[] = []

    for (const identifier of identifiers) {
      const classification = classify(identifier, before, after)
      switch (classification.kind) {
        case 'new':
          newItems.push(classification.record)
          break
        case 'changed':
          changes.push(classification.record)
          break
        case 'unchanged':
          break
      }
    }

    const totalChanged = changes.reduce((sum, change) => sum + change.delta, 0)

    debugLog({
      event: 'snapshots_compared',
      beforeCount: before.size,
      afterCount: after.size,
      changedCount: changes.length,
      newCount: newItems.length,
      totalChanged,
    })

    return {
      identical: false,
      result: {
        changes,
        newItems,
        totalChanged,
        totalNewCount: newItems.length,
      },
    }
  }
}
