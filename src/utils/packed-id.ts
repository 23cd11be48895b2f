/**
 * a packed 52 bit number containing a slot index and sequence number
 * bits 1-32: slot index (32 bits)
 * bits 33-52: sequence number (20 bits)
 **/
export type PackedId = number;

const INDEX_BITS = 32;
const SEQUENCE_BITS = 20;

const INDEX_MASK = 0xffffffff;
export const SEQUENCE_MASK = (1 << SEQUENCE_BITS) - 1;

const SEQUENCE_SHIFT = INDEX_BITS;

/** serializes a slot index and sequence number into a packed id */
export const serId = (index: number, sequence: number): PackedId => {
    const i = index & INDEX_MASK;
    const s = sequence & SEQUENCE_MASK;

    return (i >>> 0) + s * 2 ** SEQUENCE_SHIFT;
};

/** deserializes the slot index from a packed id */
export const getIdIndex = (id: PackedId): number => {
    return id % 2 ** SEQUENCE_SHIFT;
};

/** deserializes the sequence number from a packed id */
export const getIdSequence = (id: PackedId): number => {
    return Math.floor(id / 2 ** SEQUENCE_SHIFT) & SEQUENCE_MASK;
};

/** an invalid id */
export const INVALID_ID: PackedId = -1;

/** anything stored in slots */
export type SlotItem = {
    id: PackedId;
    index: number;
    sequence: number;
    pooled: boolean;
};

/** pooled slots addressed by packed ids, stale ids are detected through the sequence number */
export type Slots<T extends SlotItem> = {
    /** every slot ever allocated */
    pool: T[];
    /** indices of pooled slots, reused before the pool grows */
    freeIndices: number[];
    /** sequence number handed to the next allocation */
    nextSequence: number;
};

export function createSlots<T extends SlotItem>(): Slots<T> {
    return {
        pool: [],
        freeIndices: [],
        nextSequence: 0,
    };
}

/** takes a slot from the free list or grows the pool, then stamps its id */
export function allocateSlot<T extends SlotItem>(
    slots: Slots<T>,
    make: () => T,
): T {
    const sequence = slots.nextSequence;
    slots.nextSequence = (slots.nextSequence + 1) & SEQUENCE_MASK;

    let index: number;
    let item: T;
    const freeIndex = slots.freeIndices.pop();
    if (freeIndex !== undefined) {
        index = freeIndex;
        item = slots.pool[index];
    } else {
        index = slots.pool.length;
        item = make();
        slots.pool.push(item);
    }

    item.id = serId(index, sequence);
    item.index = index;
    item.sequence = sequence;
    item.pooled = false;

    return item;
}

/** returns the slot for a live id, undefined for stale or unknown ids */
export function getSlot<T extends SlotItem>(
    slots: Slots<T>,
    id: PackedId,
): T | undefined {
    if (!Number.isInteger(id) || id < 0) {
        return undefined;
    }

    const index = getIdIndex(id);
    if (index >= slots.pool.length) {
        return undefined;
    }

    const item = slots.pool[index];
    if (item.pooled) {
        return undefined;
    }

    // check sequence matches to catch stale references
    if (item.sequence !== getIdSequence(id)) {
        return undefined;
    }

    return item;
}

/** returns the slot to the free list, false if it was already free */
export function releaseSlot<T extends SlotItem>(
    slots: Slots<T>,
    item: T,
): boolean {
    if (item.pooled) {
        return false;
    }
    item.pooled = true;
    slots.freeIndices.push(item.index);
    return true;
}

export function* iterateSlots<T extends SlotItem>(
    slots: Slots<T>,
): Generator<T> {
    for (const item of slots.pool) {
        if (!item.pooled) {
            yield item;
        }
    }
}
