import type { ProbeShape } from './backend';

/**
 * Engine shapes built from probe shapes, keyed by probe geometry.
 * Holds at most `capacity` entries, the least recently used one is evicted first.
 */
export type ShapeCache<T> = {
    capacity: number;
    entries: Map<string, T>;
    build: (shape: ProbeShape) => T;
};

/** creates a cache holding up to `capacity` shapes */
export function create<T>(build: (shape: ProbeShape) => T, capacity = 8): ShapeCache<T> {
    return {
        capacity: Math.max(1, Math.floor(capacity)),
        entries: new Map(),
        build,
    };
}

function getKey(shape: ProbeShape): string {
    return `${shape.type}:${shape.halfHeight}:${shape.radius}`;
}

/** returns the engine shape for a probe shape, building it on a miss */
export function get<T>(cache: ShapeCache<T>, shape: ProbeShape): T {
    const key = getKey(shape);
    const cached = cache.entries.get(key);
    if (cached !== undefined) {
        // maps iterate in insertion order, re-inserting marks the entry as most recent
        cache.entries.delete(key);
        cache.entries.set(key, cached);
        return cached;
    }

    const value = cache.build(shape);
    cache.entries.set(key, value);

    while (cache.entries.size > cache.capacity) {
        const oldest = cache.entries.keys().next();
        if (oldest.done) break;
        cache.entries.delete(oldest.value);
    }

    return value;
}

export function size<T>(cache: ShapeCache<T>): number {
    return cache.entries.size;
}
