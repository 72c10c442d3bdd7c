import z from 'zod';

import { ModelError, ModelErrorCode, ValidationError } from '../errors';

/** An entity with a wire form */
export interface Registrable<J> {
    toJson(debug?: boolean): J;
}

export interface RegistryOptions<K extends number | string, V> {
    /** Label used in validation errors, e.g. "vehicle type" */
    readonly kind: string;
    readonly keySchema: z.ZodType<K>;
    readonly keyDescription: string;
    readonly accepts: (value: unknown) => value is V;
    readonly keyOf: (value: V) => K;
    /** Raised by `delete` for a key that is not registered */
    readonly missingError: ModelErrorCode;
    /** Raised by `materialize` when nothing was registered */
    readonly emptyError: ModelErrorCode;
    readonly capacity?: number;
}

/**
 * Ordered map of entities keyed by their own id or name. Every insertion checks the key
 * type, the value type, that the value reports the same key, that the key is free and
 * that the capacity is not exceeded.
 */
export class Registry<K extends number | string, V extends Registrable<J>, J> implements Iterable<[K, V]> {
    private readonly items = new Map<K, V>();

    constructor(private readonly options: RegistryOptions<K, V>) {}

    get size(): number {
        return this.items.size;
    }

    get capacity(): number | undefined {
        return this.options.capacity;
    }

    has(key: K): boolean {
        return this.items.has(key);
    }

    get(key: K): V | undefined {
        return this.items.get(key);
    }

    set(key: unknown, value: unknown): void {
        const { kind, keySchema, keyDescription, accepts, keyOf, capacity } = this.options;

        const parsedKey = keySchema.safeParse(key);
        if (!parsedKey.success) {
            throw new ValidationError('key', { constraint: 'type', expected: `must be ${keyDescription}` });
        }
        if (!accepts(value)) {
            throw new ValidationError(kind, { constraint: 'type', expected: `must be a ${kind}` });
        }
        if (keyOf(value) !== parsedKey.data) {
            throw new ValidationError('key', {
                constraint: 'key',
                expected: `must match the ${kind}'s own ${keyDescription}`,
            });
        }
        if (this.items.has(parsedKey.data)) {
            throw new ValidationError('key', { constraint: 'uniqueness', expected: `is already used by a ${kind}` });
        }
        if (capacity !== undefined && this.items.size + 1 > capacity) {
            throw new ValidationError(kind, {
                constraint: 'capacity',
                expected: `cannot hold more than ${capacity} entries`,
            });
        }

        this.items.set(parsedKey.data, value);
    }

    /** Adds a value under the key it reports for itself */
    add(value: V): void {
        this.set(this.options.keyOf(value), value);
    }

    delete(key: K): void {
        if (!this.items.delete(key)) {
            throw new ModelError(this.options.missingError, { detail: String(key) });
        }
    }

    keys(): IterableIterator<K> {
        return this.items.keys();
    }

    values(): IterableIterator<V> {
        return this.items.values();
    }

    entries(): IterableIterator<[K, V]> {
        return this.items.entries();
    }

    [Symbol.iterator](): IterableIterator<[K, V]> {
        return this.items.entries();
    }

    /** Wire forms of every entry in insertion order; an empty registry is a modeling error */
    materialize(debug = false): J[] {
        const { kind, keyOf, keyDescription, emptyError } = this.options;

        if (this.items.size === 0) {
            throw new ModelError(emptyError);
        }
        return Array.from(this.items, ([key, value]) => {
            // the entity's key field may have been reassigned since insertion
            if (keyOf(value) !== key) {
                throw new ValidationError('key', {
                    constraint: 'key',
                    expected: `must match the ${kind}'s own ${keyDescription}`,
                });
            }
            return value.toJson(debug);
        });
    }
}
