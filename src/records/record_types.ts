/**
 * A personal record kept by the tracker.
 * `id` is metadata assigned by the store; it takes no part in deduplication.
 */
export interface TrackedRecord {
    readonly id: number;
    readonly name: string;
    readonly email: string;
    readonly age: number;
}

/** The fields a user supplies when creating a record. */
export type RecordFields = Omit<TrackedRecord, 'id'>;

export const KEYS = ['name', 'email', 'age', 'id'] as const;

/** Identifies which record field a query targets. */
export type Key = typeof KEYS[number];

/** The kind of value each key is matched against. */
export interface KeyValueMap {
    name: string;
    email: string;
    age: number;
    id: number;
}

/**
 * A query for one key. The value type is tied to the key, so a query with
 * a value of the wrong kind does not compile.
 */
export type RecordQuery = { [K in Key]: { key: K; value: KeyValueMap[K] } }[Key];

export function isTextKey(key: Key): key is 'name' | 'email' {
    return key === 'name' || key === 'email';
}

/**
 * Parses a key name, ignoring case.
 * @returns The key, or `undefined` if the text names none.
 */
export function parseKey(input: string): Key | undefined {
    const lowered = input.toLowerCase();
    return KEYS.find(k => k === lowered);
}

export function formatRecord(record: TrackedRecord): string {
    return `${record.name}, age ${record.age}, email ${record.email}, #${record.id}`;
}
