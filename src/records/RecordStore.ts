import { TypeMismatchError } from '../errors';
import { dbg, type DbgFn } from '../utils';
import { type Key, type RecordFields, type RecordQuery, type TrackedRecord, isTextKey } from './record_types';

/** Hands out record ids. Each call returns a value never returned before. */
export type IdGenerator = () => number;

/**
 * Returns an id generator counting up from `start`.
 */
export function createIdCounter(start = 0): IdGenerator {
    let next = start;
    return () => next++;
}

function valueKey(fields: RecordFields): string {
    return JSON.stringify([fields.name, fields.email, fields.age]);
}

/**
 * Keeps the tracker's records in memory.
 *
 * Records are unique by value: two records with the same name, email and age
 * are the same record, whatever their ids. Ids come from the store's own
 * counter and are never reused, including ids given to records that were
 * then dropped as duplicates.
 */
export class RecordStore {
    /** Records keyed by their (name, email, age) value. */
    private records = new Map<string, TrackedRecord>();
    private nextId: IdGenerator;
    private dbgFn: DbgFn;

    constructor(nextId: IdGenerator = createIdCounter(), dbgFn: DbgFn = dbg) {
        this.nextId = nextId;
        this.dbgFn = dbgFn;
    }

    /**
     * Creates a record with the next id. The record is not added to the store.
     */
    createRecord(fields: RecordFields): TrackedRecord {
        return { ...fields, id: this.nextId() };
    }

    /**
     * Adds a record unless an equal-by-value record is already stored.
     * @returns `true` if the record was added, `false` if it was dropped as a duplicate.
     */
    addRecord(record: TrackedRecord): boolean {
        const key = valueKey(record);
        const existing = this.records.get(key);
        if (existing) {
            this.dbgFn(`RecordStore: Dropped record #${record.id}, same value as record #${existing.id}.`);
            return false;
        }
        this.records.set(key, record);
        this.dbgFn(`RecordStore: Added record #${record.id}.`);
        return true;
    }

    /** All records, ascending by id. Recomputed on every access. */
    get all(): TrackedRecord[] {
        return sortById(this.records.values());
    }

    get size(): number {
        return this.records.size;
    }

    /**
     * Finds every record whose field named by the query's key equals its value.
     * An empty result is not an error.
     */
    query(q: RecordQuery): TrackedRecord[] {
        return this.all.filter(record => record[q.key] === q.value);
    }

    /**
     * Same as `query`, for callers holding a key and a value of unchecked kind.
     * @throws TypeMismatchError if the value is not text for name/email or an integer for age/id.
     */
    queryByKey(key: Key, value: string | number): TrackedRecord[] {
        return this.query(toQuery(key, value));
    }
}

function toQuery(key: Key, value: string | number): RecordQuery {
    if (isTextKey(key)) {
        if (typeof value !== 'string') {
            throw new TypeMismatchError(key, value);
        }
        return { key, value };
    }
    if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw new TypeMismatchError(key, value);
    }
    return { key, value };
}

export function sortById(records: Iterable<TrackedRecord>): TrackedRecord[] {
    return Array.from(records).sort((a, b) => a.id - b.id);
}
