import { formatRecord, isTextKey, type Key, parseKey, type RecordQuery } from '../records/record_types';
import type { RecordStore } from '../records/RecordStore';
import { parseInteger, say, type SayFn } from '../utils';
import type { Activity } from './Activity';

/**
 * Asks for a key and a value, then prints the matching records.
 */
export class QueryRecordsActivity implements Activity {
    /** Set once a valid key has been entered. */
    private key: Key | undefined;

    constructor(
        private readonly store: RecordStore,
        private readonly sayFn: SayFn = say
    ) {}

    get prompt(): string {
        return this.key === undefined
            ? 'Key to query by (name, email, age, ID): '
            : 'Enter value to find records matching: ';
    }

    onStart(): void {}

    handleInput(input: string): boolean {
        if (this.key === undefined) {
            this.key = parseKey(input);
            if (this.key === undefined) {
                this.sayFn(`Invalid key '${input}.'`);
            }
            return false;
        }

        const query = this.buildQuery(this.key, input);
        if (!query) {
            return false;
        }
        this.printResults(query);
        return true;
    }

    onFinish(): void {}

    private buildQuery(key: Key, input: string): RecordQuery | undefined {
        if (isTextKey(key)) {
            return { key, value: input };
        }
        const value = parseInteger(input);
        if (value === undefined) {
            this.sayFn(`Invalid ${key === 'age' ? 'age' : 'ID'} ${input}`);
            return undefined;
        }
        return { key, value };
    }

    private printResults(query: RecordQuery): void {
        const found = this.store.query(query);
        this.sayFn('');
        if (found.length === 0) {
            this.sayFn('No records found.');
        } else {
            this.sayFn('Records Found');
            this.sayFn('=============');
            found.forEach(record => this.sayFn(formatRecord(record)));
        }
        this.sayFn('');
    }
}
