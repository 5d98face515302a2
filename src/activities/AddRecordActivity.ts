import type { RecordStore } from '../records/RecordStore';
import { parseInteger, say, type SayFn } from '../utils';
import type { Activity } from './Activity';

const NAME_STEP = 0;
const EMAIL_STEP = 1;
const AGE_STEP = 2;

/**
 * Asks for a name, an email address and an age, then adds the record.
 */
export class AddRecordActivity implements Activity {
    private step = NAME_STEP;
    private name = '';
    private email = '';
    private age = 0;

    constructor(
        private readonly store: RecordStore,
        private readonly sayFn: SayFn = say
    ) {}

    get prompt(): string {
        switch (this.step) {
            case NAME_STEP:
                return 'Enter the name: ';
            case EMAIL_STEP:
                return 'Enter the email address: ';
            case AGE_STEP:
                return 'Enter the age: ';
            default:
                return "Uh oh, I'm lost!";
        }
    }

    onStart(): void {}

    handleInput(input: string): boolean {
        switch (this.step) {
            case NAME_STEP:
                this.name = input;
                this.step++;
                return false;
            case EMAIL_STEP:
                // not validated
                this.email = input;
                this.step++;
                return false;
            case AGE_STEP: {
                const age = parseInteger(input);
                if (age === undefined || age < 0) {
                    this.sayFn('Invalid age. Try again.');
                    return false;
                }
                this.age = age;
                return true;
            }
            default:
                return true;
        }
    }

    onFinish(): void {
        const record = this.store.createRecord({ name: this.name, email: this.email, age: this.age });
        this.sayFn(`Added record #${record.id}`);
        this.store.addRecord(record);
    }
}
