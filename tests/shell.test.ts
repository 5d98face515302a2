import { expect } from 'chai';
import { describe, it, beforeEach } from 'mocha';
import { startTracker } from '../src/cli/shell';
import { RecordStore } from '../src/records/RecordStore';
import { collectOutput, ScriptedReader } from './testUtils';

const MENU_HEADER = ['Record Tracker v1.0', '\n', '1. Add Record', '2. List Records', '3. Query Records', '4. Exit', ''];
const ADD_PROMPTS = ['Enter the name: ', 'Enter the email address: ', 'Enter the age: '];

describe('Record tracker session', () => {
    let store: RecordStore;
    let output: string[];
    let sayFn: (s: string) => void;
    const dbgFn = () => {};

    beforeEach(() => {
        store = new RecordStore(undefined, dbgFn);
        ({ output, sayFn } = collectOutput());
    });

    it('should add, list and query records through the menu', async () => {
        const reader = new ScriptedReader([
            '1', 'Alice', 'alice@example.com', '30',
            '1', 'Bob', 'bob@example.com', '25',
            '2',
            '3', 'age', '30',
            '4',
        ]);

        await startTracker(store, reader, { sayFn, dbgFn });

        expect(output).to.deep.equal([
            ...MENU_HEADER,
            'Added record #0',
            'Added record #1',
            'Alice, age 30, email alice@example.com, #0',
            'Bob, age 25, email bob@example.com, #1',
            '',
            'Records Found',
            '=============',
            'Alice, age 30, email alice@example.com, #0',
            '',
        ]);
        expect(reader.prompts).to.deep.equal([
            '> ', ...ADD_PROMPTS,
            '> ', ...ADD_PROMPTS,
            '> ',
            '> ', 'Key to query by (name, email, age, ID): ', 'Enter value to find records matching: ',
            '> ',
        ]);
        expect(store.size).to.equal(2);
    });

    it('should reprompt the menu for an out of range option', async () => {
        const reader = new ScriptedReader(['99', '4']);

        await startTracker(store, reader, { sayFn, dbgFn });

        expect(output).to.deep.equal([...MENU_HEADER, 'Invalid option 99']);
        expect(reader.prompts).to.deep.equal(['> ', '> ']);
    });

    it('should list nothing for an empty store', async () => {
        await startTracker(store, new ScriptedReader(['2', '4']), { sayFn, dbgFn });
        expect(output).to.deep.equal(MENU_HEADER);
    });

    it('should not create a record while the age is invalid', async () => {
        const reader = new ScriptedReader(['1', 'Alice', 'alice@example.com', '-5', 'abc', '30', '4']);

        await startTracker(store, reader, { sayFn, dbgFn });

        expect(output).to.deep.equal([
            ...MENU_HEADER,
            'Invalid age. Try again.',
            'Invalid age. Try again.',
            'Added record #0',
        ]);
        expect(store.all.map(r => r.id)).to.deep.equal([0]);
    });

    it('should return when Exit is chosen and leave the reader open', async () => {
        const reader = new ScriptedReader(['4']);

        await startTracker(store, reader, { title: 'My Records', menuPrompt: '$ ', sayFn, dbgFn });

        expect(output[0]).to.equal('My Records');
        expect(reader.prompts).to.deep.equal(['$ ']);
        expect(reader.remaining).to.equal(0);
        expect(reader.closed).to.be.false;
    });
});
