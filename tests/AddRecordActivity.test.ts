import { expect } from 'chai';
import { describe, it, beforeEach } from 'mocha';
import { AddRecordActivity } from '../src/activities/AddRecordActivity';
import { RecordStore, createIdCounter } from '../src/records/RecordStore';
import { collectOutput } from './testUtils';

describe('AddRecordActivity', () => {
    let store: RecordStore;
    let output: string[];
    let activity: AddRecordActivity;

    beforeEach(() => {
        store = new RecordStore(createIdCounter(), () => {});
        const collected = collectOutput();
        output = collected.output;
        activity = new AddRecordActivity(store, collected.sayFn);
    });

    it('should prompt for name, email and age in order', () => {
        expect(activity.prompt).to.equal('Enter the name: ');
        activity.handleInput('Alice');
        expect(activity.prompt).to.equal('Enter the email address: ');
        activity.handleInput('alice@example.com');
        expect(activity.prompt).to.equal('Enter the age: ');
    });

    it('should finish after a valid age and add the record on finish', () => {
        expect(activity.handleInput('Alice')).to.be.false;
        expect(activity.handleInput('alice@example.com')).to.be.false;
        expect(activity.handleInput('30')).to.be.true;
        expect(store.size).to.equal(0);

        activity.onFinish();

        expect(output).to.deep.equal(['Added record #0']);
        expect(store.all).to.deep.equal([{ id: 0, name: 'Alice', email: 'alice@example.com', age: 30 }]);
    });

    it('should keep the raw name and email lines', () => {
        activity.handleInput('  Ann Lee ');
        activity.handleInput('not-an-email');
        activity.handleInput('0');
        activity.onFinish();

        expect(store.all[0]).to.deep.equal({ id: 0, name: '  Ann Lee ', email: 'not-an-email', age: 0 });
    });

    it('should stay on the age step for negative or non-numeric ages', () => {
        activity.handleInput('Alice');
        activity.handleInput('alice@example.com');

        expect(activity.handleInput('-5')).to.be.false;
        expect(activity.handleInput('abc')).to.be.false;
        expect(activity.handleInput('')).to.be.false;

        expect(output).to.deep.equal(['Invalid age. Try again.', 'Invalid age. Try again.', 'Invalid age. Try again.']);
        expect(activity.prompt).to.equal('Enter the age: ');
        expect(store.size).to.equal(0);

        expect(activity.handleInput('41')).to.be.true;
    });

    it('should report the new id even when the record is dropped as a duplicate', () => {
        store.addRecord(store.createRecord({ name: 'Alice', email: 'alice@example.com', age: 30 }));

        activity.handleInput('Alice');
        activity.handleInput('alice@example.com');
        activity.handleInput('30');
        activity.onFinish();

        expect(output).to.deep.equal(['Added record #1']);
        expect(store.all.map(r => r.id)).to.deep.equal([0]);
    });
});
