import { IllegalStateError } from '../errors';
import { dbg, type DbgFn } from '../utils';
import type { Activity } from './Activity';
import { Stack } from './Stack';

/**
 * Source of console input lines.
 */
export interface LineReader {
    /**
     * Writes `prompt` without a trailing newline and resolves the next line.
     * Resolves an empty string once input has ended.
     */
    readLine(prompt: string): Promise<string>;
    close(): void;
}

/**
 * Runs activities as a stack: the top activity receives every input line
 * until it reports it is done, at which point the one beneath it resumes.
 */
export class ActivityManager {
    private activities = new Stack<Activity>();

    constructor(
        private readonly reader: LineReader,
        private readonly dbgFn: DbgFn = dbg
    ) {}

    get depth(): number {
        return this.activities.size;
    }

    /**
     * Puts an activity on top of the stack and starts it. May be called from
     * within another activity's input handler; the new activity takes the
     * next line of input.
     */
    push(activity: Activity): void {
        this.activities.push(activity);
        this.dbgFn(`ActivityManager: Pushed ${activity.constructor.name} (depth ${this.activities.size}).`);
        activity.onStart();
    }

    /**
     * Pushes the root activity and runs until the stack is empty.
     * @throws IllegalStateError if the manager is already running.
     */
    async start(activity: Activity): Promise<void> {
        if (!this.activities.isEmpty) {
            throw new IllegalStateError('ActivityManager: start called while activities are already running.');
        }
        this.push(activity);
        await this.mainLoop();
    }

    private async mainLoop(): Promise<void> {
        let activity = this.activities.peek();
        while (activity) {
            const input = await this.reader.readLine(activity.prompt);
            const shouldExit = activity.handleInput(input);
            if (shouldExit) {
                activity.onFinish();
                this.activities.pop();
                this.dbgFn(`ActivityManager: Popped ${activity.constructor.name} (depth ${this.activities.size}).`);
            }
            activity = this.activities.peek();
        }
        this.dbgFn('ActivityManager: Activity stack is empty.');
    }
}
