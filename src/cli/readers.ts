import inquirer from 'inquirer';
import * as readline from 'readline';
import type { LineReader } from '../activities/ActivityManager';

/** Resolves the answer, or `undefined` once input has ended. */
type PromptFn = (prompt: string) => Promise<string | undefined>;

type LineAnswers = { line: string };

/** The part of `inquirer.prompt` used here: the answers and the prompt's readline. */
export type AskFn = (
    questions: inquirer.QuestionCollection<LineAnswers>
) => Promise<LineAnswers> & { ui: { rl: NodeJS.EventEmitter } };

/** An input stream that may be attached to a terminal. */
export type ConsoleInput = NodeJS.ReadableStream & { isTTY?: boolean };

/** Anything prompts can be written to. */
export interface PromptOutput {
    write(chunk: string): unknown;
}

/**
 * Asks for one line with an inquirer input prompt.
 *
 * The prompt text is the question's message, shown without inquirer's
 * prefix and suffix; inquirer adds the single space after it. The answer is
 * returned as typed. Resolves `undefined` if the prompt's input closes
 * before a line is submitted (Ctrl-D on a terminal).
 */
export function getLineInput(prompt: string, askFn: AskFn = inquirer.prompt): Promise<string | undefined> {
    const pending = askFn([
        { type: 'input', name: 'line', message: prompt.trimEnd(), prefix: '', suffix: '' }
    ]);
    return new Promise((resolve, reject) => {
        // inquirer closes its readline after every answer too
        let submitted = false;
        pending.ui.rl.once('line', () => {
            submitted = true;
        });
        pending.ui.rl.once('close', () => {
            if (!submitted) {
                resolve(undefined);
            }
        });
        pending.then(answers => resolve(answers.line), reject);
    });
}

/**
 * Reads lines interactively through inquirer. Meant for a terminal.
 * After input has ended, every read resolves an empty line.
 */
export class InquirerLineReader implements LineReader {
    private ended = false;

    constructor(private readonly promptFn: PromptFn = getLineInput) {}

    async readLine(prompt: string): Promise<string> {
        if (this.ended) {
            return '';
        }
        const line = await this.promptFn(prompt);
        if (line === undefined) {
            this.ended = true;
            return '';
        }
        return line;
    }

    close(): void {}
}

/**
 * Reads lines from a stream, such as stdin when it is piped or redirected.
 * After the stream ends, every read resolves an empty line.
 */
export class StreamLineReader implements LineReader {
    private lines: string[] = [];
    private waiting: ((line: string) => void)[] = [];
    private ended = false;
    private rl: readline.Interface;

    constructor(input: NodeJS.ReadableStream, private readonly output: PromptOutput) {
        this.rl = readline.createInterface({ input, terminal: false });
        this.rl.on('line', line => {
            const resolve = this.waiting.shift();
            if (resolve) {
                resolve(line);
            } else {
                this.lines.push(line);
            }
        });
        this.rl.on('close', () => {
            this.ended = true;
            this.waiting.splice(0).forEach(resolve => resolve(''));
        });
    }

    readLine(prompt: string): Promise<string> {
        this.output.write(prompt);
        const line = this.lines.shift();
        if (line !== undefined) {
            return Promise.resolve(line);
        }
        if (this.ended) {
            return Promise.resolve('');
        }
        return new Promise(resolve => this.waiting.push(resolve));
    }

    close(): void {
        this.rl.close();
    }
}

/**
 * Picks the reader for the given stdin: inquirer on a terminal, plain
 * line reading otherwise.
 */
export function createConsoleReader(
    input: ConsoleInput = process.stdin,
    output: PromptOutput = process.stdout
): LineReader {
    return input.isTTY ? new InquirerLineReader() : new StreamLineReader(input, output);
}
