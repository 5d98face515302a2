/**
 * A console screen driven by the activity manager.
 */
export interface Activity {
    /** Shown before each line of input is read. */
    readonly prompt: string;

    /** Runs once when the activity becomes active. */
    onStart(): void;

    /**
     * Consumes one line of input.
     * @returns `true` when the activity is done and should be removed.
     */
    handleInput(input: string): boolean;

    /** Runs once right before the activity is removed. */
    onFinish(): void;
}
