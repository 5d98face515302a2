import { DEFAULT_MENU_PROMPT } from '../config';
import { parseInteger, say, type SayFn } from '../utils';
import type { Activity } from './Activity';

export interface MenuOption {
    label: string;
    /** Runs when the option is chosen. Returning `true` closes the menu. */
    invoke: () => boolean;
}

/**
 * A numbered list of options. The user picks one by its 1-based number.
 */
export class MenuActivity implements Activity {
    private options: MenuOption[] = [];

    constructor(
        private readonly title: string,
        readonly prompt: string = DEFAULT_MENU_PROMPT,
        private readonly sayFn: SayFn = say
    ) {}

    addOption(option: MenuOption): void;
    addOption(label: string, invoke: () => boolean): void;
    addOption(optionOrLabel: MenuOption | string, invoke?: () => boolean): void {
        if (typeof optionOrLabel === 'string') {
            if (!invoke) {
                throw new Error(`MenuActivity: No action given for option "${optionOrLabel}".`);
            }
            this.options.push({ label: optionOrLabel, invoke });
        } else {
            this.options.push(optionOrLabel);
        }
    }

    printMenu(): void {
        this.options.forEach((option, index) => {
            this.sayFn(`${index + 1}. ${option.label}`);
        });
    }

    onStart(): void {
        this.sayFn(this.title);
        this.sayFn('\n');
        this.printMenu();
        this.sayFn('');
    }

    handleInput(input: string): boolean {
        const choice = parseInteger(input);
        if (choice === undefined) {
            this.sayFn(`Invalid option ${input}`);
            return false;
        }
        const option = this.options[choice - 1];
        if (choice < 1 || !option) {
            this.sayFn(`Invalid option ${choice}`);
            return false;
        }
        return option.invoke();
    }

    onFinish(): void {}
}
