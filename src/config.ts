import { parseInteger } from './utils';

// Default title and prompt of the root menu
export const DEFAULT_TITLE = 'Record Tracker v1.0';
export const DEFAULT_MENU_PROMPT = '> ';

export const TITLE_ENV_VAR = 'RECORD_TRACKER_TITLE';
export const DEBUG_ENV_VAR = 'RECORD_TRACKER_DEBUG';

export interface TrackerConfig {
    title: string;
    menuPrompt: string;
    debug: boolean;
}

/** Options as commander hands them over; anything not given is undefined. */
export type CliOptions = {
    title?: string;
    prompt?: string;
    debug?: boolean;
};

function isTruthyFlag(value: string | undefined): boolean {
    if (value === undefined) {
        return false;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === 'true' || (parseInteger(normalized) ?? 0) > 0;
}

/**
 * Resolves the effective configuration. Command line options win over
 * environment variables, which win over the built-in defaults.
 */
export function resolveConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): TrackerConfig {
    return {
        title: options.title || env[TITLE_ENV_VAR] || DEFAULT_TITLE,
        menuPrompt: options.prompt ?? DEFAULT_MENU_PROMPT,
        debug: options.debug ?? isTruthyFlag(env[DEBUG_ENV_VAR]),
    };
}
