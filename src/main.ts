#!/usr/bin/env node
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { type CliOptions, resolveConfig } from './config';
import { createConsoleReader } from './cli/readers';
import { startTracker } from './cli/shell';
import { IllegalStateError } from './errors';
import { RecordStore } from './records/RecordStore';
import { dbg, setDebug } from './utils';

const GENERAL_ERROR = 1;
const ILLEGAL_STATE_ERROR = 2;

// Load environment variables from .env file
dotenv.config();

async function main() {
    const program = new Command();

    program
        .name('record-tracker')
        .version('1.0.0')
        .description('Record Tracker - keep and query personal records from the console')
        .option('-t, --title <title>', 'Title shown above the main menu')
        .option('-p, --prompt <prompt>', 'Prompt shown by the main menu')
        .option('-d, --debug', 'Print debug output');

    program.parse(process.argv);
    const config = resolveConfig(program.opts<CliOptions>());
    setDebug(config.debug);
    dbg(`Using title: "${config.title}"`);

    const store = new RecordStore();
    const reader = createConsoleReader();
    try {
        await startTracker(store, reader, { title: config.title, menuPrompt: config.menuPrompt });
    } finally {
        reader.close();
    }
}

main().catch(error => {
    console.error('Record tracker failed:', error);
    process.exit(error instanceof IllegalStateError ? ILLEGAL_STATE_ERROR : GENERAL_ERROR);
});
