import { ActivityManager, type LineReader } from '../activities/ActivityManager';
import { AddRecordActivity } from '../activities/AddRecordActivity';
import { MenuActivity } from '../activities/MenuActivity';
import { QueryRecordsActivity } from '../activities/QueryRecordsActivity';
import { DEFAULT_MENU_PROMPT, DEFAULT_TITLE } from '../config';
import { formatRecord } from '../records/record_types';
import type { RecordStore } from '../records/RecordStore';
import { dbg, type DbgFn, say, type SayFn } from '../utils';

export interface TrackerOptions {
    title?: string;
    menuPrompt?: string;
    sayFn?: SayFn;
    dbgFn?: DbgFn;
}

/**
 * Builds the root menu of the tracker. Add Record and Query Records push
 * their activity onto `manager`; Exit closes the menu.
 */
export function buildRootMenu(
    store: RecordStore,
    manager: ActivityManager,
    options: TrackerOptions = {}
): MenuActivity {
    const sayFn = options.sayFn ?? say;
    const menu = new MenuActivity(options.title ?? DEFAULT_TITLE, options.menuPrompt ?? DEFAULT_MENU_PROMPT, sayFn);

    menu.addOption('Add Record', () => {
        manager.push(new AddRecordActivity(store, sayFn));
        return false;
    });
    menu.addOption('List Records', () => {
        store.all.forEach(record => sayFn(formatRecord(record)));
        return false;
    });
    menu.addOption('Query Records', () => {
        manager.push(new QueryRecordsActivity(store, sayFn));
        return false;
    });
    menu.addOption('Exit', () => true);

    return menu;
}

/**
 * Runs the record tracker against `reader` until Exit is chosen from the
 * root menu.
 *
 * @param store - Store the session adds to and queries
 * @param reader - Source of input lines; not closed here
 * @param options - Menu title and prompt, plus output functions
 * @returns Promise that resolves when the activity stack is empty
 */
export async function startTracker(
    store: RecordStore,
    reader: LineReader,
    options: TrackerOptions = {}
): Promise<void> {
    const dbgFn = options.dbgFn ?? dbg;
    const manager = new ActivityManager(reader, dbgFn);
    const menu = buildRootMenu(store, manager, options);
    dbgFn('Starting record tracker.');
    await manager.start(menu);
    dbgFn(`Record tracker finished with ${store.size} records.`);
}
