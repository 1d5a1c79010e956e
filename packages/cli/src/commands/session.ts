import { createInterface } from 'node:readline';
import { openWorkspace, loadDictionary } from '../workspace/config.js';
import { ClassifierSession } from '../session/session.js';
import { log, info, error, errorMessage } from '../utils/console.js';
import { VERSION } from '@keyword-classifier/shared';
import type { SessionOptions } from '../types.js';

/**
 * `kwclass session [input]`: interactive dictionary editing and classification.
 * Reads commands line by line until `quit` or end of input.
 */
export async function startSession(inputPath: string | undefined, options: SessionOptions): Promise<number> {
    let session: ClassifierSession;
    try {
        const workspace = openWorkspace(options.workspace);
        const { store, source } = loadDictionary(workspace, options.dictionary);
        session = new ClassifierSession(workspace, store);
        log(`Keyword Classifier ${VERSION} - interactive session`);
        info(`Dictionary: ${source} (${store.size} categories)`);
        if (inputPath) {
            await session.load(inputPath);
        }
    } catch (err) {
        error(`Error: ${errorMessage(err)}`);
        return 1;
    }
    log('Type "help" for commands.');

    const rl = createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: 'kwclass> ',
        terminal: process.stdin.isTTY,
    });

    rl.prompt();
    for await (const line of rl) {
        const keepGoing = await session.execute(line);
        if (!keepGoing) break;
        rl.prompt();
    }
    rl.close();
    return 0;
}
