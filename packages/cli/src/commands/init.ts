import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { CONFIG_FILENAME } from '@keyword-classifier/shared';
import { updateConfigYaml } from '../yaml/config.js';
import { loadConfig } from '../workspace/config.js';
import { success, info, error, errorMessage } from '../utils/console.js';
import type { InitOptions } from '../types.js';

/**
 * `kwclass init`: creates keyword-classifier.yaml, or updates its seed.
 */
export async function initWorkspace(options: InitOptions): Promise<number> {
    const root = resolve(options.workspace || process.cwd());
    const configPath = join(root, CONFIG_FILENAME);
    const existed = existsSync(configPath);

    try {
        await updateConfigYaml(configPath, { seed: options.seed });
        loadConfig(root);
    } catch (err) {
        error(`Error: ${errorMessage(err)}`);
        return 1;
    }

    if (existed) {
        info(`Updated ${configPath}`);
    } else {
        success(`Created ${configPath}`);
    }
    return 0;
}
