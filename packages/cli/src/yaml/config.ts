import { parseDocument, isMap } from 'yaml';
import { readFile, writeFile } from 'node:fs/promises';
import type { ClassifierConfig } from '@keyword-classifier/shared';

const CONFIG_TEMPLATE = `# Keyword Classifier configuration
#
# seed:            marketing | marketing-compact | empty
# dictionary_path: JSON dictionary to import instead of the seed
# statement_field: column holding the statement (skips auto-detection)
# resolution:      detection order, any of exact, contains, positional
# column_naming:   detailed | flag | one-hot

seed: marketing
`;

/**
 * Sets top-level keys in keyword-classifier.yaml while preserving comments
 * and the order of keys already present. Creates the file if missing.
 */
export async function updateConfigYaml(
    filePath: string,
    updates: Partial<ClassifierConfig>
): Promise<void> {
    let content = '';
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (isErrnoException(err) && err.code === 'ENOENT') {
            content = CONFIG_TEMPLATE;
        } else {
            throw err;
        }
    }

    const doc = parseDocument(content);
    const root = doc.contents;

    if (root !== null && !isMap(root)) {
        throw new Error(`Invalid YAML structure in ${filePath}: top level must be a mapping.`);
    }

    for (const [key, value] of Object.entries(updates)) {
        if (value === undefined) continue;
        doc.set(key, doc.createNode(value));
    }

    await writeFile(filePath, doc.toString());
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}
