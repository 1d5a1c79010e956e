import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { ClassifierConfigSchema, RunManifestSchema } from '@keyword-classifier/shared';
import { DictionaryStore, fingerprintDictionary } from '@keyword-classifier/core';
import { runPipeline } from '../src/pipeline/runner.js';
import { resolveWorkspace } from '../src/workspace/paths.js';
import { hashBuffer } from '../src/utils/hash.js';
import type { ClassifyOptions, Workspace } from '../src/types.js';
import { makeTempDir, removeTempDir, muteConsole } from './helpers/tmp.js';

const DICTIONARY = { urgency: ['hurry', 'last chance'], exclusive: ['vip'] };
const INPUT = 'ref,statement\nA1,"Hurry, last chance for VIP seats"\nA2,New blog post\n';

describe('Classification Pipeline', () => {
    let root: string;
    let workspace: Workspace;
    let inputPath: string;
    let dictionaryPath: string;

    const options = (overrides: Partial<ClassifyOptions> = {}): ClassifyOptions => ({
        dryRun: false,
        force: false,
        yes: true,
        dictionary: dictionaryPath,
        ...overrides,
    });

    beforeEach(async () => {
        muteConsole();
        root = await makeTempDir();
        workspace = resolveWorkspace(root, ClassifierConfigSchema.parse({}));
        inputPath = join(root, 'spring_campaign.csv');
        dictionaryPath = join(root, 'dictionary.json');
        await writeFile(inputPath, INPUT);
        await writeFile(dictionaryPath, JSON.stringify(DICTIONARY));
    });

    afterEach(async () => {
        await removeTempDir(root);
    });

    it('writes the classified CSV, workbook and manifest', async () => {
        const state = await runPipeline(inputPath, workspace, options());

        expect(state.errors).toEqual([]);
        const outDir = join(root, 'outputs', 'spring_campaign');
        expect(state.outputPath).toBe(outDir);
        expect(state.writtenFiles).toEqual([
            join(outDir, 'classified.csv'),
            join(outDir, 'classified.xlsx'),
            join(outDir, 'run_manifest.json'),
        ]);

        const csv = await readFile(join(outDir, 'classified.csv'), 'utf8');
        expect(csv.split('\n')).toEqual([
            'ref,statement,urgency_present,urgency_count,urgency_matches,exclusive_present,exclusive_count,exclusive_matches',
            'A1,"Hurry, last chance for VIP seats",True,2,"hurry, last chance",True,1,vip',
            'A2,New blog post,False,0,,False,0,',
        ]);
    });

    it('records input hash, dictionary fingerprint and stats in the manifest', async () => {
        await runPipeline(inputPath, workspace, options());

        const raw = await readFile(join(root, 'outputs', 'spring_campaign', 'run_manifest.json'), 'utf8');
        const manifest = RunManifestSchema.parse(JSON.parse(raw));

        expect(manifest.input_file).toBe('spring_campaign.csv');
        expect(manifest.input_hash).toBe(hashBuffer(Buffer.from(INPUT)));
        expect(manifest.dictionary_fingerprint).toBe(
            fingerprintDictionary(DictionaryStore.fromPayload(DICTIONARY).snapshot())
        );
        expect(manifest.statement_field).toBe('statement');
        expect(manifest.resolution_strategy).toBe('exact');
        expect(manifest.column_naming).toBe('detailed');
        expect(manifest.stats.total_rows).toBe(2);
        expect(manifest.stats.any_category_rows).toBe(1);
    });

    it('writes only matching rows with --filter', async () => {
        const state = await runPipeline(inputPath, workspace, options({ filter: 'exclusive', naming: 'flag' }));

        expect(state.errors).toEqual([]);
        const csv = await readFile(join(state.outputPath, 'classified.csv'), 'utf8');
        expect(csv.split('\n')).toEqual([
            'ref,statement,urgency_flag,exclusive_flag',
            'A1,"Hurry, last chance for VIP seats",1,1',
        ]);
        expect(state.manifest?.filter).toBe('exclusive');
        expect(state.manifest?.stats.total_rows).toBe(2);
    });

    it('fails when --filter names a category the dictionary lacks', async () => {
        const state = await runPipeline(inputPath, workspace, options({ filter: 'seasonal' }));

        expect(state.errors).toHaveLength(1);
        expect(state.errors[0].step).toBe('classify');
        expect(state.errors[0].fatal).toBe(true);
        expect(existsSync(join(root, 'outputs', 'spring_campaign'))).toBe(false);
    });

    it('writes nothing on a dry run', async () => {
        const state = await runPipeline(inputPath, workspace, options({ dryRun: true }));

        expect(state.errors).toEqual([]);
        expect(state.warnings).toContain('Dry run: Skipping file export.');
        expect(state.writtenFiles).toEqual([]);
        expect(state.classified?.stats.total_rows).toBe(2);
        expect(existsSync(join(root, 'outputs'))).toBe(false);
    });

    it('stops with a fatal error when no statement column resolves', async () => {
        const state = await runPipeline(inputPath, workspace, options({ column: 'body' }));

        expect(state.errors).toHaveLength(1);
        expect(state.errors[0]).toMatchObject({ step: 'classify', fatal: true });
        expect(state.errors[0].message).toContain('body');
        expect(state.classified).toBeUndefined();
    });

    it('stops when the input file is missing', async () => {
        const state = await runPipeline(join(root, 'absent.csv'), workspace, options());

        expect(state.errors).toHaveLength(1);
        expect(state.errors[0].step).toBe('read-input');
        expect(state.dataset).toBeUndefined();
    });

    it('stops when the dictionary is malformed', async () => {
        await writeFile(dictionaryPath, '{"urgency": "hurry"}');
        const state = await runPipeline(inputPath, workspace, options());

        expect(state.errors).toHaveLength(1);
        expect(state.errors[0].step).toBe('load-dictionary');
        expect(state.errors[0].message.startsWith('Failed to load dictionary: Invalid dictionary format')).toBe(true);
    });

    it('warns about categories without keywords', async () => {
        await writeFile(dictionaryPath, JSON.stringify({ ...DICTIONARY, seasonal: [] }));
        const state = await runPipeline(inputPath, workspace, options({ dryRun: true }));

        expect(state.warnings).toContain('Category "seasonal" has no keywords and will match nothing.');
    });

    it('overwrites previous outputs with --force', async () => {
        await runPipeline(inputPath, workspace, options());
        const state = await runPipeline(inputPath, workspace, options({ force: true, yes: false }));
        expect(state.errors).toEqual([]);
        expect(state.writtenFiles).toHaveLength(3);
    });

    it('falls back to the seed dictionary', async () => {
        const state = await runPipeline(inputPath, workspace, options({ dictionary: undefined, dryRun: true }));
        expect(state.dictionarySource).toBe('seed:marketing');
        expect(state.classified?.categories).toEqual(['urgency_marketing', 'exclusive_marketing']);
    });
});
