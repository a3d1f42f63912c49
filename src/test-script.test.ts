import assert from 'node:assert/strict';
import { readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { test } from 'node:test';
import { z } from 'zod';

const ROOT = path.resolve(__dirname, '..');

const ManifestSchema = z.object({
    scripts: z.object({
        test: z.string(),
    }),
});

// node 20 `--test` neither expands globs nor finds .ts files on its own
test('the test script names every test file under src', () => {
    const manifest = ManifestSchema.parse(
        JSON.parse(readFileSync(path.join(ROOT, 'package.json'), 'utf8')),
    );
    const listed = manifest.scripts.test
        .split(/\s+/u)
        .filter((entry) => entry.endsWith('.test.ts'))
        .sort();
    const present = readdirSync(path.join(ROOT, 'src'))
        .filter((name) => name.endsWith('.test.ts'))
        .map((name) => `src/${name}`)
        .sort();

    assert.deepEqual(listed, present);
});
