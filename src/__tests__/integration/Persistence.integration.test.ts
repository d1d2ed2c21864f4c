import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SQLiteLabelRepository } from '../../infrastructure/persistence/SQLiteLabelRepository.js';
import { LabelKernel } from '../../kernel-core/Kernel.js';

describe('SQLite Persistence Integration', () => {
    let dir: string;
    let dbPath: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'levelstore-'));
        dbPath = path.join(dir, 'labels.db');
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test('labels survive a restart', () => {
        const repo = new SQLiteLabelRepository(dbPath);
        const kernel = new LabelKernel(repo);
        kernel.saveGroup({ name: 'eng', tokens: ['alpha', 'beta'] });
        kernel.labelObject({ uuid: 'doc-1', level: { tokens: ['gamma'], groups: ['eng'] } });
        repo.close();

        const reopened = new SQLiteLabelRepository(dbPath);
        const restarted = new LabelKernel(reopened);

        expect(restarted.describeObject('doc-1')).toEqual({
            uuid: 'doc-1',
            level: { tokens: ['alpha', 'beta', 'gamma'], groups: ['eng'] }
        });
        expect(Array.from(restarted.objectValues('doc-1'))).toEqual(['alpha', 'beta', 'gamma']);
        reopened.close();
    });

    test('canonical rows are found again after a restart', () => {
        const repo = new SQLiteLabelRepository(dbPath);
        const kernel = new LabelKernel(repo);
        const alpha = kernel.internToken('alpha');
        const beta = kernel.internToken('beta');
        const set = kernel.getOrCreateTokenSet([alpha, beta]);
        const group = kernel.createOrUpdateGroup('eng', [alpha]);
        const level = kernel.getOrCreateLevel(set, [group]);
        repo.close();

        const reopened = new SQLiteLabelRepository(dbPath);
        const restarted = new LabelKernel(reopened);

        expect(restarted.internToken('beta')).toBe(beta);
        expect(restarted.getOrCreateTokenSet([beta, alpha])).toBe(set);
        expect(restarted.getOrCreateLevel(set, [group])).toBe(level);
        reopened.close();
    });

    test('two connections to one file converge on one row per key', () => {
        const first = new SQLiteLabelRepository(dbPath);
        const second = new SQLiteLabelRepository(dbPath);
        const a = new LabelKernel(first);
        const b = new LabelKernel(second);

        const fromA = a.internToken('alpha');
        expect(b.internToken('alpha')).toBe(fromA);
        expect(b.getOrCreateTokenSet([fromA])).toBe(a.getOrCreateTokenSet([fromA]));

        first.close();
        second.close();
    });
});
