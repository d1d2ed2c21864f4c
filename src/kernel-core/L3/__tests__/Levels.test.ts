import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import fc from 'fast-check';
import { SQLiteLabelRepository } from '../../../infrastructure/persistence/SQLiteLabelRepository.js';
import { TokenInterner } from '../../L0/Interner.js';
import { sortedIds } from '../../L0/Signature.js';
import { TokenSetRegistry } from '../../L1/TokenSets.js';
import { GroupRegistry } from '../../L2/Groups.js';
import { LevelComposer } from '../Levels.js';
import { PreconditionViolatedError } from '../../Errors.js';
import type { GroupId, TokenSetId } from '../../Ontology.js';

describe('Level Composer', () => {
    let repo: SQLiteLabelRepository;
    let sets: TokenSetRegistry;
    let groups: GroupRegistry;
    let levels: LevelComposer;
    let eng: GroupId;
    let tsA: TokenSetId;
    let tsB: TokenSetId;

    beforeEach(() => {
        repo = new SQLiteLabelRepository(':memory:');
        new TokenInterner(repo).internAll(['alpha', 'beta', 'gamma', 'delta']);
        sets = new TokenSetRegistry(repo);
        groups = new GroupRegistry(repo, sets);
        levels = new LevelComposer(repo, sets);

        eng = groups.createOrUpdate('eng', [1, 2]);
        tsA = sets.getOrCreate([3]);
        tsB = sets.getOrCreate([4]);
    });

    afterEach(() => {
        repo.close();
    });

    describe('1. Group-set key (default)', () => {
        test('defaults to the group-only key', () => {
            expect(levels.Mode).toBe('groups');
        });

        test('same groups with another token set return the first level', () => {
            const first = levels.getOrCreate(tsA, [eng]);
            const second = levels.getOrCreate(tsB, [eng]);

            expect(second).toBe(first);
            expect(levels.get(first)?.tokenSetId).toBe(tsA);
            expect(Array.from(levels.ids(first))).toEqual([1, 2, 3]);
        });

        test('group order does not matter', () => {
            const ops = groups.createOrUpdate('ops', [4]);
            expect(levels.getOrCreate(tsA, [ops, eng])).toBe(levels.getOrCreate(tsA, [eng, ops]));
        });

        test('levels without groups are never reused', () => {
            expect(levels.getOrCreate(tsA, [])).not.toBe(levels.getOrCreate(tsA, []));
        });
    });

    describe('2. Pair key', () => {
        let pair: LevelComposer;

        beforeEach(() => {
            pair = new LevelComposer(repo, sets, 'pair');
        });

        test('token set takes part in the key', () => {
            expect(pair.getOrCreate(tsA, [eng])).not.toBe(pair.getOrCreate(tsB, [eng]));
        });

        test('equal pairs are reused, with or without groups', () => {
            expect(pair.getOrCreate(tsA, [eng])).toBe(pair.getOrCreate(tsA, [eng]));
            expect(pair.getOrCreate(tsA, [])).toBe(pair.getOrCreate(tsA, []));
        });
    });

    describe('3. Effective sets', () => {
        test('values are the union of token values', () => {
            const level = levels.getOrCreate(tsA, [eng]);
            expect(Array.from(levels.values(level))).toEqual(['alpha', 'beta', 'gamma']);
            expect(levels.ownValues(level)).toEqual(['gamma']);
        });

        test('group updates propagate without touching the level', () => {
            const level = levels.getOrCreate(tsA, [eng]);
            groups.createOrUpdate('eng', [2]);
            expect(Array.from(levels.ids(level))).toEqual([2, 3]);
        });

        test('deleted groups drop out of the union', () => {
            const level = levels.getOrCreate(tsA, [eng]);
            groups.delete(eng);

            expect(Array.from(levels.ids(level))).toEqual([3]);
            expect(levels.groups(level)).toEqual([]);
        });

        test('union law holds after arbitrary group updates', () => {
            const ops = groups.createOrUpdate('ops', []);
            const level = levels.getOrCreate(tsA, [eng, ops]);

            fc.assert(
                fc.property(fc.subarray([1, 2, 3, 4]), fc.subarray([1, 2, 3, 4]), (a, b) => {
                    groups.createOrUpdate('eng', a);
                    groups.createOrUpdate('ops', b);
                    expect(Array.from(levels.ids(level))).toEqual(sortedIds([3, ...a, ...b]));
                })
            );
        });
    });

    describe('4. Deletion', () => {
        test('removes the level and its token set, not its groups', () => {
            const level = levels.getOrCreate(tsA, [eng]);
            levels.delete(level);

            expect(levels.get(level)).toBeNull();
            expect(sets.get(tsA)).toBeNull();
            expect(groups.get(eng)?.name).toBe('eng');
        });

        test('keeps a token set another level still uses', () => {
            const ops = groups.createOrUpdate('ops', [4]);
            const first = levels.getOrCreate(tsA, [eng]);
            const second = levels.getOrCreate(tsA, [ops]);

            levels.delete(first);

            expect(sets.get(tsA)?.id).toBe(tsA);
            expect(Array.from(levels.ids(second))).toEqual([3, 4]);
        });
    });

    describe('5. Preconditions', () => {
        test('rejects unknown token sets and groups', () => {
            expect(() => levels.getOrCreate(404, [])).toThrow(PreconditionViolatedError);
            expect(() => levels.getOrCreate(tsA, [404])).toThrow(/Group 404 does not exist/);
        });

        test('rejects unknown levels', () => {
            expect(() => levels.ids(404)).toThrow(PreconditionViolatedError);
            expect(() => levels.delete(404)).toThrow(PreconditionViolatedError);
        });
    });
});
