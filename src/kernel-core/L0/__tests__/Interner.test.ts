import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { SQLiteLabelRepository } from '../../../infrastructure/persistence/SQLiteLabelRepository.js';
import { TokenInterner } from '../Interner.js';

describe('Token Interner', () => {
    let repo: SQLiteLabelRepository;
    let interner: TokenInterner;

    beforeEach(() => {
        repo = new SQLiteLabelRepository(':memory:');
        interner = new TokenInterner(repo);
    });

    afterEach(() => {
        repo.close();
    });

    test('interning is idempotent', () => {
        const first = interner.intern('alpha');
        expect(interner.intern('alpha')).toBe(first);
    });

    test('distinct values get distinct ids', () => {
        expect(interner.intern('alpha')).toBe(1);
        expect(interner.intern('beta')).toBe(2);
    });

    test('internAll collapses duplicates in first-seen order', () => {
        expect(interner.internAll(['beta', 'alpha', 'beta'])).toEqual([1, 2]);
        expect(interner.intern('alpha')).toBe(2);
    });
});
