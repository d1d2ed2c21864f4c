import type { ILabelRepository } from '../../Platform/Ports.js';
import type { TokenId } from '../Ontology.js';

/**
 * Token Interner
 * Maps a label value to its stable row id, creating the row on first use.
 * Tokens are never deleted.
 */
export class TokenInterner {
    constructor(private repo: ILabelRepository) { }

    public intern(value: string): TokenId {
        return this.repo.upsertToken(value);
    }

    public internAll(values: Iterable<string>): TokenId[] {
        const ids: TokenId[] = [];
        for (const value of new Set(values)) {
            ids.push(this.intern(value));
        }
        return ids;
    }
}
