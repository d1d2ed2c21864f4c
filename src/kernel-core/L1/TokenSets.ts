import type { ILabelRepository } from '../../Platform/Ports.js';
import type { TokenId, TokenSet, TokenSetId } from '../Ontology.js';
import { PreconditionViolatedError } from '../Errors.js';
import { sortedIds, tokenSetSignature } from '../L0/Signature.js';

/**
 * Set Canonicalizer
 * Content-addressed token sets. A set created through `getOrCreate` carries
 * the canonical signature of its membership; the unique signature column
 * guarantees one row per membership. Sets created with `createDetached` (the
 * ones groups own) carry none and are never matched by content.
 */
export class TokenSetRegistry {
    constructor(private repo: ILabelRepository) { }

    public getOrCreate(tokenIds: Iterable<TokenId>): TokenSetId {
        const members = sortedIds(tokenIds);
        const { id, created } = this.repo.upsertTokenSet(tokenSetSignature(members));
        if (created) {
            this.repo.addTokenSetMembers(id, members);
        }
        return id;
    }

    public createDetached(tokenIds: Iterable<TokenId>): TokenSetId {
        const { id } = this.repo.upsertTokenSet(null);
        this.repo.addTokenSetMembers(id, sortedIds(tokenIds));
        return id;
    }

    /**
     * Converges the set's membership to `tokenIds` in place. The id never
     * changes and the set is not merged with an equal one. A content-addressed
     * set whose membership changes gives up its signature.
     */
    public update(setId: TokenSetId, tokenIds: Iterable<TokenId>): void {
        const set = this.require(setId);
        const next = new Set(tokenIds);
        const current = this.repo.getTokenSetMembers(setId);
        const currentSet = new Set(current);

        const removed = current.filter(id => !next.has(id));
        const added = sortedIds(next).filter(id => !currentSet.has(id));
        if (removed.length === 0 && added.length === 0) return;

        this.repo.removeTokenSetMembers(setId, removed);
        this.repo.addTokenSetMembers(setId, added);
        if (set.signature !== null) {
            this.repo.setTokenSetSignature(setId, null);
        }
    }

    public delete(setId: TokenSetId): void {
        this.require(setId);
        this.repo.deleteTokenSet(setId);
    }

    public get(setId: TokenSetId): TokenSet | null {
        return this.repo.getTokenSet(setId);
    }

    public ids(setId: TokenSetId): TokenId[] {
        return this.repo.getTokenSetMembers(setId);
    }

    public values(setId: TokenSetId): string[] {
        return this.repo.getTokens(this.ids(setId)).map(t => t.value);
    }

    private require(setId: TokenSetId): TokenSet {
        const set = this.repo.getTokenSet(setId);
        if (!set) {
            throw new PreconditionViolatedError(`Token set ${setId} does not exist`, { setId });
        }
        return set;
    }
}
