import type { ILabelRepository } from '../../Platform/Ports.js';
import type {
    GroupId, LevelId, LevelKeyMode, SecurityGroup, SecurityLevel, TokenId, TokenSetId
} from '../Ontology.js';
import { PreconditionViolatedError } from '../Errors.js';
import { levelSignature, sortedIds } from '../L0/Signature.js';
import type { TokenSetRegistry } from '../L1/TokenSets.js';

/**
 * Level Composer
 *
 * A level pairs a token set with a set of groups. Levels are reused by
 * canonical key: under 'groups' the key is the sorted group ids alone, so a
 * second caller passing a different token set gets the level created first,
 * with its original token set. Under 'pair' the token set is part of the key.
 *
 * Effective membership is always derived from current rows: a group update
 * is visible through every level that references it.
 */
export class LevelComposer {
    constructor(
        private repo: ILabelRepository,
        private tokenSets: TokenSetRegistry,
        private mode: LevelKeyMode = 'groups'
    ) { }

    public get Mode(): LevelKeyMode { return this.mode; }

    public getOrCreate(tokenSetId: TokenSetId, groupIds: Iterable<GroupId>): LevelId {
        if (!this.tokenSets.get(tokenSetId)) {
            throw new PreconditionViolatedError(`Token set ${tokenSetId} does not exist`, { tokenSetId });
        }
        const groups = sortedIds(groupIds);
        for (const groupId of groups) {
            if (!this.repo.getGroup(groupId)) {
                throw new PreconditionViolatedError(`Group ${groupId} does not exist`, { groupId });
            }
        }

        const { id, created } = this.repo.upsertLevel(
            tokenSetId,
            levelSignature(this.mode, tokenSetId, groups)
        );
        if (created) {
            this.repo.addLevelGroups(id, groups);
        }
        return id;
    }

    public get(levelId: LevelId): SecurityLevel | null {
        return this.repo.getLevel(levelId);
    }

    public groups(levelId: LevelId): SecurityGroup[] {
        this.require(levelId);
        return this.repo.getLevelGroups(levelId);
    }

    /** Own token-set ids united with those of every live referenced group. */
    public ids(levelId: LevelId): Set<TokenId> {
        const level = this.require(levelId);
        const components = [
            this.tokenSets.ids(level.tokenSetId),
            ...this.repo.getLevelGroups(levelId).map(g => this.tokenSets.ids(g.tokenSetId))
        ];
        return new Set(sortedIds(components.flat()));
    }

    public values(levelId: LevelId): Set<string> {
        const ids = Array.from(this.ids(levelId));
        return new Set(this.repo.getTokens(ids).map(t => t.value).sort());
    }

    /** Own token-set values only. */
    public ownValues(levelId: LevelId): string[] {
        return this.tokenSets.values(this.require(levelId).tokenSetId);
    }

    /**
     * Deletes group links and the row, then the token set unless another
     * level or a group still points at it. Referenced groups are untouched.
     */
    public delete(levelId: LevelId): void {
        const level = this.require(levelId);
        this.repo.deleteLevel(levelId);
        if (this.repo.countTokenSetReferences(level.tokenSetId) === 0) {
            this.tokenSets.delete(level.tokenSetId);
        }
    }

    private require(levelId: LevelId): SecurityLevel {
        const level = this.repo.getLevel(levelId);
        if (!level) {
            throw new PreconditionViolatedError(`Level ${levelId} does not exist`, { levelId });
        }
        return level;
    }
}
