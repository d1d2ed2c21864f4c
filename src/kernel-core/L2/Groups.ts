import type { ILabelRepository } from '../../Platform/Ports.js';
import type { GroupId, Page, SecurityGroup, TokenId } from '../Ontology.js';
import { PreconditionViolatedError } from '../Errors.js';
import type { TokenSetRegistry } from '../L1/TokenSets.js';

/**
 * Group Registry
 * A group is a name bound to one token set that it owns exclusively. Updates
 * mutate that set in place, so every level referencing the group observes the
 * new membership without being touched.
 */
export class GroupRegistry {
    constructor(
        private repo: ILabelRepository,
        private tokenSets: TokenSetRegistry
    ) { }

    public createOrUpdate(name: string, tokenIds: Iterable<TokenId>): GroupId {
        const existing = this.repo.findGroupByName(name);
        if (existing) {
            this.tokenSets.update(existing.tokenSetId, tokenIds);
            return existing.id;
        }

        const members = Array.from(tokenIds);
        const tokenSetId = this.tokenSets.createDetached(members);
        const groupId = this.repo.insertGroup(name, tokenSetId);
        if (groupId !== null) return groupId;

        // Another writer registered the name first; fall back to an update.
        this.repo.deleteTokenSet(tokenSetId);
        const winner = this.repo.findGroupByName(name);
        if (!winner) {
            throw new PreconditionViolatedError(`Group '${name}' could not be registered`, { name });
        }
        this.tokenSets.update(winner.tokenSetId, members);
        return winner.id;
    }

    /**
     * Deletes the group and its token set. Level links pointing at the group
     * are left in place and ignored from then on.
     */
    public delete(groupId: GroupId): void {
        const group = this.require(groupId);
        this.repo.deleteGroup(group.id);
        this.tokenSets.delete(group.tokenSetId);
    }

    public get(groupId: GroupId): SecurityGroup | null {
        return this.repo.getGroup(groupId);
    }

    public findByName(name: string): SecurityGroup | null {
        return this.repo.findGroupByName(name);
    }

    public list(page: Page = {}): string[] {
        return this.repo.listGroupNames(page);
    }

    public ids(groupId: GroupId): TokenId[] {
        return this.tokenSets.ids(this.require(groupId).tokenSetId);
    }

    public values(groupId: GroupId): string[] {
        return this.tokenSets.values(this.require(groupId).tokenSetId);
    }

    private require(groupId: GroupId): SecurityGroup {
        const group = this.repo.getGroup(groupId);
        if (!group) {
            throw new PreconditionViolatedError(`Group ${groupId} does not exist`, { groupId });
        }
        return group;
    }
}
