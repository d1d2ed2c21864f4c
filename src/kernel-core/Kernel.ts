import type { ILabelRepository } from '../Platform/Ports.js';
import type {
    GroupId, LevelId, LevelKeyMode, Page, PublicSecurityGroup, PublicSecurityLevel,
    PublicSecurityObject, SecurityGroup, SecurityObject, TokenId, TokenSetId
} from './Ontology.js';
import { NotFoundError } from './Errors.js';
import { TokenInterner } from './L0/Interner.js';
import { TokenSetRegistry } from './L1/TokenSets.js';
import { GroupRegistry } from './L2/Groups.js';
import { LevelComposer } from './L3/Levels.js';
import { ObjectStore } from './L4/Objects.js';
import type { UuidGenerator } from './L4/Objects.js';

export interface LabelKernelOptions {
    levelKey?: LevelKeyMode;
    generateUuid?: UuidGenerator;
}

export interface LabelObjectRequest {
    uuid?: string | undefined;
    level: PublicSecurityLevel;
}

/**
 * Label Kernel
 * The operations exposed to the HTTP layer. Every call is one unit of work
 * against the repository; a throw rolls the whole call back.
 */
export class LabelKernel {
    private interner: TokenInterner;
    private tokenSets: TokenSetRegistry;
    private groups: GroupRegistry;
    private levels: LevelComposer;
    private objects: ObjectStore;

    public constructor(private repo: ILabelRepository, options: LabelKernelOptions = {}) {
        this.interner = new TokenInterner(repo);
        this.tokenSets = new TokenSetRegistry(repo);
        this.groups = new GroupRegistry(repo, this.tokenSets);
        this.levels = new LevelComposer(repo, this.tokenSets, options.levelKey);
        this.objects = new ObjectStore(repo, options.generateUuid);
    }

    public get LevelKey(): LevelKeyMode { return this.levels.Mode; }

    // --- Core operations ---

    public internToken(value: string): TokenId {
        return this.repo.transaction(() => this.interner.intern(value));
    }

    public getOrCreateTokenSet(tokenIds: Iterable<TokenId>): TokenSetId {
        return this.repo.transaction(() => this.tokenSets.getOrCreate(tokenIds));
    }

    public updateTokenSet(setId: TokenSetId, tokenIds: Iterable<TokenId>): void {
        this.repo.transaction(() => this.tokenSets.update(setId, tokenIds));
    }

    public deleteTokenSet(setId: TokenSetId): void {
        this.repo.transaction(() => this.tokenSets.delete(setId));
    }

    public tokenSetIds(setId: TokenSetId): TokenId[] {
        return this.repo.transaction(() => this.tokenSets.ids(setId));
    }

    public createOrUpdateGroup(name: string, tokenIds: Iterable<TokenId>): GroupId {
        return this.repo.transaction(() => this.groups.createOrUpdate(name, tokenIds));
    }

    public deleteGroup(groupId: GroupId): void {
        this.repo.transaction(() => this.groups.delete(groupId));
    }

    public getOrCreateLevel(tokenSetId: TokenSetId, groupIds: Iterable<GroupId>): LevelId {
        return this.repo.transaction(() => this.levels.getOrCreate(tokenSetId, groupIds));
    }

    public deleteLevel(levelId: LevelId): void {
        this.repo.transaction(() => this.levels.delete(levelId));
    }

    public effectiveIds(levelId: LevelId): Set<TokenId> {
        return this.repo.transaction(() => this.levels.ids(levelId));
    }

    public effectiveValues(levelId: LevelId): Set<string> {
        return this.repo.transaction(() => this.levels.values(levelId));
    }

    /** Returns the uuid assigned to the new object. */
    public createObject(levelId: LevelId, uuid?: string): string {
        return this.repo.transaction(() => this.objects.create(levelId, uuid).uuid);
    }

    public deleteObject(uuid: string): void {
        this.repo.transaction(() => {
            this.objects.delete(this.requireObject(uuid).id);
        });
    }

    // --- Lookups ---

    public findGroup(name: string): SecurityGroup {
        return this.repo.transaction(() => this.requireGroup(name));
    }

    public listGroups(page: Page = {}): string[] {
        return this.repo.transaction(() => this.groups.list(page));
    }

    public groupIds(name: string): TokenId[] {
        return this.repo.transaction(() => this.groups.ids(this.requireGroup(name).id));
    }

    public describeGroup(name: string): PublicSecurityGroup {
        return this.repo.transaction(() => this.publicGroup(this.requireGroup(name)));
    }

    public findObject(uuid: string): SecurityObject {
        return this.repo.transaction(() => this.requireObject(uuid));
    }

    public listObjects(page: Page = {}): string[] {
        return this.repo.transaction(() => this.objects.list(page));
    }

    public objectIds(uuid: string): Set<TokenId> {
        return this.repo.transaction(() => this.levels.ids(this.requireObject(uuid).levelId));
    }

    public objectValues(uuid: string): Set<string> {
        return this.repo.transaction(() => this.levels.values(this.requireObject(uuid).levelId));
    }

    public describeObject(uuid: string): PublicSecurityObject {
        return this.repo.transaction(() => {
            const obj = this.requireObject(uuid);
            return this.publicObject(obj, Array.from(this.levels.values(obj.levelId)));
        });
    }

    // --- Resource operations (HTTP boundary) ---

    /** Create or update a group from token values. */
    public saveGroup(group: PublicSecurityGroup): PublicSecurityGroup {
        return this.repo.transaction(() => {
            const tokenIds = this.interner.internAll(group.tokens);
            const groupId = this.groups.createOrUpdate(group.name, tokenIds);
            return this.publicGroup(this.requireGroupById(groupId));
        });
    }

    /** Idempotent delete by name; reports whether a group was removed. */
    public removeGroup(name: string): boolean {
        return this.repo.transaction(() => {
            const group = this.groups.findByName(name);
            if (!group) return false;
            this.groups.delete(group.id);
            return true;
        });
    }

    /**
     * Resolves group names (all must exist), interns token values, composes
     * the level and attaches a new object to it.
     */
    public labelObject(request: LabelObjectRequest): PublicSecurityObject {
        return this.repo.transaction(() => {
            const groupIds = request.level.groups.map(name => this.requireGroup(name).id);
            const tokenIds = this.interner.internAll(request.level.tokens);
            const tokenSetId = this.tokenSets.getOrCreate(tokenIds);
            const levelId = this.levels.getOrCreate(tokenSetId, groupIds);
            const obj = this.objects.create(levelId, request.uuid);
            return this.publicObject(obj, this.levels.ownValues(levelId).sort());
        });
    }

    /** Idempotent delete by uuid; reports whether an object was removed. */
    public removeObject(uuid: string): boolean {
        return this.repo.transaction(() => {
            const obj = this.objects.findByUuid(uuid);
            if (!obj) return false;
            this.objects.delete(obj.id);
            return true;
        });
    }

    // --- Internals ---

    private requireGroup(name: string): SecurityGroup {
        const group = this.groups.findByName(name);
        if (!group) throw new NotFoundError('Group', name);
        return group;
    }

    private requireGroupById(groupId: GroupId): SecurityGroup {
        const group = this.groups.get(groupId);
        if (!group) throw new NotFoundError('Group', groupId);
        return group;
    }

    private requireObject(uuid: string): SecurityObject {
        const obj = this.objects.findByUuid(uuid);
        if (!obj) throw new NotFoundError('Object', uuid);
        return obj;
    }

    private publicGroup(group: SecurityGroup): PublicSecurityGroup {
        return { name: group.name, tokens: this.groups.values(group.id).sort() };
    }

    /**
     * A freshly labelled object reports its level's own tokens; a stored one
     * reports the effective union, group tokens included.
     */
    private publicObject(obj: SecurityObject, tokens: string[]): PublicSecurityObject {
        return {
            uuid: obj.uuid,
            level: {
                tokens,
                groups: this.levels.groups(obj.levelId).map(g => g.name)
            }
        };
    }
}
