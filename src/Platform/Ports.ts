import type {
    GroupId, LevelId, ObjectId, Page, SecurityGroup, SecurityLevel, SecurityObject,
    Token, TokenId, TokenSet, TokenSetId
} from '../kernel-core/Ontology.js';

export interface Upserted<T> {
    id: T;
    created: boolean;
}

/**
 * Persistence Port: Label Repository
 * Transactional CRUD over the five entity relations and the two junctions.
 * Find-or-create methods must be backed by storage uniqueness constraints so
 * that concurrent writers converge on a single row per key.
 */
export interface ILabelRepository {
    /** Runs `work` as one unit of work; any throw rolls it back. */
    transaction<T>(work: () => T): T;

    // --- Tokens ---
    upsertToken(value: string): TokenId;
    findTokenByValue(value: string): Token | null;
    getTokens(ids: readonly TokenId[]): Token[];

    // --- Token sets ---
    /** A null signature always creates a new, non content-addressed set. */
    upsertTokenSet(signature: string | null): Upserted<TokenSetId>;
    getTokenSet(id: TokenSetId): TokenSet | null;
    setTokenSetSignature(id: TokenSetId, signature: string | null): void;
    getTokenSetMembers(id: TokenSetId): TokenId[];
    addTokenSetMembers(id: TokenSetId, tokenIds: readonly TokenId[]): void;
    removeTokenSetMembers(id: TokenSetId, tokenIds: readonly TokenId[]): void;
    /** Removes membership links, then the row. */
    deleteTokenSet(id: TokenSetId): void;
    /** Number of groups and levels whose token_set_id is `id`. */
    countTokenSetReferences(id: TokenSetId): number;

    // --- Groups ---
    /** Returns null when the name is already taken. */
    insertGroup(name: string, tokenSetId: TokenSetId): GroupId | null;
    getGroup(id: GroupId): SecurityGroup | null;
    findGroupByName(name: string): SecurityGroup | null;
    listGroupNames(page: Page): string[];
    deleteGroup(id: GroupId): void;

    // --- Levels ---
    /** A null signature always creates a new level. */
    upsertLevel(tokenSetId: TokenSetId, signature: string | null): Upserted<LevelId>;
    getLevel(id: LevelId): SecurityLevel | null;
    addLevelGroups(levelId: LevelId, groupIds: readonly GroupId[]): void;
    /** Live groups linked to the level, by id. Links to deleted groups are skipped. */
    getLevelGroups(levelId: LevelId): SecurityGroup[];
    /** Removes group links, then the row. */
    deleteLevel(id: LevelId): void;

    // --- Objects ---
    /** Returns null when the uuid is already taken. */
    insertObject(uuid: string, levelId: LevelId): SecurityObject | null;
    findObjectByUuid(uuid: string): SecurityObject | null;
    listObjectUuids(page: Page): string[];
    deleteObject(id: ObjectId): void;
}
