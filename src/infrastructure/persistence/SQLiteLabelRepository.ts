import Database from 'better-sqlite3';
import type { ILabelRepository, Upserted } from '../../Platform/Ports.js';
import type {
    GroupId, LevelId, ObjectId, Page, SecurityGroup, SecurityLevel, SecurityObject,
    Token, TokenId, TokenSet, TokenSetId
} from '../../kernel-core/Ontology.js';
import { ConstraintViolationError, LabelError } from '../../kernel-core/Errors.js';

interface IdRow { id: number }
interface GroupRow { id: number; name: string; tokenSetId: number }
interface LevelRow { id: number; tokenSetId: number; signature: string | null }
interface ObjectRow { id: number; uuid: string; levelId: number }

function isConstraintError(e: unknown): e is Error & { code: string } {
    return e instanceof Error
        && 'code' in e
        && typeof e.code === 'string'
        && e.code.startsWith('SQLITE_CONSTRAINT');
}

function pageArgs(page: Page): [number, number] {
    return [page.limit ?? -1, page.offset ?? 0];
}

export class SQLiteLabelRepository implements ILabelRepository {
    private db: Database.Database;

    constructor(dbPath: string = 'database.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS token (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                value TEXT NOT NULL UNIQUE
            );

            CREATE TABLE IF NOT EXISTS token_set (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                signature TEXT UNIQUE
            );

            CREATE TABLE IF NOT EXISTS token_token_set (
                token_id INTEGER NOT NULL REFERENCES token(id),
                token_set_id INTEGER NOT NULL REFERENCES token_set(id),
                PRIMARY KEY (token_id, token_set_id)
            );
            CREATE INDEX IF NOT EXISTS token_token_set_by_set ON token_token_set(token_set_id);

            CREATE TABLE IF NOT EXISTS security_group (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                name TEXT NOT NULL UNIQUE,
                token_set_id INTEGER NOT NULL REFERENCES token_set(id)
            );

            CREATE TABLE IF NOT EXISTS security_level (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                token_set_id INTEGER NOT NULL REFERENCES token_set(id),
                signature TEXT UNIQUE
            );

            -- group links may outlive their group
            CREATE TABLE IF NOT EXISTS security_level_group (
                security_level_id INTEGER NOT NULL REFERENCES security_level(id),
                security_group_id INTEGER NOT NULL,
                PRIMARY KEY (security_level_id, security_group_id)
            );

            CREATE TABLE IF NOT EXISTS security_object (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                uuid TEXT NOT NULL UNIQUE,
                level_id INTEGER NOT NULL REFERENCES security_level(id)
            );
        `);
    }

    public transaction<T>(work: () => T): T {
        try {
            return this.db.transaction(work).immediate();
        } catch (e) {
            if (e instanceof LabelError) throw e;
            if (isConstraintError(e)) {
                throw new ConstraintViolationError(e.message, e.code);
            }
            throw e;
        }
    }

    // --- Tokens ---

    public upsertToken(value: string): TokenId {
        const found = this.findTokenByValue(value);
        if (found) return found.id;

        const inserted = this.db
            .prepare<[string], IdRow>('INSERT INTO token (value) VALUES (?) ON CONFLICT(value) DO NOTHING RETURNING id')
            .get(value);
        if (inserted) return inserted.id;

        const existing = this.findTokenByValue(value);
        if (!existing) {
            throw new ConstraintViolationError(`Token '${value}' vanished during upsert`);
        }
        return existing.id;
    }

    public findTokenByValue(value: string): Token | null {
        const row = this.db
            .prepare<[string], Token>('SELECT id, value FROM token WHERE value = ?')
            .get(value);
        return row ?? null;
    }

    public getTokens(ids: readonly TokenId[]): Token[] {
        if (ids.length === 0) return [];
        return this.db
            .prepare<[string], Token>(`
                SELECT id, value FROM token
                WHERE id IN (SELECT value FROM json_each(?))
                ORDER BY id
            `)
            .all(JSON.stringify(ids));
    }

    // --- Token sets ---

    public findTokenSetBySignature(signature: string | null): TokenSet | null {
        const row = this.db
            .prepare<[string | null], TokenSet>('SELECT id, signature FROM token_set WHERE signature = ?')
            .get(signature);
        return row ?? null;
    }

    public upsertTokenSet(signature: string | null): Upserted<TokenSetId> {
        const found = this.findTokenSetBySignature(signature);
        if (found) return { id: found.id, created: false };

        const inserted = this.db
            .prepare<[string | null], IdRow>('INSERT INTO token_set (signature) VALUES (?) ON CONFLICT(signature) DO NOTHING RETURNING id')
            .get(signature);
        if (inserted) return { id: inserted.id, created: true };

        const existing = this.findTokenSetBySignature(signature);
        if (!existing) {
            throw new ConstraintViolationError(`Token set '${signature}' vanished during upsert`);
        }
        return { id: existing.id, created: false };
    }

    public getTokenSet(id: TokenSetId): TokenSet | null {
        const row = this.db
            .prepare<[number], TokenSet>('SELECT id, signature FROM token_set WHERE id = ?')
            .get(id);
        return row ?? null;
    }

    public setTokenSetSignature(id: TokenSetId, signature: string | null): void {
        this.db.prepare<[string | null, number]>('UPDATE token_set SET signature = ? WHERE id = ?').run(signature, id);
    }

    public getTokenSetMembers(id: TokenSetId): TokenId[] {
        return this.db
            .prepare<[number], { tokenId: number }>('SELECT token_id AS tokenId FROM token_token_set WHERE token_set_id = ? ORDER BY token_id')
            .all(id)
            .map(row => row.tokenId);
    }

    public addTokenSetMembers(id: TokenSetId, tokenIds: readonly TokenId[]): void {
        const stmt = this.db.prepare<[number, number]>('INSERT INTO token_token_set (token_id, token_set_id) VALUES (?, ?)');
        for (const tokenId of tokenIds) {
            stmt.run(tokenId, id);
        }
    }

    public removeTokenSetMembers(id: TokenSetId, tokenIds: readonly TokenId[]): void {
        const stmt = this.db.prepare<[number, number]>('DELETE FROM token_token_set WHERE token_id = ? AND token_set_id = ?');
        for (const tokenId of tokenIds) {
            stmt.run(tokenId, id);
        }
    }

    public deleteTokenSet(id: TokenSetId): void {
        this.db.prepare<[number]>('DELETE FROM token_token_set WHERE token_set_id = ?').run(id);
        this.db.prepare<[number]>('DELETE FROM token_set WHERE id = ?').run(id);
    }

    public countTokenSetReferences(id: TokenSetId): number {
        const row = this.db
            .prepare<[number, number], { n: number }>(`
                SELECT (SELECT COUNT(*) FROM security_level WHERE token_set_id = ?)
                     + (SELECT COUNT(*) FROM security_group WHERE token_set_id = ?) AS n
            `)
            .get(id, id);
        return row?.n ?? 0;
    }

    // --- Groups ---

    public insertGroup(name: string, tokenSetId: TokenSetId): GroupId | null {
        if (this.findGroupByName(name)) return null;

        const inserted = this.db
            .prepare<[string, number], IdRow>('INSERT INTO security_group (name, token_set_id) VALUES (?, ?) ON CONFLICT(name) DO NOTHING RETURNING id')
            .get(name, tokenSetId);
        return inserted?.id ?? null;
    }

    public getGroup(id: GroupId): SecurityGroup | null {
        const row = this.db
            .prepare<[number], GroupRow>('SELECT id, name, token_set_id AS tokenSetId FROM security_group WHERE id = ?')
            .get(id);
        return row ?? null;
    }

    public findGroupByName(name: string): SecurityGroup | null {
        const row = this.db
            .prepare<[string], GroupRow>('SELECT id, name, token_set_id AS tokenSetId FROM security_group WHERE name = ?')
            .get(name);
        return row ?? null;
    }

    public listGroupNames(page: Page): string[] {
        return this.db
            .prepare<[number, number], { name: string }>('SELECT name FROM security_group ORDER BY id LIMIT ? OFFSET ?')
            .all(...pageArgs(page))
            .map(row => row.name);
    }

    public deleteGroup(id: GroupId): void {
        this.db.prepare<[number]>('DELETE FROM security_group WHERE id = ?').run(id);
    }

    // --- Levels ---

    public findLevelBySignature(signature: string | null): SecurityLevel | null {
        const row = this.db
            .prepare<[string | null], LevelRow>('SELECT id, token_set_id AS tokenSetId, signature FROM security_level WHERE signature = ?')
            .get(signature);
        return row ?? null;
    }

    public upsertLevel(tokenSetId: TokenSetId, signature: string | null): Upserted<LevelId> {
        const found = this.findLevelBySignature(signature);
        if (found) return { id: found.id, created: false };

        const inserted = this.db
            .prepare<[number, string | null], IdRow>('INSERT INTO security_level (token_set_id, signature) VALUES (?, ?) ON CONFLICT(signature) DO NOTHING RETURNING id')
            .get(tokenSetId, signature);
        if (inserted) return { id: inserted.id, created: true };

        const existing = this.findLevelBySignature(signature);
        if (!existing) {
            throw new ConstraintViolationError(`Level '${signature}' vanished during upsert`);
        }
        return { id: existing.id, created: false };
    }

    public getLevel(id: LevelId): SecurityLevel | null {
        const row = this.db
            .prepare<[number], LevelRow>('SELECT id, token_set_id AS tokenSetId, signature FROM security_level WHERE id = ?')
            .get(id);
        return row ?? null;
    }

    public addLevelGroups(levelId: LevelId, groupIds: readonly GroupId[]): void {
        const stmt = this.db.prepare<[number, number]>('INSERT INTO security_level_group (security_level_id, security_group_id) VALUES (?, ?)');
        for (const groupId of groupIds) {
            stmt.run(levelId, groupId);
        }
    }

    public getLevelGroups(levelId: LevelId): SecurityGroup[] {
        return this.db
            .prepare<[number], GroupRow>(`
                SELECT g.id, g.name, g.token_set_id AS tokenSetId
                FROM security_level_group l
                JOIN security_group g ON g.id = l.security_group_id
                WHERE l.security_level_id = ?
                ORDER BY g.id
            `)
            .all(levelId);
    }

    public deleteLevel(id: LevelId): void {
        this.db.prepare<[number]>('DELETE FROM security_level_group WHERE security_level_id = ?').run(id);
        this.db.prepare<[number]>('DELETE FROM security_level WHERE id = ?').run(id);
    }

    // --- Objects ---

    public insertObject(uuid: string, levelId: LevelId): SecurityObject | null {
        if (this.findObjectByUuid(uuid)) return null;

        const row = this.db
            .prepare<[string, number], ObjectRow>(`
                INSERT INTO security_object (uuid, level_id) VALUES (?, ?)
                ON CONFLICT(uuid) DO NOTHING
                RETURNING id, uuid, level_id AS levelId
            `)
            .get(uuid, levelId);
        return row ?? null;
    }

    public findObjectByUuid(uuid: string): SecurityObject | null {
        const row = this.db
            .prepare<[string], ObjectRow>('SELECT id, uuid, level_id AS levelId FROM security_object WHERE uuid = ?')
            .get(uuid);
        return row ?? null;
    }

    public listObjectUuids(page: Page): string[] {
        return this.db
            .prepare<[number, number], { uuid: string }>('SELECT uuid FROM security_object ORDER BY id LIMIT ? OFFSET ?')
            .all(...pageArgs(page))
            .map(row => row.uuid);
    }

    public deleteObject(id: ObjectId): void {
        this.db.prepare<[number]>('DELETE FROM security_object WHERE id = ?').run(id);
    }

    public close() {
        this.db.close();
    }
}
