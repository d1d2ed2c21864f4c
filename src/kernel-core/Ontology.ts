
/**
 * Label Ontology
 * Row shapes shared by the kernel modules and the persistence port.
 * Entities reference each other by id only; junctions live in the repository.
 */

// --- 1. Token ---
export type TokenId = number;
export interface Token {
    id: TokenId;
    value: string;
}

// --- 2. Token Set ---
export type TokenSetId = number;
export interface TokenSet {
    id: TokenSetId;
    signature: string | null; // null: not content-addressed (group-owned or updated in place)
}

// --- 3. Security Group ---
export type GroupId = number;
export interface SecurityGroup {
    id: GroupId;
    name: string;
    tokenSetId: TokenSetId;
}

// --- 4. Security Level ---
export type LevelId = number;
export interface SecurityLevel {
    id: LevelId;
    tokenSetId: TokenSetId;
    signature: string | null;
}

/**
 * 'groups': a level is identified by its group-set alone.
 * 'pair': a level is identified by (token-set, group-set).
 */
export type LevelKeyMode = 'groups' | 'pair';

// --- 5. Security Object ---
export type ObjectId = number;
export interface SecurityObject {
    id: ObjectId;
    uuid: string;
    levelId: LevelId;
}

// --- 6. Public resources (HTTP boundary) ---
export interface PublicSecurityGroup {
    name: string;
    tokens: string[];
}

export interface PublicSecurityLevel {
    tokens: string[];
    groups: string[];
}

export interface PublicSecurityObject {
    uuid: string;
    level: PublicSecurityLevel;
}

export interface Page {
    limit?: number | undefined;
    offset?: number | undefined;
}
