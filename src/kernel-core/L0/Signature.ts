// src/kernel-core/L0/Signature.ts
import type { GroupId, LevelKeyMode, TokenId, TokenSetId } from '../Ontology.js';

/**
 * Canonical key for a set of integer ids: distinct ids, numerically sorted,
 * comma-joined. The empty set maps to the empty string.
 */
export function canonicalize(ids: Iterable<number>): string {
    const distinct = Array.from(new Set(ids));
    for (const id of distinct) {
        if (!Number.isSafeInteger(id) || id < 1) {
            throw new RangeError(`Invalid row id: ${id}`);
        }
    }
    return distinct.sort((a, b) => a - b).join(',');
}

export function tokenSetSignature(tokenIds: Iterable<TokenId>): string {
    return canonicalize(tokenIds);
}

/**
 * Level key under the configured mode. In 'groups' mode a level without
 * groups has no key and is never reused.
 */
export function levelSignature(
    mode: LevelKeyMode,
    tokenSetId: TokenSetId,
    groupIds: Iterable<GroupId>
): string | null {
    const groups = canonicalize(groupIds);
    if (mode === 'pair') {
        return `${tokenSetId}|${groups}`;
    }
    return groups === '' ? null : groups;
}

/** Sorted, de-duplicated copy of a list of ids. */
export function sortedIds<T extends number>(ids: Iterable<T>): T[] {
    return Array.from(new Set(ids)).sort((a, b) => a - b);
}
