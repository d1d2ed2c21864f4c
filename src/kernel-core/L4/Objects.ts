import { randomUUID } from 'crypto';
import type { ILabelRepository } from '../../Platform/Ports.js';
import type { LevelId, ObjectId, Page, SecurityObject } from '../Ontology.js';
import { IdentifierConflictError, PreconditionViolatedError } from '../Errors.js';

export type UuidGenerator = () => string;

/**
 * Object Store
 * Binds an opaque uuid to a level. Objects never own their level.
 */
export class ObjectStore {
    constructor(
        private repo: ILabelRepository,
        private generateUuid: UuidGenerator = randomUUID
    ) { }

    /**
     * A generated uuid that collides is replaced until a free one is found.
     * A uuid chosen by the caller is never replaced: a collision raises
     * IdentifierConflictError instead.
     */
    public create(levelId: LevelId, uuid?: string): SecurityObject {
        if (!this.repo.getLevel(levelId)) {
            throw new PreconditionViolatedError(`Level ${levelId} does not exist`, { levelId });
        }

        if (uuid !== undefined) {
            const obj = this.repo.insertObject(uuid, levelId);
            if (!obj) throw new IdentifierConflictError(uuid);
            return obj;
        }

        for (;;) {
            const candidate = this.generateUuid();
            const obj = this.repo.insertObject(candidate, levelId);
            if (obj) return obj;
            console.warn(`[ObjectStore] Generated uuid ${candidate} already assigned, regenerating`);
        }
    }

    public delete(objectId: ObjectId): void {
        this.repo.deleteObject(objectId);
    }

    public findByUuid(uuid: string): SecurityObject | null {
        return this.repo.findObjectByUuid(uuid);
    }

    public list(page: Page = {}): string[] {
        return this.repo.listObjectUuids(page);
    }
}
