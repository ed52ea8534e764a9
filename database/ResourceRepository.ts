import type { Identifiable, ResourceClass } from "@/core/resources/Identifiable";
import type { RelationshipAttribute, RelationshipChain } from "@/core/resources/Relationships";
import type { TargetedFields } from "@/core/request/TargetedFields";

/**
 * Persistence the hook engine and the resource service read and write through.
 * Reads return fresh instances with the requested relationship chains loaded.
 */
export interface ResourceRepository {
    findAll<T extends Identifiable>(type: ResourceClass<T>, include?: RelationshipChain[]): Promise<T[]>;

    findByIds<T extends Identifiable>(type: ResourceClass<T>, ids: string[], include?: RelationshipChain[]): Promise<T[]>;

    /**
     * Stores every attribute and every populated relationship of `entity`
     */
    create<T extends Identifiable>(type: ResourceClass<T>, entity: T, targetedFields: TargetedFields): Promise<T>;

    /**
     * Stores only the targeted attributes and relationships
     */
    update<T extends Identifiable>(type: ResourceClass<T>, entity: T, targetedFields: TargetedFields): Promise<T>;

    setRelationship(type: ResourceClass, id: string, relationship: RelationshipAttribute, relatedIds: string[]): Promise<void>;

    /**
     * Resolves `false` when nothing was deleted
     */
    delete(type: ResourceClass, id: string): Promise<boolean>;
}
