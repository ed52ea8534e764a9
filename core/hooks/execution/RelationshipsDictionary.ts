import { IdentifiableSet } from "@/core/resources/IdentifiableSet";
import type { Identifiable, ResourceClass } from "@/core/resources/Identifiable";
import type { RelationshipAttribute } from "@/core/resources/Relationships";

/**
 * Entities of one resource type grouped by the relationship through which
 * they are affected. Keys always point away from `T`: for a hook on Person,
 * the key is `Person.ownedArticle`, never `Article.owner`.
 */
export class RelationshipsDictionary<T extends Identifiable> extends Map<RelationshipAttribute, IdentifiableSet<T>> {
    constructor(entries?: Iterable<[RelationshipAttribute, Iterable<T>]>) {
        super();
        if (entries) {
            for (const [relationship, entities] of entries) {
                this.set(relationship, new IdentifiableSet(entities));
            }
        }
    }

    /**
     * Entries whose relationship points to `rightType`
     */
    public getByRelationship(rightType: ResourceClass): Map<RelationshipAttribute, IdentifiableSet<T>> {
        return new Map([...this].filter(([relationship]) => relationship.rightType === rightType));
    }

    /**
     * Entities affected through the relationship declared on `propertyName`
     */
    public getAffected(propertyName: string): IdentifiableSet<T> {
        const affected = new IdentifiableSet<T>();
        for (const [relationship, entities] of this) {
            if (relationship.propertyName !== propertyName) continue;
            for (const entity of entities) affected.add(entity);
        }
        return affected;
    }
}
