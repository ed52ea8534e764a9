import { IdentifiableSet } from "@/core/resources/IdentifiableSet";
import type { Identifiable, ResourceClass } from "@/core/resources/Identifiable";
import type { RelationshipAttribute } from "@/core/resources/Relationships";
import { RelationshipsDictionary } from "./RelationshipsDictionary";

/**
 * The entities a Before hook acts on, together with the relationships the
 * request populated on them.
 */
export class EntityHashSet<T extends Identifiable> extends IdentifiableSet<T> {
    public readonly affectedRelationships: RelationshipsDictionary<T>;

    constructor(entities: Iterable<T>, relationships: Map<RelationshipAttribute, Iterable<T>> = new Map()) {
        super(entities);
        this.affectedRelationships = new RelationshipsDictionary(relationships);
    }

    public getByRelationship(rightType: ResourceClass): Map<RelationshipAttribute, IdentifiableSet<T>> {
        return this.affectedRelationships.getByRelationship(rightType);
    }

    public getAffected(propertyName: string): IdentifiableSet<T> {
        return this.affectedRelationships.getAffected(propertyName);
    }
}
