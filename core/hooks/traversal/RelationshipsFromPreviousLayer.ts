import type { Identifiable } from "@/core/resources/Identifiable";
import type { IdentifiableSet } from "@/core/resources/IdentifiableSet";
import type { RelationshipAttribute } from "@/core/resources/Relationships";
import type { RelationshipProxy } from "./RelationshipProxy";

/**
 * The edges through which one relationship produced part of a layer:
 * `leftEntities` (previous layer) hold `rightEntities` (this layer).
 */
export interface RelationshipGroup {
    readonly proxy: RelationshipProxy;
    readonly leftEntities: IdentifiableSet<Identifiable>;
    rightEntities: IdentifiableSet<Identifiable>;
}

export class RelationshipsFromPreviousLayer implements Iterable<RelationshipGroup> {
    constructor(private readonly groups: RelationshipGroup[] = []) {}

    public get size(): number {
        return this.groups.length;
    }

    /**
     * Left entities keyed by the relationship pointing into this layer
     */
    public getLeftEntities(): Map<RelationshipAttribute, IdentifiableSet<Identifiable>> {
        return new Map(this.groups.map(group => [group.proxy.attribute, group.leftEntities]));
    }

    /**
     * Right entities keyed by the relationship pointing into this layer
     */
    public getRightEntities(): Map<RelationshipAttribute, IdentifiableSet<Identifiable>> {
        return new Map(this.groups.map(group => [group.proxy.attribute, group.rightEntities]));
    }

    public [Symbol.iterator](): Iterator<RelationshipGroup> {
        return this.groups[Symbol.iterator]();
    }
}
