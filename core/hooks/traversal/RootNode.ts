import { identityOf, type Identifiable, type ResourceClass } from "@/core/resources/Identifiable";
import { IdentifiableSet } from "@/core/resources/IdentifiableSet";
import type { RelationshipAttribute } from "@/core/resources/Relationships";
import type { Node } from "./Node";
import type { RelationshipProxy } from "./RelationshipProxy";
import { RelationshipsFromPreviousLayer } from "./RelationshipsFromPreviousLayer";

/**
 * Layer 0: the entities the request acts on, all of one type.
 */
export class RootNode<T extends Identifiable> implements Node {
    public readonly relationshipsFromPreviousLayer = new RelationshipsFromPreviousLayer();
    private unique: IdentifiableSet<T>;
    private readonly excluded = new Set<string>();

    constructor(
        public readonly resourceType: ResourceClass<T>,
        entities: Iterable<T>,
        /** Relationships populated on the root entities */
        public readonly relationshipsToNextLayer: RelationshipProxy[],
        /** Every relationship declared on the type */
        public readonly allRelationshipsToNextLayer: RelationshipProxy[],
        private readonly targetedRelationships: ReadonlySet<RelationshipAttribute> = new Set()
    ) {
        this.unique = new IdentifiableSet(entities);
    }

    public get uniqueEntities(): IdentifiableSet<T> {
        return this.unique;
    }

    public updateUnique(updated: Iterable<Identifiable>): void {
        const kept = this.unique.intersect(updated);
        for (const entity of this.unique.except(kept)) this.excluded.add(identityOf(entity));
        this.unique = kept;
    }

    /**
     * Removes the excluded entities from the caller's array, in place
     */
    public reassign(source?: T[]): void {
        if (!source || this.excluded.size === 0) return;
        for (let i = source.length - 1; i >= 0; i--) {
            const entity = source[i];
            if (entity !== undefined && this.excluded.has(identityOf(entity))) {
                source.splice(i, 1);
            }
        }
    }

    /**
     * For every populated relationship, the root entities it applies to
     */
    public leftsToNextLayer(): Map<RelationshipAttribute, IdentifiableSet<T>> {
        const lefts = new Map<RelationshipAttribute, IdentifiableSet<T>>();
        for (const proxy of this.relationshipsToNextLayer) {
            const applies = this.targetedRelationships.has(proxy.attribute)
                ? this.unique
                : this.unique.filter(entity => proxy.hasValue(entity));
            lefts.set(proxy.attribute, applies);
        }
        return lefts;
    }

    /**
     * Every declared relationship grouped by related type, each mapped to all
     * root entities
     */
    public leftsToNextLayerByRelationships(): Map<ResourceClass, Map<RelationshipAttribute, IdentifiableSet<T>>> {
        const byRightType = new Map<ResourceClass, Map<RelationshipAttribute, IdentifiableSet<T>>>();
        for (const proxy of this.allRelationshipsToNextLayer) {
            let entry = byRightType.get(proxy.rightType);
            if (!entry) {
                entry = new Map();
                byRightType.set(proxy.rightType, entry);
            }
            entry.set(proxy.attribute, this.unique);
        }
        return byRightType;
    }
}
