import type { Identifiable, ResourceClass } from "@/core/resources/Identifiable";
import type { IdentifiableSet } from "@/core/resources/IdentifiableSet";
import type { RelationshipProxy } from "./RelationshipProxy";
import type { RelationshipsFromPreviousLayer } from "./RelationshipsFromPreviousLayer";

/**
 * The entities of one resource type within a traversal layer.
 */
export interface Node {
    readonly resourceType: ResourceClass;
    /** Deduplicated by identity */
    readonly uniqueEntities: IdentifiableSet<Identifiable>;
    readonly relationshipsToNextLayer: RelationshipProxy[];
    readonly relationshipsFromPreviousLayer: RelationshipsFromPreviousLayer;
    /** Keep only the entities whose identity occurs in `updated` */
    updateUnique(updated: Iterable<Identifiable>): void;
    /** Detach entities dropped by `updateUnique` from the object graph */
    reassign(): void;
}
