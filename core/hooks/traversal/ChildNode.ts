import { identityOf, type Identifiable, type ResourceClass } from "@/core/resources/Identifiable";
import { IdentifiableSet } from "@/core/resources/IdentifiableSet";
import type { Node } from "./Node";
import type { RelationshipProxy } from "./RelationshipProxy";
import type { RelationshipsFromPreviousLayer } from "./RelationshipsFromPreviousLayer";

/**
 * Entities of one type reached from the previous layer.
 */
export class ChildNode implements Node {
    private readonly excluded = new Set<string>();

    constructor(
        public readonly resourceType: ResourceClass,
        public readonly relationshipsToNextLayer: RelationshipProxy[],
        public readonly relationshipsFromPreviousLayer: RelationshipsFromPreviousLayer
    ) {}

    public get uniqueEntities(): IdentifiableSet<Identifiable> {
        const unique = new IdentifiableSet<Identifiable>();
        for (const group of this.relationshipsFromPreviousLayer) {
            for (const entity of group.rightEntities) unique.add(entity);
        }
        return unique;
    }

    public updateUnique(updated: Iterable<Identifiable>): void {
        const kept = [...updated];
        for (const group of this.relationshipsFromPreviousLayer) {
            const remaining = group.rightEntities.intersect(kept);
            for (const entity of group.rightEntities.except(remaining)) this.excluded.add(identityOf(entity));
            group.rightEntities = remaining;
        }
    }

    /**
     * Detaches excluded entities from the left entities that reference them:
     * a to-one becomes `null`, a collection loses exactly those members.
     */
    public reassign(): void {
        if (this.excluded.size === 0) return;
        for (const group of this.relationshipsFromPreviousLayer) {
            const { proxy } = group;
            for (const left of group.leftEntities) {
                const value = proxy.getValue(left);
                if (value.kind === "single") {
                    if (value.entity && this.excluded.has(identityOf(value.entity))) {
                        proxy.setValue(left, null);
                    }
                    continue;
                }
                const remaining = value.entities.filter(entity => !this.excluded.has(identityOf(entity)));
                if (remaining.length !== value.entities.length) {
                    proxy.setValue(left, remaining);
                }
            }
        }
    }
}
