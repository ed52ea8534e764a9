import type {
    AttributeMetadata,
    RelationshipMetadata,
    ResourceMetadata
} from "./definitions/Resource";
import type { ResourceClass } from "../resources/Identifiable";

/**
 * Collects what the resource decorators declare. Property decorators run
 * before the class decorator, so fields are keyed by constructor rather than
 * by resource name.
 */
export class MetadataStorage {
    resources: ResourceMetadata[] = [];
    resources_map: Map<Function, ResourceMetadata> = new Map();
    attributes: Map<Function, AttributeMetadata[]> = new Map();
    relationships: Map<Function, RelationshipMetadata[]> = new Map();

    collectResourceMetadata(metadata: ResourceMetadata) {
        if (this.resources_map.has(metadata.target)) {
            return;
        }
        this.resources.push(metadata);
        this.resources_map.set(metadata.target, metadata);
    }

    collectAttributeMetadata(target: Function, metadata: AttributeMetadata) {
        if (!this.attributes.has(target)) {
            this.attributes.set(target, []);
        }
        this.attributes.get(target)!.push(metadata);
    }

    collectRelationshipMetadata(target: Function, metadata: RelationshipMetadata) {
        if (!this.relationships.has(target)) {
            this.relationships.set(target, []);
        }
        this.relationships.get(target)!.push(metadata);
    }

    getResourceMetadata(target: ResourceClass): ResourceMetadata | undefined {
        return this.resources_map.get(target);
    }

    /**
     * Attributes declared on the class and its ancestors, closest declaration first
     */
    getAttributes(target: ResourceClass): AttributeMetadata[] {
        return this.collectAlongPrototypeChain(target, this.attributes);
    }

    getRelationships(target: ResourceClass): RelationshipMetadata[] {
        return this.collectAlongPrototypeChain(target, this.relationships);
    }

    private collectAlongPrototypeChain<M extends { propertyName: string }>(target: Function, source: Map<Function, M[]>): M[] {
        const seen = new Set<string>();
        const collected: M[] = [];
        let current: unknown = target;
        while (typeof current === "function" && current !== Function.prototype) {
            for (const entry of source.get(current) ?? []) {
                if (seen.has(entry.propertyName)) continue;
                seen.add(entry.propertyName);
                collected.push(entry);
            }
            current = Object.getPrototypeOf(current);
        }
        return collected;
    }
}
