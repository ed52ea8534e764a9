import { identityOf, type Identifiable, type ResourceClass } from "@/core/resources/Identifiable";
import { IdentifiableSet } from "@/core/resources/IdentifiableSet";
import type { ResourceGraph } from "@/core/resources/ResourceGraph";
import type { RelationshipAttribute } from "@/core/resources/Relationships";
import { TargetedFields } from "@/core/request/TargetedFields";
import { ChildNode } from "./ChildNode";
import type { Node } from "./Node";
import { NodeLayer } from "./NodeLayer";
import { RelationshipProxy } from "./RelationshipProxy";
import { RelationshipsFromPreviousLayer, type RelationshipGroup } from "./RelationshipsFromPreviousLayer";
import { RootNode } from "./RootNode";

/**
 * Builds the layers of one breadth-first walk over the object graph.
 * Create one per executor call: it remembers which entities it has already
 * visited, so every entity appears in at most one layer.
 */
export class TraversalHelper {
    private readonly proxies = new Map<RelationshipAttribute, RelationshipProxy>();
    private readonly visited = new Map<ResourceClass, Set<string>>();

    constructor(
        private readonly resourceGraph: ResourceGraph,
        private readonly targetedFields: TargetedFields = TargetedFields.empty()
    ) {}

    public createRootNode<T extends Identifiable>(type: ResourceClass<T>, entities: Iterable<T>): RootNode<T> {
        const unique = new IdentifiableSet(entities);
        this.markVisited(type, unique);
        const all = this.getProxies(type);
        return new RootNode(
            type,
            unique,
            this.getPopulatedRelationships(all, unique),
            all,
            this.targetedFields.relationships
        );
    }

    /**
     * Dereferences every relationship to the next layer on every unique
     * entity of the given node(s) and groups what it finds by resource type.
     */
    public createNextLayer(nodes: Node | Iterable<Node>): NodeLayer {
        const sources = isNode(nodes) ? [nodes] : [...nodes];
        const groupsByRightType = new Map<ResourceClass, RelationshipGroup[]>();

        for (const node of sources) {
            for (const proxy of node.relationshipsToNextLayer) {
                const leftEntities = new IdentifiableSet<Identifiable>();
                const rightEntities = new IdentifiableSet<Identifiable>();
                for (const left of node.uniqueEntities) {
                    const reached = proxy.getRelated(left).filter(right => !this.isVisited(proxy.rightType, right));
                    if (reached.length === 0) continue;
                    leftEntities.add(left);
                    for (const right of reached) rightEntities.add(right);
                }
                if (rightEntities.size === 0) continue;

                let groups = groupsByRightType.get(proxy.rightType);
                if (!groups) {
                    groups = [];
                    groupsByRightType.set(proxy.rightType, groups);
                }
                groups.push({ proxy, leftEntities, rightEntities });
            }
        }

        const nodesOfLayer: Node[] = [];
        for (const [rightType, groups] of groupsByRightType) {
            const unique = new IdentifiableSet<Identifiable>();
            for (const group of groups) {
                for (const entity of group.rightEntities) unique.add(entity);
            }
            nodesOfLayer.push(new ChildNode(
                rightType,
                this.getPopulatedRelationships(this.getProxies(rightType), unique),
                new RelationshipsFromPreviousLayer(groups)
            ));
        }
        // marked after the whole layer is built, so an entity reached through
        // two relationships of the same layer is kept in both groups
        for (const node of nodesOfLayer) this.markVisited(node.resourceType, node.uniqueEntities);

        return new NodeLayer(nodesOfLayer);
    }

    public getProxy(attribute: RelationshipAttribute): RelationshipProxy {
        let proxy = this.proxies.get(attribute);
        if (!proxy) {
            proxy = new RelationshipProxy(attribute, this.resourceGraph.getInverse(attribute));
            this.proxies.set(attribute, proxy);
        }
        return proxy;
    }

    private getProxies(type: ResourceClass): RelationshipProxy[] {
        return this.resourceGraph.getRelationships(type).map(attribute => this.getProxy(attribute));
    }

    /**
     * A relationship is populated when the request targeted it or at least
     * one entity holds a value for it.
     */
    private getPopulatedRelationships(proxies: RelationshipProxy[], entities: IdentifiableSet<Identifiable>): RelationshipProxy[] {
        return proxies.filter(proxy =>
            this.targetedFields.isTargeted(proxy.attribute)
            || entities.values().some(entity => proxy.hasValue(entity))
        );
    }

    private isVisited(type: ResourceClass, entity: Identifiable): boolean {
        return this.visited.get(type)?.has(identityOf(entity)) ?? false;
    }

    private markVisited(type: ResourceClass, entities: Iterable<Identifiable>) {
        let seen = this.visited.get(type);
        if (!seen) {
            seen = new Set();
            this.visited.set(type, seen);
        }
        for (const entity of entities) seen.add(identityOf(entity));
    }
}

function isNode(value: Node | Iterable<Node>): value is Node {
    return "resourceType" in value && "uniqueEntities" in value;
}
