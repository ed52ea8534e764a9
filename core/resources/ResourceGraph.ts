import { getMetadataStorage, type RelationshipMetadata } from "@/core/metadata";
import { ResourceSetupError } from "@/core/ErrorHandler";
import { logger as MainLogger } from "@/core/Logger";
import { formatResourceName } from "./Decorators";
import type { ResourceClass } from "./Identifiable";
import {
    HasManyAttribute,
    HasManyThroughAttribute,
    HasOneAttribute,
    type RelationshipAttribute
} from "./Relationships";

const logger = MainLogger.child({ scope: "ResourceGraph" });

export interface ResourceAttribute {
    propertyName: string;
    publicName: string;
}

export interface ResourceContext {
    resourceName: string;
    resourceType: ResourceClass;
    attributes: ResourceAttribute[];
    relationships: RelationshipAttribute[];
}

/**
 * Read-only view of every registered resource and how they relate.
 */
export class ResourceGraph {
    private readonly byType: Map<Function, ResourceContext>;
    private readonly byName: Map<string, ResourceContext>;

    constructor(contexts: ResourceContext[]) {
        this.byType = new Map(contexts.map(context => [context.resourceType, context]));
        this.byName = new Map(contexts.map(context => [context.resourceName, context]));
    }

    public getResourceContexts(): ResourceContext[] {
        return [...this.byType.values()];
    }

    public hasResource(type: ResourceClass): boolean {
        return this.byType.has(type);
    }

    public getResourceContext(typeOrName: ResourceClass | string): ResourceContext {
        const context = typeof typeOrName === "string"
            ? this.byName.get(typeOrName)
            : this.byType.get(typeOrName);
        if (!context) {
            const label = typeof typeOrName === "string" ? typeOrName : typeOrName.name;
            throw new ResourceSetupError(`Resource '${label}' is not registered in the resource graph.`);
        }
        return context;
    }

    public getRelationships(type: ResourceClass): RelationshipAttribute[] {
        return this.getResourceContext(type).relationships;
    }

    public getRelationship(type: ResourceClass, publicName: string): RelationshipAttribute | null {
        return this.getRelationships(type).find(relationship => relationship.publicName === publicName) ?? null;
    }

    public getAttributes(type: ResourceClass): ResourceAttribute[] {
        return this.getResourceContext(type).attributes;
    }

    /**
     * The relationship on the right type that points back, or `null` when no
     * inverse is known.
     */
    public getInverse(relationship: RelationshipAttribute): RelationshipAttribute | null {
        if (relationship.inverseNavigation === null) return null;
        const context = this.byType.get(relationship.rightType);
        if (!context) return null;
        return context.relationships.find(candidate => candidate.propertyName === relationship.inverseNavigation) ?? null;
    }
}

export class ResourceGraphBuilder {
    private readonly entries: { type: ResourceClass; resourceName?: string }[] = [];

    /**
     * Register a decorated class. Without a name the `@Resource` name is used,
     * falling back to the camel-cased plural of the class name.
     */
    public add(type: ResourceClass, resourceName?: string): this {
        this.entries.push({ type, resourceName });
        return this;
    }

    public build(): ResourceGraph {
        const storage = getMetadataStorage();
        const names = new Set<string>();
        const contexts: ResourceContext[] = [];

        for (const entry of this.entries) {
            const resourceName = entry.resourceName
                ?? storage.getResourceMetadata(entry.type)?.resourceName
                ?? formatResourceName(entry.type.name);
            if (names.has(resourceName)) {
                throw new ResourceSetupError(`Duplicate resource name '${resourceName}' (${entry.type.name}).`);
            }
            names.add(resourceName);

            contexts.push({
                resourceName,
                resourceType: entry.type,
                attributes: storage.getAttributes(entry.type).map(attribute => ({ ...attribute })),
                relationships: storage.getRelationships(entry.type).map(metadata => this.createRelationship(entry.type, metadata))
            });
        }

        const graph = new ResourceGraph(contexts);
        for (const context of contexts) {
            for (const relationship of context.relationships) {
                this.validateRightType(graph, relationship);
            }
        }
        for (const context of contexts) {
            for (const relationship of context.relationships) {
                this.linkInverse(graph, relationship);
            }
        }

        logger.debug({ resources: contexts.map(context => context.resourceName) }, "Resource graph built");
        return graph;
    }

    private createRelationship(leftType: ResourceClass, metadata: RelationshipMetadata): RelationshipAttribute {
        const init = {
            leftType,
            rightType: metadata.relatedType(),
            propertyName: metadata.propertyName,
            publicName: metadata.options.publicName ?? metadata.propertyName,
            inverseNavigation: metadata.options.inverse ?? null,
            canInclude: metadata.options.canInclude ?? true
        };
        switch (metadata.kind) {
            case "hasOne":
                return new HasOneAttribute(init);
            case "hasMany":
                return new HasManyAttribute(init);
            case "hasManyThrough":
                if (!metadata.options.through) {
                    throw new ResourceSetupError(`Relationship '${leftType.name}.${metadata.propertyName}' is missing its 'through' property.`);
                }
                return new HasManyThroughAttribute({
                    ...init,
                    throughProperty: metadata.options.through,
                    throughType: metadata.options.throughType(),
                    leftProperty: metadata.options.leftProperty,
                    rightProperty: metadata.options.rightProperty
                });
        }
    }

    private validateRightType(graph: ResourceGraph, relationship: RelationshipAttribute) {
        if (!graph.hasResource(relationship.rightType)) {
            throw new ResourceSetupError(
                `Relationship '${relationship}' points to '${relationship.rightType.name}', which is not a registered resource.`
            );
        }
    }

    /**
     * A declared inverse is linked on both sides; a conflicting declaration is
     * a setup error.
     */
    private linkInverse(graph: ResourceGraph, relationship: RelationshipAttribute) {
        if (relationship.inverseNavigation === null) return;

        const inverse = graph.getInverse(relationship);
        if (!inverse) {
            throw new ResourceSetupError(
                `Inverse '${relationship.inverseNavigation}' of '${relationship}' is not a relationship of '${relationship.rightType.name}'.`
            );
        }
        if (inverse.rightType !== relationship.leftType) {
            throw new ResourceSetupError(
                `Inverse '${inverse}' of '${relationship}' points to '${inverse.rightType.name}' instead of '${relationship.leftType.name}'.`
            );
        }
        if (inverse.inverseNavigation === null) {
            inverse.inverseNavigation = relationship.propertyName;
        } else if (inverse.inverseNavigation !== relationship.propertyName) {
            throw new ResourceSetupError(
                `'${relationship}' and '${inverse}' declare mismatching inverses.`
            );
        }
    }
}
