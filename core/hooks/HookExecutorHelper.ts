import { config } from "@/core/Config";
import { logger as MainLogger } from "@/core/Logger";
import type { Identifiable, ResourceClass } from "@/core/resources/Identifiable";
import { IdentifiableSet } from "@/core/resources/IdentifiableSet";
import { HasManyThroughAttribute, type RelationshipAttribute } from "@/core/resources/Relationships";
import type { ResourceRepository } from "@/database/ResourceRepository";
import type { HookExecutorOptions, ResourceHook } from "@/types/hooks.types";
import { HooksDiscovery } from "./HooksDiscovery";
import type { ResourceDefinition } from "./ResourceDefinition";
import type { ResourceDefinitionRegistry } from "./ResourceDefinitionRegistry";

const logger = MainLogger.child({ scope: "HookExecutorHelper" });

/**
 * Resolves hook containers and loads persisted state for the executor.
 */
export class HookExecutorHelper {
    private readonly discoveries = new Map<ResourceDefinition<Identifiable>, HooksDiscovery>();
    private readonly loadDatabaseValues: boolean;

    constructor(
        private readonly registry: ResourceDefinitionRegistry,
        private readonly repository: ResourceRepository,
        options: HookExecutorOptions = {}
    ) {
        this.loadDatabaseValues = options.loadDatabaseValues ?? config.shouldLoadDatabaseValues();
    }

    /**
     * The registered definition of `type` when it implements `hook`
     */
    public getResourceHookContainer(type: ResourceClass, hook: ResourceHook): ResourceDefinition<Identifiable> | null {
        const definition = this.registry.get(type);
        return definition && this.getDiscovery(definition).isImplemented(hook) ? definition : null;
    }

    /**
     * A hook's own `@LoadDatabaseValues` setting wins over the global option
     */
    public shouldLoadDbValues(type: ResourceClass, hook: ResourceHook): boolean {
        const definition = this.registry.get(type);
        const option = definition ? this.getDiscovery(definition).databaseValuesOption(hook) : undefined;
        return option ?? this.loadDatabaseValues;
    }

    /**
     * Persisted versions of `entities` with `relationships` loaded, or `null`
     * when `hook` does not take database values
     */
    public async loadDbValues<T extends Identifiable>(
        type: ResourceClass<T>,
        entities: Iterable<T>,
        hook: ResourceHook,
        relationships: RelationshipAttribute[]
    ): Promise<IdentifiableSet<T> | null> {
        if (!this.shouldLoadDbValues(type, hook)) return null;
        return this.loadWithRelationships(type, entities, relationships);
    }

    /**
     * For each relationship, the entities currently related to the given left
     * entities in the store, minus `existing`. Relationships through join
     * entities are skipped; relationships with nothing affected are omitted.
     */
    public async loadImplicitlyAffected(
        leftsByRelationship: Map<RelationshipAttribute, Iterable<Identifiable>>,
        existing?: Iterable<Identifiable>
    ): Promise<Map<RelationshipAttribute, IdentifiableSet<Identifiable>>> {
        const affected = new Map<RelationshipAttribute, IdentifiableSet<Identifiable>>();
        const known = new IdentifiableSet(existing ?? []);

        for (const [relationship, lefts] of leftsByRelationship) {
            if (relationship instanceof HasManyThroughAttribute) continue;

            const persistedLefts = await this.loadWithRelationships(relationship.leftType, lefts, [relationship]);
            const found = new IdentifiableSet<Identifiable>();
            for (const left of persistedLefts) {
                const value = relationship.getValue(left);
                const related = value === null ? [] : Array.isArray(value) ? value : [value];
                for (const entity of related) {
                    if (!known.has(entity)) found.add(entity);
                }
            }
            if (found.size > 0) affected.set(relationship, found);
        }
        return affected;
    }

    private async loadWithRelationships<T extends Identifiable>(
        type: ResourceClass<T>,
        entities: Iterable<T>,
        relationships: RelationshipAttribute[]
    ): Promise<IdentifiableSet<T>> {
        const ids = [...new IdentifiableSet(entities).ids()].filter(id => id !== "");
        if (ids.length === 0) return new IdentifiableSet<T>();
        logger.debug({ resource: type.name, ids, include: relationships.map(String) }, "Loading database values");
        const values = await this.repository.findByIds(type, ids, relationships.map(relationship => [relationship]));
        return new IdentifiableSet(values);
    }

    private getDiscovery(definition: ResourceDefinition<Identifiable>): HooksDiscovery {
        let discovery = this.discoveries.get(definition);
        if (!discovery) {
            discovery = new HooksDiscovery(definition);
            this.discoveries.set(definition, discovery);
        }
        return discovery;
    }
}
