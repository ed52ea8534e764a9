import { HookContractError } from "@/core/ErrorHandler";
import { logger as MainLogger } from "@/core/Logger";
import { getStringId, type Identifiable, type ResourceClass } from "@/core/resources/Identifiable";
import type { IdentifiableSet } from "@/core/resources/IdentifiableSet";
import type { ResourceGraph } from "@/core/resources/ResourceGraph";
import type { RelationshipAttribute, RelationshipChain } from "@/core/resources/Relationships";
import { TargetedFields } from "@/core/request/TargetedFields";
import { ResourceHook, ResourcePipeline, type MaybePromise } from "@/types/hooks.types";
import { DiffableEntityHashSet } from "./execution/DiffableEntityHashSet";
import { EntityHashSet } from "./execution/EntityHashSet";
import { RelationshipsDictionary } from "./execution/RelationshipsDictionary";
import type { HookExecutorHelper } from "./HookExecutorHelper";
import type { ResourceDefinition } from "./ResourceDefinition";
import type { Node } from "./traversal/Node";
import type { NodeLayer } from "./traversal/NodeLayer";
import { TraversalHelper } from "./traversal/TraversalHelper";

const logger = MainLogger.child({ scope: "ResourceHookExecutor" });

type Container = ResourceDefinition<Identifiable>;
type EntitiesByRelationship = Map<RelationshipAttribute, IdentifiableSet<Identifiable>>;

export interface HookExecutionRequest {
    /** Fields the current write request sets */
    targetedFields?: TargetedFields;
    /** Parsed `include` chains of the current read request */
    includedRelationships?: RelationshipChain[];
}

/**
 * Fires resource hooks over the object graph of one request: on the root
 * entities first, then layer by layer on everything reachable through
 * populated relationships. Entities a hook leaves out are detached from the
 * caller's object graph.
 */
export class ResourceHookExecutor {
    private readonly targetedFields: TargetedFields;
    private readonly includedRelationships: RelationshipChain[];

    constructor(
        private readonly executorHelper: HookExecutorHelper,
        private readonly resourceGraph: ResourceGraph,
        request: HookExecutionRequest = {}
    ) {
        this.targetedFields = request.targetedFields ?? TargetedFields.empty();
        this.includedRelationships = request.includedRelationships ?? [];
    }

    /**
     * Fires `beforeRead` on the root type, then once on every other type in
     * the include chains.
     */
    public async beforeRead<T extends Identifiable>(type: ResourceClass<T>, pipeline: ResourcePipeline, stringId?: string): Promise<void> {
        const container = this.executorHelper.getResourceHookContainer(type, ResourceHook.BeforeRead);
        if (container) {
            await this.callHook(container, ResourceHook.BeforeRead, () => container.beforeRead(pipeline, false, stringId));
        }

        const called = new Set<ResourceClass>([type]);
        for (const chain of this.includedRelationships) {
            for (const relationship of chain) {
                if (called.has(relationship.rightType)) continue;
                called.add(relationship.rightType);
                const included = this.executorHelper.getResourceHookContainer(relationship.rightType, ResourceHook.BeforeRead);
                if (included) {
                    await this.callHook(included, ResourceHook.BeforeRead, () => included.beforeRead(pipeline, true));
                }
            }
        }
    }

    public async beforeCreate<T extends Identifiable>(type: ResourceClass<T>, entities: T[], pipeline: ResourcePipeline): Promise<T[]> {
        const traversal = this.createTraversal();
        const node = traversal.createRootNode(type, entities);
        const container = this.executorHelper.getResourceHookContainer(type, ResourceHook.BeforeCreate);
        if (container) {
            const affected = new EntityHashSet(node.uniqueEntities, node.leftsToNextLayer());
            const updated = await this.callHook(container, ResourceHook.BeforeCreate, () => container.beforeCreate(affected, pipeline));
            node.updateUnique(updated);
            node.reassign(entities);
        }
        await this.fireNestedBeforeUpdateHooks(pipeline, traversal.createNextLayer(node));
        return entities;
    }

    public async beforeUpdate<T extends Identifiable>(type: ResourceClass<T>, entities: T[], pipeline: ResourcePipeline): Promise<T[]> {
        const traversal = this.createTraversal();
        const node = traversal.createRootNode(type, entities);
        const container = this.executorHelper.getResourceHookContainer(type, ResourceHook.BeforeUpdate);
        if (container) {
            const relationships = node.relationshipsToNextLayer.map(proxy => proxy.attribute);
            const databaseValues = await this.executorHelper.loadDbValues(type, node.uniqueEntities, ResourceHook.BeforeUpdate, relationships);
            const diff = new DiffableEntityHashSet(node.uniqueEntities, databaseValues, node.leftsToNextLayer(), this.targetedFields);
            const updated = await this.callHook(container, ResourceHook.BeforeUpdate, () => container.beforeUpdate(diff, pipeline));
            node.updateUnique(updated);
            node.reassign(entities);
        }
        await this.fireNestedBeforeUpdateHooks(pipeline, traversal.createNextLayer(node));
        return entities;
    }

    /**
     * Besides the root hook, notifies every type related to the deleted
     * entities through `beforeImplicitUpdateRelationship`.
     */
    public async beforeDelete<T extends Identifiable>(type: ResourceClass<T>, entities: T[], pipeline: ResourcePipeline): Promise<T[]> {
        const traversal = this.createTraversal();
        const node = traversal.createRootNode(type, entities);
        const container = this.executorHelper.getResourceHookContainer(type, ResourceHook.BeforeDelete);
        if (container) {
            const relationships = node.relationshipsToNextLayer.map(proxy => proxy.attribute);
            const databaseValues = await this.executorHelper.loadDbValues(type, node.uniqueEntities, ResourceHook.BeforeDelete, relationships);
            const affected = new EntityHashSet(databaseValues ?? node.uniqueEntities, node.leftsToNextLayer());
            const updated = await this.callHook(container, ResourceHook.BeforeDelete, () => container.beforeDelete(affected, pipeline));
            node.updateUnique(updated);
            node.reassign(entities);
        }

        for (const [rightType, leftsByRelationship] of node.leftsToNextLayerByRelationships()) {
            await this.fireForAffectedImplicits(rightType, leftsByRelationship, pipeline);
        }
        return entities;
    }

    /**
     * Filters what is about to be returned, on every layer of the object
     * graph. In the `GetSingle` pipeline the root hook may return at most one
     * entity.
     */
    public async onReturn<T extends Identifiable>(type: ResourceClass<T>, entities: T[], pipeline: ResourcePipeline): Promise<T[]> {
        const traversal = this.createTraversal();
        const node = traversal.createRootNode(type, entities);
        const container = this.executorHelper.getResourceHookContainer(type, ResourceHook.OnReturn);
        if (container && pipeline !== ResourcePipeline.GetRelationship) {
            const updated = [...await this.callHook(container, ResourceHook.OnReturn, () => container.onReturn(node.uniqueEntities, pipeline))];
            this.validateHookResponse(updated, pipeline);
            node.updateUnique(updated);
            node.reassign(entities);
        }

        await this.traverse(traversal, traversal.createNextLayer(node), ResourceHook.OnReturn, async (nextContainer, nextNode) => {
            const filtered = await this.callHook(nextContainer, ResourceHook.OnReturn, () => nextContainer.onReturn(nextNode.uniqueEntities, pipeline));
            nextNode.updateUnique(filtered);
            nextNode.reassign();
        });
        return entities;
    }

    public async afterRead<T extends Identifiable>(type: ResourceClass<T>, entities: T[], pipeline: ResourcePipeline): Promise<void> {
        const traversal = this.createTraversal();
        const node = traversal.createRootNode(type, entities);
        const container = this.executorHelper.getResourceHookContainer(type, ResourceHook.AfterRead);
        if (container) {
            await this.callHook(container, ResourceHook.AfterRead, () => container.afterRead(node.uniqueEntities, pipeline, false));
        }

        await this.traverse(traversal, traversal.createNextLayer(node), ResourceHook.AfterRead, (nextContainer, nextNode) =>
            this.callHook(nextContainer, ResourceHook.AfterRead, () => nextContainer.afterRead(nextNode.uniqueEntities, pipeline, true))
        );
    }

    public async afterCreate<T extends Identifiable>(type: ResourceClass<T>, entities: T[], pipeline: ResourcePipeline): Promise<void> {
        const traversal = this.createTraversal();
        const node = traversal.createRootNode(type, entities);
        const container = this.executorHelper.getResourceHookContainer(type, ResourceHook.AfterCreate);
        if (container) {
            await this.callHook(container, ResourceHook.AfterCreate, () => container.afterCreate(node.uniqueEntities, pipeline));
        }

        await this.traverse(traversal, traversal.createNextLayer(node), ResourceHook.AfterUpdateRelationship, (nextContainer, nextNode) =>
            this.fireAfterUpdateRelationship(nextContainer, nextNode, pipeline)
        );
    }

    public async afterUpdate<T extends Identifiable>(type: ResourceClass<T>, entities: T[], pipeline: ResourcePipeline): Promise<void> {
        const traversal = this.createTraversal();
        const node = traversal.createRootNode(type, entities);
        const container = this.executorHelper.getResourceHookContainer(type, ResourceHook.AfterUpdate);
        if (container) {
            await this.callHook(container, ResourceHook.AfterUpdate, () => container.afterUpdate(node.uniqueEntities, pipeline));
        }

        await this.traverse(traversal, traversal.createNextLayer(node), ResourceHook.AfterUpdateRelationship, (nextContainer, nextNode) =>
            this.fireAfterUpdateRelationship(nextContainer, nextNode, pipeline)
        );
    }

    /**
     * Root entities only
     */
    public async afterDelete<T extends Identifiable>(type: ResourceClass<T>, entities: T[], pipeline: ResourcePipeline, succeeded: boolean): Promise<void> {
        const node = this.createTraversal().createRootNode(type, entities);
        const container = this.executorHelper.getResourceHookContainer(type, ResourceHook.AfterDelete);
        if (container) {
            await this.callHook(container, ResourceHook.AfterDelete, () => container.afterDelete(node.uniqueEntities, pipeline, succeeded));
        }
    }

    private createTraversal(): TraversalHelper {
        return new TraversalHelper(this.resourceGraph, this.targetedFields);
    }

    private async traverse(
        traversal: TraversalHelper,
        firstLayer: NodeLayer,
        hook: ResourceHook,
        action: (container: Container, node: Node) => Promise<unknown>
    ): Promise<void> {
        let layer = firstLayer;
        while (layer.anyEntities()) {
            for (const node of layer) {
                const container = this.executorHelper.getResourceHookContainer(node.resourceType, hook);
                if (!container) continue;
                await action(container, node);
            }
            layer = traversal.createNextLayer(layer.nodes);
        }
    }

    /**
     * For every node of the layer, in this order:
     *
     * 1. `beforeUpdateRelationship` on the entities newly assigned to a
     *    relationship (say `owner_new` of `article1`);
     * 2. unless the pipeline is `Post`, `beforeImplicitUpdateRelationship` on
     *    the entities previously assigned (`owner_old`);
     * 3. `beforeImplicitUpdateRelationship` on entities that currently hold
     *    the newly assigned ones (`article2`, which `owner_new` owned until now).
     */
    private async fireNestedBeforeUpdateHooks(pipeline: ResourcePipeline, layer: NodeLayer): Promise<void> {
        for (const node of layer) {
            const uniqueEntities = node.uniqueEntities;
            const container = this.executorHelper.getResourceHookContainer(node.resourceType, ResourceHook.BeforeUpdateRelationship);

            if (container && uniqueEntities.size > 0) {
                const relationships = node.relationshipsToNextLayer.map(proxy => proxy.attribute);
                const databaseValues = await this.executorHelper.loadDbValues(
                    node.resourceType,
                    uniqueEntities,
                    ResourceHook.BeforeUpdateRelationship,
                    relationships
                );
                // grouped from this type's point of view: Person.ownedArticle, not Article.owner
                const byInverse = this.replaceKeysWithInverseRelationships(node.relationshipsFromPreviousLayer.getRightEntities());
                const resourcesByRelationship = this.createRelationshipsDictionary(byInverse, databaseValues);
                const allowedIds = new Set(await this.callHook(
                    container,
                    ResourceHook.BeforeUpdateRelationship,
                    () => container.beforeUpdateRelationship(uniqueEntities.ids(), resourcesByRelationship, pipeline)
                ));
                node.updateUnique(uniqueEntities.filter(entity => allowedIds.has(getStringId(entity))));
                node.reassign();
            }

            // nothing was assigned before a create
            if (pipeline !== ResourcePipeline.Post) {
                const leftEntities = node.relationshipsFromPreviousLayer.getLeftEntities();
                if (leftEntities.size > 0) {
                    await this.fireForAffectedImplicits(node.resourceType, leftEntities, pipeline, uniqueEntities);
                }
            }

            const rightEntities = node.relationshipsFromPreviousLayer.getRightEntities();
            const [firstRelationship] = rightEntities.keys();
            if (firstRelationship) {
                // the root layer is homogeneous, so every relationship into
                // this node starts at the same type
                await this.fireForAffectedImplicits(
                    firstRelationship.leftType,
                    this.replaceKeysWithInverseRelationships(rightEntities),
                    pipeline
                );
            }
        }
    }

    /**
     * Loads the entities currently related through `implicitsTarget` and
     * fires `beforeImplicitUpdateRelationship` on them. Relationships without
     * an inverse are skipped.
     */
    private async fireForAffectedImplicits(
        typeToNotify: ResourceClass,
        implicitsTarget: Map<RelationshipAttribute, Iterable<Identifiable>>,
        pipeline: ResourcePipeline,
        existingImplicitEntities?: Iterable<Identifiable>
    ): Promise<void> {
        const container = this.executorHelper.getResourceHookContainer(typeToNotify, ResourceHook.BeforeImplicitUpdateRelationship);
        if (!container) return;

        const invertible = new Map([...implicitsTarget].filter(([relationship]) => this.resourceGraph.getInverse(relationship) !== null));
        if (invertible.size === 0) return;

        const affected = await this.executorHelper.loadImplicitlyAffected(invertible, existingImplicitEntities);
        if (affected.size === 0) return;

        const resourcesByRelationship = this.createRelationshipsDictionary(this.replaceKeysWithInverseRelationships(affected));
        await this.callHook(
            container,
            ResourceHook.BeforeImplicitUpdateRelationship,
            () => container.beforeImplicitUpdateRelationship(resourcesByRelationship, pipeline)
        );
    }

    private async fireAfterUpdateRelationship(container: Container, node: Node, pipeline: ResourcePipeline): Promise<void> {
        const byInverse = this.replaceKeysWithInverseRelationships(node.relationshipsFromPreviousLayer.getRightEntities());
        const resourcesByRelationship = this.createRelationshipsDictionary(byInverse);
        await this.callHook(
            container,
            ResourceHook.AfterUpdateRelationship,
            () => container.afterUpdateRelationship(resourcesByRelationship, pipeline)
        );
    }

    /**
     * Re-keys by the relationship pointing back; entries whose relationship
     * has no known inverse are dropped.
     */
    private replaceKeysWithInverseRelationships(entitiesByRelationship: EntitiesByRelationship): EntitiesByRelationship {
        const byInverse: EntitiesByRelationship = new Map();
        for (const [relationship, entities] of entitiesByRelationship) {
            const inverse = this.resourceGraph.getInverse(relationship);
            if (inverse) byInverse.set(inverse, entities);
        }
        return byInverse;
    }

    /**
     * With database values, entries are replaced by their persisted versions.
     */
    private createRelationshipsDictionary(
        entitiesByRelationship: EntitiesByRelationship,
        databaseValues?: IdentifiableSet<Identifiable> | null
    ): RelationshipsDictionary<Identifiable> {
        const persisted = databaseValues ?? null;
        return new RelationshipsDictionary([...entitiesByRelationship].map(([relationship, entities]): [RelationshipAttribute, Identifiable[]] => {
            if (!persisted) return [relationship, entities.values()];
            return [relationship, entities.values().map(entity => persisted.get(entity) ?? entity)];
        }));
    }

    private validateHookResponse(returned: Identifiable[], pipeline: ResourcePipeline) {
        if (pipeline === ResourcePipeline.GetSingle && returned.length > 1) {
            throw new HookContractError(
                `The collection returned from the onReturn hook may contain at most one item in the ${pipeline} pipeline.`
            );
        }
    }

    /**
     * Hook errors are rethrown as they are
     */
    private async callHook<R>(container: Container, hook: ResourceHook, invoke: () => MaybePromise<R>): Promise<R> {
        const resource = container.resourceType.name;
        logger.trace({ resource, hook }, "Executing hook");
        try {
            return await invoke();
        } catch (err) {
            logger.debug({ err, resource, hook }, "Hook threw an error");
            throw err;
        }
    }
}
