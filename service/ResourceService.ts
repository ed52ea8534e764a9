import {
    InvalidRelationshipDataError,
    RelationshipNotFoundError,
    ResourceForbiddenError,
    ResourceNotFoundError
} from "@/core/ErrorHandler";
import { logger as MainLogger } from "@/core/Logger";
import { HookExecutorHelper } from "@/core/hooks/HookExecutorHelper";
import { ResourceHookExecutor, type HookExecutionRequest } from "@/core/hooks/ResourceHookExecutor";
import type { ResourceDefinitionRegistry } from "@/core/hooks/ResourceDefinitionRegistry";
import { IncludeService } from "@/core/request/IncludeService";
import { TargetedFields } from "@/core/request/TargetedFields";
import { getStringId, type Identifiable, type ResourceClass } from "@/core/resources/Identifiable";
import type { ResourceGraph } from "@/core/resources/ResourceGraph";
import type { RelationshipAttribute, RelationshipValue } from "@/core/resources/Relationships";
import type { ResourceRepository } from "@/database/ResourceRepository";
import { ResourcePipeline, type HookExecutorOptions } from "@/types/hooks.types";

const logger = MainLogger.child({ scope: "ResourceService" });

export interface ReadQuery {
    /** Comma-separated relationship paths, e.g. `"owner.articles,tags"` */
    include?: string;
}

/**
 * Runs each JSON:API operation against the repository, firing resource hooks
 * before and after the store round trip.
 */
export class ResourceService {
    private readonly executorHelper: HookExecutorHelper;

    constructor(
        private readonly resourceGraph: ResourceGraph,
        private readonly repository: ResourceRepository,
        registry: ResourceDefinitionRegistry,
        options: HookExecutorOptions = {}
    ) {
        this.executorHelper = new HookExecutorHelper(registry, repository, options);
    }

    public async getAll<T extends Identifiable>(type: ResourceClass<T>, query: ReadQuery = {}): Promise<T[]> {
        const include = new IncludeService(this.resourceGraph).parse(type, query.include).get();
        const executor = this.createExecutor({ includedRelationships: include });

        await executor.beforeRead(type, ResourcePipeline.Get);
        const entities = await this.repository.findAll(type, include);
        await executor.afterRead(type, entities, ResourcePipeline.Get);
        return executor.onReturn(type, entities, ResourcePipeline.Get);
    }

    public async getSingle<T extends Identifiable>(type: ResourceClass<T>, id: string, query: ReadQuery = {}): Promise<T> {
        const include = new IncludeService(this.resourceGraph).parse(type, query.include).get();
        const executor = this.createExecutor({ includedRelationships: include });

        await executor.beforeRead(type, ResourcePipeline.GetSingle, id);
        const found = await this.repository.findByIds(type, [id], include);
        if (found.length === 0) throw this.notFound(type, id);

        await executor.afterRead(type, found, ResourcePipeline.GetSingle);
        const [entity] = await executor.onReturn(type, found, ResourcePipeline.GetSingle);
        if (!entity) throw this.notFound(type, id);
        return entity;
    }

    /**
     * The value of one relationship of one resource
     */
    public async getRelationship<T extends Identifiable>(type: ResourceClass<T>, id: string, relationshipName: string): Promise<RelationshipValue> {
        const relationship = this.findRelationship(type, relationshipName);
        const executor = this.createExecutor({});

        await executor.beforeRead(type, ResourcePipeline.GetRelationship, id);
        const found = await this.repository.findByIds(type, [id], [[relationship]]);
        if (found.length === 0) throw this.notFound(type, id);

        await executor.afterRead(type, found, ResourcePipeline.GetRelationship);
        const [entity] = await executor.onReturn(type, found, ResourcePipeline.GetRelationship);
        if (!entity) throw this.notFound(type, id);
        return relationship.getValue(entity);
    }

    /**
     * Resolves `null` when an `onReturn` hook hides the created resource
     */
    public async create<T extends Identifiable>(type: ResourceClass<T>, entity: T, targetedFields: TargetedFields): Promise<T | null> {
        const executor = this.createExecutor({ targetedFields });

        const [allowed] = await executor.beforeCreate(type, [entity], ResourcePipeline.Post);
        if (!allowed) throw this.filtered(type, "create");

        const created = await this.repository.create(type, allowed, targetedFields);
        logger.debug({ resource: type.name, id: getStringId(created) }, "Resource created");

        await executor.afterCreate(type, [created], ResourcePipeline.Post);
        const [returned] = await executor.onReturn(type, [created], ResourcePipeline.Post);
        return returned ?? null;
    }

    public async update<T extends Identifiable>(type: ResourceClass<T>, id: string, entity: T, targetedFields: TargetedFields): Promise<T | null> {
        const [existing] = await this.repository.findByIds(type, [id]);
        if (!existing) throw this.notFound(type, id);
        entity.id = existing.id;

        const executor = this.createExecutor({ targetedFields });
        const [allowed] = await executor.beforeUpdate(type, [entity], ResourcePipeline.Patch);
        if (!allowed) throw this.filtered(type, "update");

        const updated = await this.repository.update(type, allowed, targetedFields);
        await executor.afterUpdate(type, [updated], ResourcePipeline.Patch);
        const [returned] = await executor.onReturn(type, [updated], ResourcePipeline.Patch);
        return returned ?? null;
    }

    /**
     * Replaces the members of one relationship. Related ids that a
     * `beforeUpdateRelationship` hook rejects are left out.
     */
    public async updateRelationship<T extends Identifiable>(
        type: ResourceClass<T>,
        id: string,
        relationshipName: string,
        relatedIds: string[]
    ): Promise<void> {
        const relationship = this.findRelationship(type, relationshipName);
        if (!relationship.isToMany && relatedIds.length > 1) {
            throw new InvalidRelationshipDataError(this.resourceGraph.getResourceContext(type).resourceName, relationshipName);
        }
        const [parent] = await this.repository.findByIds(type, [id]);
        if (!parent) throw this.notFound(type, id);

        const related = await this.repository.findByIds(relationship.rightType, relatedIds);
        const foundIds = new Set(related.map(getStringId));
        const missing = relatedIds.find(relatedId => !foundIds.has(relatedId));
        if (missing !== undefined) throw this.notFound(relationship.rightType, missing);
        relationship.setValue(parent, relationship.isToMany ? related : related[0] ?? null);

        const targetedFields = new TargetedFields({ relationships: [relationship] });
        const executor = this.createExecutor({ targetedFields });
        const [allowed] = await executor.beforeUpdate(type, [parent], ResourcePipeline.PatchRelationship);
        if (!allowed) throw this.filtered(type, "update");

        const remaining = relatedIdsOf(relationship, allowed);
        await this.repository.setRelationship(type, id, relationship, remaining);
        await executor.afterUpdate(type, [allowed], ResourcePipeline.PatchRelationship);
    }

    public async delete<T extends Identifiable>(type: ResourceClass<T>, id: string): Promise<void> {
        const [existing] = await this.repository.findByIds(type, [id]);
        const target = existing ?? this.createStub(type, id);
        const executor = this.createExecutor({});

        const [allowed] = await executor.beforeDelete(type, [target], ResourcePipeline.Delete);
        if (!allowed) throw this.filtered(type, "delete");

        const succeeded = await this.repository.delete(type, id);
        await executor.afterDelete(type, [allowed], ResourcePipeline.Delete, succeeded);
        if (!succeeded) throw this.notFound(type, id);
    }

    private createExecutor(request: HookExecutionRequest): ResourceHookExecutor {
        return new ResourceHookExecutor(this.executorHelper, this.resourceGraph, request);
    }

    private findRelationship(type: ResourceClass, relationshipName: string): RelationshipAttribute {
        const relationship = this.resourceGraph.getRelationship(type, relationshipName);
        if (!relationship) {
            throw new RelationshipNotFoundError(this.resourceGraph.getResourceContext(type).resourceName, relationshipName);
        }
        return relationship;
    }

    private createStub<T extends Identifiable>(type: ResourceClass<T>, id: string): T {
        const stub = new type();
        stub.id = id;
        return stub;
    }

    private notFound(type: ResourceClass, id: string): ResourceNotFoundError {
        return new ResourceNotFoundError(this.resourceGraph.getResourceContext(type).resourceName, id);
    }

    private filtered(type: ResourceClass, operation: string): ResourceForbiddenError {
        const resourceName = this.resourceGraph.getResourceContext(type).resourceName;
        logger.debug({ resource: resourceName, operation }, "Root resource filtered out by a hook");
        return new ResourceForbiddenError(`A hook on '${resourceName}' does not allow this ${operation}.`);
    }
}

function relatedIdsOf(relationship: RelationshipAttribute, entity: object): string[] {
    const value = relationship.getValue(entity);
    if (value === null) return [];
    return (Array.isArray(value) ? value : [value]).map(getStringId);
}
