import type { Identifiable, ResourceClass } from "@/core/resources/Identifiable";
import type { IdentifiableSet } from "@/core/resources/IdentifiableSet";
import { ResourcePipeline, type MaybePromise } from "@/types/hooks.types";
import type { DiffableEntityHashSet } from "./execution/DiffableEntityHashSet";
import type { EntityHashSet } from "./execution/EntityHashSet";
import type { RelationshipsDictionary } from "./execution/RelationshipsDictionary";

/**
 * Base class for resource-specific business rules. Override the hooks a
 * resource needs; only overridden hooks are ever called.
 *
 * ```ts
 * class ArticleDefinition extends ResourceDefinition<Article> {
 *     constructor() { super(Article); }
 *
 *     onReturn(entities: IdentifiableSet<Article>) {
 *         return entities.filter(article => !article.isDraft);
 *     }
 * }
 * ```
 *
 * Before hooks and `onReturn` return the entities (or ids) that may proceed;
 * everything they leave out is detached from the request's object graph.
 */
export class ResourceDefinition<T extends Identifiable> {
    constructor(public readonly resourceType: ResourceClass<T>) {}

    public beforeCreate(entities: EntityHashSet<T>, _pipeline: ResourcePipeline): MaybePromise<Iterable<T>> {
        return entities;
    }

    /**
     * @param isIncluded whether the resource is read as part of an include chain
     * @param stringId set when a single resource is requested
     */
    public beforeRead(_pipeline: ResourcePipeline, _isIncluded: boolean, _stringId?: string): MaybePromise<void> {}

    /**
     * `entities.getDiffs()` is available when database values are loaded for
     * this hook (see `@LoadDatabaseValues`).
     */
    public beforeUpdate(entities: DiffableEntityHashSet<T>, _pipeline: ResourcePipeline): MaybePromise<Iterable<T>> {
        return entities;
    }

    public beforeDelete(entities: EntityHashSet<T>, _pipeline: ResourcePipeline): MaybePromise<Iterable<T>> {
        return entities;
    }

    /**
     * Called when entities of this type are (re)assigned to a relationship of
     * another resource in the request. Returns the ids that may be assigned.
     */
    public beforeUpdateRelationship(
        ids: Set<string>,
        _byRelationship: RelationshipsDictionary<T>,
        _pipeline: ResourcePipeline
    ): MaybePromise<Iterable<string>> {
        return ids;
    }

    /**
     * Called for entities outside the request whose relationship is severed
     * as a side effect, e.g. the previous owner of a reassigned article.
     */
    public beforeImplicitUpdateRelationship(_byRelationship: RelationshipsDictionary<T>, _pipeline: ResourcePipeline): MaybePromise<void> {}

    public onReturn(entities: IdentifiableSet<T>, _pipeline: ResourcePipeline): MaybePromise<Iterable<T>> {
        return entities;
    }

    public afterCreate(_entities: IdentifiableSet<T>, _pipeline: ResourcePipeline): MaybePromise<void> {}

    public afterRead(_entities: IdentifiableSet<T>, _pipeline: ResourcePipeline, _isIncluded: boolean): MaybePromise<void> {}

    public afterUpdate(_entities: IdentifiableSet<T>, _pipeline: ResourcePipeline): MaybePromise<void> {}

    public afterDelete(_entities: IdentifiableSet<T>, _pipeline: ResourcePipeline, _succeeded: boolean): MaybePromise<void> {}

    public afterUpdateRelationship(_byRelationship: RelationshipsDictionary<T>, _pipeline: ResourcePipeline): MaybePromise<void> {}
}
