import "reflect-metadata";
import { logger } from "./core/Logger";
import config from "./core/Config";
import { validateEnv } from "./core/validateEnv";
import {
    JsonApiError,
    ResourceNotFoundError,
    RelationshipNotFoundError,
    ResourceForbiddenError,
    InvalidQueryStringParameterError,
    InvalidRelationshipDataError,
    HookContractError,
    ResourceSetupError,
    DatabaseValuesUnavailableError,
    responseError,
    toErrorDocument
} from "./core/ErrorHandler";
import type { ErrorDocument, ErrorObject } from "./core/ErrorHandler";
// Resource modeling
import { Resource, Attr, HasOne, HasMany, HasManyThrough } from "./core/resources/Decorators";
import { ResourceGraph, ResourceGraphBuilder } from "./core/resources/ResourceGraph";
import type { ResourceContext, ResourceAttribute } from "./core/resources/ResourceGraph";
import { IdentifiableSet } from "./core/resources/IdentifiableSet";
import { getStringId, identityOf } from "./core/resources/Identifiable";
import type { Identifiable, ResourceClass } from "./core/resources/Identifiable";
import {
    RelationshipAttribute,
    HasOneAttribute,
    HasManyAttribute,
    HasManyThroughAttribute
} from "./core/resources/Relationships";
import type { RelationshipChain, RelationshipValue } from "./core/resources/Relationships";
// Hook engine
import { ResourceDefinition } from "./core/hooks/ResourceDefinition";
import { ResourceDefinitionRegistry } from "./core/hooks/ResourceDefinitionRegistry";
import { LoadDatabaseValues } from "./core/hooks/LoadDatabaseValues";
import { HooksDiscovery } from "./core/hooks/HooksDiscovery";
import { HookExecutorHelper } from "./core/hooks/HookExecutorHelper";
import { ResourceHookExecutor } from "./core/hooks/ResourceHookExecutor";
import type { HookExecutionRequest } from "./core/hooks/ResourceHookExecutor";
import { EntityHashSet } from "./core/hooks/execution/EntityHashSet";
import { DiffableEntityHashSet } from "./core/hooks/execution/DiffableEntityHashSet";
import { RelationshipsDictionary } from "./core/hooks/execution/RelationshipsDictionary";
import { TraversalHelper } from "./core/hooks/traversal/TraversalHelper";
import { ResourceHook, ResourcePipeline } from "./types/hooks.types";
import type { EntityDiffPair, HookExecutorOptions, MaybePromise } from "./types/hooks.types";
// Request and persistence
import { TargetedFields } from "./core/request/TargetedFields";
import { IncludeService } from "./core/request/IncludeService";
import type { ResourceRepository } from "./database/ResourceRepository";
import { MemoryResourceStore } from "./database/MemoryResourceStore";
import { ResourceService } from "./service/ResourceService";
import type { ReadQuery } from "./service/ResourceService";

export {
    logger,
    config,
    validateEnv,

    // Errors
    JsonApiError,
    ResourceNotFoundError,
    RelationshipNotFoundError,
    ResourceForbiddenError,
    InvalidQueryStringParameterError,
    InvalidRelationshipDataError,
    HookContractError,
    ResourceSetupError,
    DatabaseValuesUnavailableError,
    responseError,
    toErrorDocument,

    // Resources
    Resource,
    Attr,
    HasOne,
    HasMany,
    HasManyThrough,
    ResourceGraph,
    ResourceGraphBuilder,
    IdentifiableSet,
    getStringId,
    identityOf,
    RelationshipAttribute,
    HasOneAttribute,
    HasManyAttribute,
    HasManyThroughAttribute,

    // Hooks
    ResourceDefinition,
    ResourceDefinitionRegistry,
    LoadDatabaseValues,
    HooksDiscovery,
    HookExecutorHelper,
    ResourceHookExecutor,
    EntityHashSet,
    DiffableEntityHashSet,
    RelationshipsDictionary,
    TraversalHelper,
    ResourceHook,
    ResourcePipeline,

    // Request and persistence
    TargetedFields,
    IncludeService,
    MemoryResourceStore,
    ResourceService
};

export type {
    ErrorDocument,
    ErrorObject,
    ResourceContext,
    ResourceAttribute,
    Identifiable,
    ResourceClass,
    RelationshipChain,
    RelationshipValue,
    HookExecutionRequest,
    EntityDiffPair,
    HookExecutorOptions,
    MaybePromise,
    ResourceRepository,
    ReadQuery
};
