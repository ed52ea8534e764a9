/**
 * Type definitions for the resource hook engine
 */

import type { Identifiable } from "../core/resources/Identifiable";

/**
 * Every hook a resource definition can implement
 */
export enum ResourceHook {
    BeforeCreate = "beforeCreate",
    BeforeRead = "beforeRead",
    BeforeUpdate = "beforeUpdate",
    BeforeDelete = "beforeDelete",
    BeforeUpdateRelationship = "beforeUpdateRelationship",
    BeforeImplicitUpdateRelationship = "beforeImplicitUpdateRelationship",
    OnReturn = "onReturn",
    AfterCreate = "afterCreate",
    AfterRead = "afterRead",
    AfterUpdate = "afterUpdate",
    AfterDelete = "afterDelete",
    AfterUpdateRelationship = "afterUpdateRelationship"
}

/**
 * The endpoint shape that triggered a hook execution
 */
export enum ResourcePipeline {
    Get = "Get",
    GetSingle = "GetSingle",
    GetRelationship = "GetRelationship",
    Post = "Post",
    Patch = "Patch",
    PatchRelationship = "PatchRelationship",
    Delete = "Delete"
}

export type MaybePromise<T> = T | Promise<T>;

/**
 * Hooks that may receive values loaded from the store
 */
export const DATABASE_VALUE_HOOKS: ReadonlySet<ResourceHook> = new Set([
    ResourceHook.BeforeUpdate,
    ResourceHook.BeforeUpdateRelationship,
    ResourceHook.BeforeDelete
]);

/**
 * Hook options for the executor, resolved from configuration when omitted
 */
export interface HookExecutorOptions {
    /** Load persisted values for hooks that did not opt in or out explicitly */
    loadDatabaseValues?: boolean;
}

/**
 * A persisted entity next to the version the request carries
 */
export interface EntityDiffPair<T extends Identifiable> {
    entity: T;
    databaseValue: T;
}
