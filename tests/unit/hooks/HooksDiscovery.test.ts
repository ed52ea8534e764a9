import { describe, test, expect } from "vitest";
import { ResourceSetupError } from "@/core/ErrorHandler";
import { HooksDiscovery } from "@/core/hooks/HooksDiscovery";
import { LoadDatabaseValues } from "@/core/hooks/LoadDatabaseValues";
import { ResourceDefinition } from "@/core/hooks/ResourceDefinition";
import type { DiffableEntityHashSet } from "@/core/hooks/execution/DiffableEntityHashSet";
import type { EntityHashSet } from "@/core/hooks/execution/EntityHashSet";
import type { IdentifiableSet } from "@/core/resources/IdentifiableSet";
import { ResourceHook } from "@/types/hooks.types";
import { Article } from "../../fixtures/resources";

class ArticleDefinition extends ResourceDefinition<Article> {
    constructor() {
        super(Article);
    }

    onReturn(entities: IdentifiableSet<Article>) {
        return entities;
    }

    @LoadDatabaseValues()
    beforeUpdate(entities: DiffableEntityHashSet<Article>) {
        return entities;
    }

    @LoadDatabaseValues(false)
    beforeDelete(entities: EntityHashSet<Article>) {
        return entities;
    }
}

class DraftArticleDefinition extends ArticleDefinition {
    afterCreate() {}
}

class MisconfiguredDefinition extends ResourceDefinition<Article> {
    constructor() {
        super(Article);
    }

    @LoadDatabaseValues()
    onReturn(entities: IdentifiableSet<Article>) {
        return entities;
    }
}

describe("HooksDiscovery", () => {
    test("finds the overridden hooks", () => {
        const discovery = new HooksDiscovery(new ArticleDefinition());
        expect([...discovery.implementedHooks].sort()).toEqual([
            ResourceHook.BeforeDelete,
            ResourceHook.BeforeUpdate,
            ResourceHook.OnReturn
        ]);
        expect(discovery.isImplemented(ResourceHook.BeforeCreate)).toBe(false);
    });

    test("a plain definition implements nothing", () => {
        const discovery = new HooksDiscovery(new ResourceDefinition(Article));
        expect(discovery.implementedHooks.size).toBe(0);
    });

    test("reads the database value options", () => {
        const discovery = new HooksDiscovery(new ArticleDefinition());
        expect(discovery.databaseValuesOption(ResourceHook.BeforeUpdate)).toBe(true);
        expect(discovery.databaseValuesOption(ResourceHook.BeforeDelete)).toBe(false);
        expect(discovery.databaseValuesOption(ResourceHook.BeforeUpdateRelationship)).toBeUndefined();
    });

    test("inherits hooks and options from a parent definition", () => {
        const discovery = new HooksDiscovery(new DraftArticleDefinition());
        expect(discovery.isImplemented(ResourceHook.OnReturn)).toBe(true);
        expect(discovery.isImplemented(ResourceHook.AfterCreate)).toBe(true);
        expect(discovery.databaseValuesOption(ResourceHook.BeforeUpdate)).toBe(true);
    });

    test("rejects @LoadDatabaseValues on other hooks", () => {
        expect(() => new HooksDiscovery(new MisconfiguredDefinition())).toThrow(ResourceSetupError);
        expect(() => new HooksDiscovery(new MisconfiguredDefinition())).toThrow(
            "@LoadDatabaseValues is not supported on 'MisconfiguredDefinition.onReturn'; use it on beforeUpdate, beforeUpdateRelationship, beforeDelete."
        );
    });
});
