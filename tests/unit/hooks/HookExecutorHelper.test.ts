import { describe, test, expect, beforeEach } from "vitest";
import { HookExecutorHelper } from "@/core/hooks/HookExecutorHelper";
import { LoadDatabaseValues } from "@/core/hooks/LoadDatabaseValues";
import { ResourceDefinition } from "@/core/hooks/ResourceDefinition";
import { ResourceDefinitionRegistry } from "@/core/hooks/ResourceDefinitionRegistry";
import type { DiffableEntityHashSet } from "@/core/hooks/execution/DiffableEntityHashSet";
import type { EntityHashSet } from "@/core/hooks/execution/EntityHashSet";
import { TargetedFields } from "@/core/request/TargetedFields";
import { getStringId, type Identifiable, type ResourceClass } from "@/core/resources/Identifiable";
import type { RelationshipAttribute } from "@/core/resources/Relationships";
import { MemoryResourceStore } from "@/database/MemoryResourceStore";
import { ResourceHook } from "@/types/hooks.types";
import { Article, Person, Tag, article, assignTags, createResourceGraph, person, tag } from "../../fixtures/resources";

const graph = createResourceGraph();

function relationship(type: ResourceClass, propertyName: string): RelationshipAttribute {
    const found = graph.getRelationships(type).find(candidate => candidate.propertyName === propertyName);
    if (!found) throw new Error(`no relationship ${propertyName}`);
    return found;
}

class ArticleDefinition extends ResourceDefinition<Article> {
    constructor() { super(Article); }

    @LoadDatabaseValues()
    beforeUpdate(entities: DiffableEntityHashSet<Article>) {
        return entities;
    }

    @LoadDatabaseValues(false)
    beforeDelete(entities: EntityHashSet<Article>) {
        return entities;
    }
}

describe("HookExecutorHelper", () => {
    let store: MemoryResourceStore;
    let registry: ResourceDefinitionRegistry;

    beforeEach(async () => {
        store = new MemoryResourceStore(graph);
        registry = new ResourceDefinitionRegistry().register(new ArticleDefinition());

        const empty = TargetedFields.empty();
        await store.create(Person, person("1"), empty);
        await store.create(Person, person("2"), empty);
        await store.create(Tag, tag("1"), empty);
        await store.create(Article, Object.assign(article("1"), { owner: person("1") }), empty);
        await store.create(Article, assignTags(Object.assign(article("2"), { owner: person("2") }), [tag("1")]), empty);
    });

    test("returns a container only for implemented hooks", () => {
        const helper = new HookExecutorHelper(registry, store, { loadDatabaseValues: false });

        expect(helper.getResourceHookContainer(Article, ResourceHook.BeforeUpdate)).toBe(registry.get(Article));
        expect(helper.getResourceHookContainer(Article, ResourceHook.OnReturn)).toBeNull();
        expect(helper.getResourceHookContainer(Person, ResourceHook.BeforeUpdate)).toBeNull();
    });

    test("sees definitions registered or cleared after a lookup", () => {
        const helper = new HookExecutorHelper(registry, store, { loadDatabaseValues: false });
        expect(helper.getResourceHookContainer(Person, ResourceHook.BeforeRead)).toBeNull();

        class PersonDefinition extends ResourceDefinition<Person> {
            constructor() { super(Person); }

            beforeRead() {}
        }
        const definition = new PersonDefinition();
        registry.register(definition);
        expect(helper.getResourceHookContainer(Person, ResourceHook.BeforeRead)).toBe(definition);

        registry.clear();
        expect(registry.get(Person)).toBeNull();
        expect(helper.getResourceHookContainer(Person, ResourceHook.BeforeRead)).toBeNull();
        expect(helper.shouldLoadDbValues(Article, ResourceHook.BeforeUpdate)).toBe(false);
    });

    test("a hook's own database values setting wins over the global one", () => {
        const disabled = new HookExecutorHelper(registry, store, { loadDatabaseValues: false });
        const enabled = new HookExecutorHelper(registry, store, { loadDatabaseValues: true });

        expect(disabled.shouldLoadDbValues(Article, ResourceHook.BeforeUpdate)).toBe(true);
        expect(enabled.shouldLoadDbValues(Article, ResourceHook.BeforeDelete)).toBe(false);
        expect(enabled.shouldLoadDbValues(Article, ResourceHook.BeforeUpdateRelationship)).toBe(true);
        expect(disabled.shouldLoadDbValues(Person, ResourceHook.BeforeUpdate)).toBe(false);
    });

    test("loads database values with the requested relationships", async () => {
        const helper = new HookExecutorHelper(registry, store, { loadDatabaseValues: false });
        const owner = relationship(Article, "owner");

        const values = await helper.loadDbValues(Article, [article("1"), article("")], ResourceHook.BeforeUpdate, [owner]);
        expect(values?.values().map(entity => [entity.id, entity.owner?.id])).toEqual([["1", "1"]]);

        await expect(helper.loadDbValues(Article, [article("1")], ResourceHook.BeforeDelete, [owner])).resolves.toBeNull();
    });

    test("finds the entities currently related, minus those already known", async () => {
        const helper = new HookExecutorHelper(registry, store, { loadDatabaseValues: false });
        const lefts = new Map<RelationshipAttribute, Identifiable[]>([
            [relationship(Article, "owner"), [article("1"), article("2")]],
            [relationship(Article, "author"), [article("1")]],
            [relationship(Article, "tags"), [article("2")]]
        ]);

        const affected = await helper.loadImplicitlyAffected(lefts, [person("2")]);
        expect([...affected].map(([key, entities]) => [key.propertyName, entities.values().map(getStringId)])).toEqual([
            ["owner", ["1"]]
        ]);
    });
});
