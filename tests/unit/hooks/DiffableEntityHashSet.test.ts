import { describe, test, expect } from "vitest";
import { DatabaseValuesUnavailableError } from "@/core/ErrorHandler";
import { DiffableEntityHashSet } from "@/core/hooks/execution/DiffableEntityHashSet";
import { RelationshipsDictionary } from "@/core/hooks/execution/RelationshipsDictionary";
import { TargetedFields } from "@/core/request/TargetedFields";
import { getStringId } from "@/core/resources/Identifiable";
import type { RelationshipAttribute } from "@/core/resources/Relationships";
import { Article, Person, Tag, article, createResourceGraph } from "../../fixtures/resources";

const graph = createResourceGraph();
const [owner, author, reviewer, tags] = graph.getRelationships(Article);

describe("DiffableEntityHashSet", () => {
    test("pairs entities with their persisted versions", () => {
        const fresh = article("", "draft");
        const updated = article("1", "new");
        const set = new DiffableEntityHashSet([updated, fresh], [article("1", "old")], new Map(), TargetedFields.empty());

        expect(set.hasDatabaseValues()).toBe(true);
        expect([...set.getDiffs()].map(diff => `${diff.databaseValue.title} -> ${diff.entity.title}`)).toEqual(["old -> new"]);
    });

    test("getDiffs fails without database values", () => {
        const set = new DiffableEntityHashSet([article("1")], null, new Map(), TargetedFields.empty());

        expect(set.hasDatabaseValues()).toBe(false);
        expect(() => [...set.getDiffs()]).toThrow(new DatabaseValuesUnavailableError("Article"));
    });

    test("getAffected tells relationships and targeted attributes apart", () => {
        const first = article("1");
        const second = article("2");
        const relationships = new Map<RelationshipAttribute, Article[]>();
        if (owner) relationships.set(owner, [first]);
        const set = new DiffableEntityHashSet([first, second], null, relationships, new TargetedFields({ attributes: ["title"] }));

        expect(set.getAffected("owner").values()).toEqual([first]);
        expect(set.getAffected("title").values().map(getStringId)).toEqual(["1", "2"]);
        expect(set.getAffected("reviewer").size).toBe(0);
    });
});

describe("RelationshipsDictionary", () => {
    test("groups by relationship and filters by right type", () => {
        if (!owner || !author || !reviewer || !tags) throw new Error("fixture relationships missing");
        const dictionary = new RelationshipsDictionary([
            [owner, [article("1")]],
            [reviewer, [article("1"), article("2"), article("1")]],
            [tags, [article("3")]]
        ]);

        expect(dictionary.get(reviewer)?.size).toBe(2);
        expect([...dictionary.getByRelationship(Person).keys()]).toEqual([owner, reviewer]);
        expect([...dictionary.getByRelationship(Tag).keys()]).toEqual([tags]);
        expect(dictionary.getAffected("author").size).toBe(0);
        expect([...dictionary.getAffected("reviewer").ids()]).toEqual(["1", "2"]);
    });
});
