import { describe, test, expect } from "vitest";
import { HasManyThroughAttribute } from "@/core/resources/Relationships";
import { Article, ArticleTag, createResourceGraph, article, person, tag } from "../../fixtures/resources";

const graph = createResourceGraph();

describe("relationship attributes", () => {
    test("has-one reads the related entity or null", () => {
        const owner = graph.getRelationship(Article, "owner");
        const target = article("1");
        expect(owner?.getValue(target)).toBeNull();

        const alice = person("10");
        target.owner = alice;
        expect(owner?.getValue(target)).toBe(alice);
    });

    test("has-one unwraps an array on write", () => {
        const owner = graph.getRelationship(Article, "owner");
        const target = article("1");
        const alice = person("10");
        owner?.setValue(target, [alice]);
        expect(target.owner).toBe(alice);
    });

    test("has-many-through reads through the join entities", () => {
        const tags = graph.getRelationship(Article, "tags");
        expect(tags).toBeInstanceOf(HasManyThroughAttribute);

        const target = article("1");
        const first = tag("1");
        target.articleTags = [Object.assign(new ArticleTag(), { article: target, tag: first })];
        expect(tags?.getValue(target)).toEqual([first]);
    });

    test("has-many-through rebuilds the join entities on write", () => {
        const tags = graph.getRelationship(Article, "tags");
        const target = article("1");
        const first = tag("1");
        const second = tag("2");

        tags?.setValue(target, [first, second]);

        expect(target.tags).toEqual([first, second]);
        expect(target.articleTags).toHaveLength(2);
        expect(target.articleTags[0]).toBeInstanceOf(ArticleTag);
        expect(target.articleTags[0]?.article).toBe(target);
        expect(target.articleTags[1]?.tag).toBe(second);
    });

    test("has-many-through clears both properties with null", () => {
        const tags = graph.getRelationship(Article, "tags");
        const target = article("1");
        tags?.setValue(target, [tag("1")]);
        tags?.setValue(target, null);

        expect(Reflect.get(target, "tags")).toBeNull();
        expect(Reflect.get(target, "articleTags")).toBeNull();
        expect(tags?.getValue(target)).toBeNull();
    });
});
