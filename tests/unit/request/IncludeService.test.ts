import { describe, test, expect } from "vitest";
import { InvalidQueryStringParameterError } from "@/core/ErrorHandler";
import { IncludeService } from "@/core/request/IncludeService";
import { HasOne, Resource } from "@/core/resources/Decorators";
import { ResourceGraphBuilder } from "@/core/resources/ResourceGraph";
import { Article, createResourceGraph } from "../../fixtures/resources";

@Resource()
class Key {
    id: string = "";
}

@Resource()
class Safe {
    id: string = "";

    @HasOne(() => Key, { publicName: "combination", canInclude: false })
    key: Key | null = null;
}

const graph = createResourceGraph();

describe("IncludeService", () => {
    test("parses dotted paths into relationship chains", () => {
        const service = new IncludeService(graph).parse(Article, "owner.articles, tags");
        expect(service.get().map(chain => chain.map(relationship => relationship.propertyName))).toEqual([
            ["owner", "articles"],
            ["tags"]
        ]);
    });

    test("an absent or blank value yields no chains", () => {
        const service = new IncludeService(graph);
        expect(service.parse(Article, undefined).get()).toEqual([]);
        expect(service.parse(Article, "  ").get()).toEqual([]);
    });

    test("parsing again replaces earlier chains", () => {
        const service = new IncludeService(graph).parse(Article, "owner");
        expect(service.parse(Article, "tags").get().map(chain => chain[0]?.propertyName)).toEqual(["tags"]);
    });

    test("returned chains are copies", () => {
        const service = new IncludeService(graph).parse(Article, "owner.articles");
        service.get()[0]?.pop();
        expect(service.get()[0]).toHaveLength(2);
    });

    test("rejects unknown relationships with the resource that lacks them", () => {
        const parse = () => new IncludeService(graph).parse(Article, "owner.editor");
        expect(parse).toThrow(InvalidQueryStringParameterError);
        expect(parse).toThrow("Relationship 'editor' in 'owner.editor' does not exist on resource 'people'.");
    });

    test("rejects relationships that may not be included", () => {
        const safeGraph = new ResourceGraphBuilder().add(Safe).add(Key).build();
        expect(() => new IncludeService(safeGraph).parse(Safe, "combination")).toThrow(
            "Including the relationship 'combination' on 'safes' is not allowed."
        );
    });
});
