import { describe, test, expect } from "vitest";
import { TraversalHelper } from "@/core/hooks/traversal/TraversalHelper";
import { TargetedFields } from "@/core/request/TargetedFields";
import { getStringId, identityOf } from "@/core/resources/Identifiable";
import { Article, Person, createResourceGraph, article, person } from "../../fixtures/resources";

const graph = createResourceGraph();

function relationship(type: typeof Article | typeof Person, name: string) {
    const found = graph.getRelationship(type, name);
    if (!found) throw new Error(`missing relationship ${name}`);
    return found;
}

describe("TraversalHelper", () => {
    test("root node records only populated relationships", () => {
        const first = article("1");
        first.owner = person("10");
        const node = new TraversalHelper(graph).createRootNode(Article, [first, article("2")]);

        expect(node.relationshipsToNextLayer.map(proxy => proxy.attribute.propertyName)).toEqual(["owner"]);
        expect(node.allRelationshipsToNextLayer).toHaveLength(4);
    });

    test("a targeted relationship is populated even when empty", () => {
        const owner = relationship(Article, "owner");
        const traversal = new TraversalHelper(graph, new TargetedFields({ relationships: [owner] }));
        const target = article("1");
        const node = traversal.createRootNode(Article, [target]);

        expect(node.relationshipsToNextLayer.map(proxy => proxy.attribute)).toEqual([owner]);
        expect(node.leftsToNextLayer().get(owner)?.values()).toEqual([target]);
    });

    test("an entity reached through two relationships appears once in the layer", () => {
        const first = article("1");
        const second = article("2");
        const ownerInstance = person("10");
        first.owner = ownerInstance;
        second.author = person("10");

        const traversal = new TraversalHelper(graph);
        const layer = traversal.createNextLayer(traversal.createRootNode(Article, [first, second]));

        expect(layer.nodes).toHaveLength(1);
        const [node] = layer.nodes;
        expect(node?.resourceType).toBe(Person);
        expect(node?.uniqueEntities.size).toBe(1);
        expect(node?.uniqueEntities.values()[0]).toBe(ownerInstance);
        expect(node?.relationshipsFromPreviousLayer.size).toBe(2);
    });

    test("every right entity is reachable from a left entity of its group", () => {
        const first = article("1");
        const second = article("2");
        first.owner = person("10");
        second.owner = person("11");
        second.author = person("12");

        const traversal = new TraversalHelper(graph);
        const [node] = traversal.createNextLayer(traversal.createRootNode(Article, [first, second])).nodes;
        expect(node).toBeDefined();
        if (!node) return;

        for (const group of node.relationshipsFromPreviousLayer) {
            for (const right of group.rightEntities) {
                const reachable = group.leftEntities.values().some(left =>
                    group.proxy.getRelated(left).some(related => identityOf(related) === identityOf(right))
                );
                expect(reachable).toBe(true);
            }
        }
        const owner = relationship(Article, "owner");
        expect(node.relationshipsFromPreviousLayer.getLeftEntities().get(owner)?.values()).toEqual([first, second]);
        expect([...(node.relationshipsFromPreviousLayer.getRightEntities().get(owner)?.ids() ?? [])]).toEqual(["10", "11"]);
    });

    test("stops on cyclic graphs", () => {
        const first = person("1");
        const second = person("2");
        first.mentor = second;
        second.mentor = first;

        const traversal = new TraversalHelper(graph);
        const layer = traversal.createNextLayer(traversal.createRootNode(Person, [first]));
        expect(layer.nodes.map(node => node.uniqueEntities.values().map(getStringId))).toEqual([["2"]]);

        const next = traversal.createNextLayer(layer.nodes);
        expect(next.anyEntities()).toBe(false);
        expect(next.nodes).toHaveLength(0);
    });
});

describe("node reassignment", () => {
    test("a to-one reference to an excluded entity becomes null", () => {
        const first = article("1");
        const second = article("2");
        first.owner = person("10");
        const kept = person("11");
        second.owner = kept;

        const traversal = new TraversalHelper(graph);
        const [node] = traversal.createNextLayer(traversal.createRootNode(Article, [first, second])).nodes;
        node?.updateUnique([person("11")]);
        node?.reassign();

        expect(first.owner).toBeNull();
        expect(second.owner).toBe(kept);
    });

    test("a collection loses exactly the excluded members", () => {
        const owner = person("1");
        const [a1, a2, a3] = [article("1"), article("2"), article("3")];
        owner.articles = [a1, a2, a3];

        const traversal = new TraversalHelper(graph);
        const [node] = traversal.createNextLayer(traversal.createRootNode(Person, [owner])).nodes;
        node?.updateUnique([a1, a3]);
        node?.reassign();

        expect(owner.articles).toEqual([a1, a3]);
        expect(owner.articles[1]).toBe(a3);
    });

    test("references to entities outside the layer are left alone", () => {
        const owner = person("1");
        const a1 = article("1");
        owner.articles = [a1];
        a1.author = owner;

        const traversal = new TraversalHelper(graph);
        const articles = traversal.createNextLayer(traversal.createRootNode(Person, [owner]));
        // owner was visited in the root layer, so it is not reached again
        expect(traversal.createNextLayer(articles.nodes).anyEntities()).toBe(false);

        const [node] = articles.nodes;
        node?.updateUnique([a1]);
        node?.reassign();
        expect(a1.author).toBe(owner);
    });

    test("root reassignment removes excluded entities from the caller's array", () => {
        const entities = [article("1"), article("2"), article("3")];
        const source = entities;
        const node = new TraversalHelper(graph).createRootNode(Article, entities);
        node.updateUnique([article("2")]);
        node.reassign(entities);

        expect(source).toBe(entities);
        expect(entities.map(getStringId)).toEqual(["2"]);
    });
});
