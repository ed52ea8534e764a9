import type { Node } from "./Node";

/**
 * All nodes at one depth of the traversal, one per resource type.
 */
export class NodeLayer implements Iterable<Node> {
    constructor(public readonly nodes: Node[]) {}

    public anyEntities(): boolean {
        return this.nodes.some(node => node.uniqueEntities.size > 0);
    }

    public [Symbol.iterator](): Iterator<Node> {
        return this.nodes[Symbol.iterator]();
    }
}
