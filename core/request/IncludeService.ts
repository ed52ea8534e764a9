import { InvalidQueryStringParameterError } from "@/core/ErrorHandler";
import type { ResourceClass } from "@/core/resources/Identifiable";
import type { ResourceGraph } from "@/core/resources/ResourceGraph";
import type { RelationshipChain } from "@/core/resources/Relationships";

/**
 * Parses an `include` query value such as `"owner.articles,tags"` into
 * relationship chains, using public relationship names.
 */
export class IncludeService {
    private readonly chains: RelationshipChain[] = [];

    constructor(private readonly resourceGraph: ResourceGraph) {}

    public parse(type: ResourceClass, value: string | undefined): this {
        this.chains.length = 0;
        if (!value || value.trim() === "") return this;

        for (const path of value.split(",")) {
            this.chains.push(this.parseChain(type, path.trim()));
        }
        return this;
    }

    /**
     * Copies of the parsed chains
     */
    public get(): RelationshipChain[] {
        return this.chains.map(chain => [...chain]);
    }

    private parseChain(type: ResourceClass, path: string): RelationshipChain {
        const chain: RelationshipChain = [];
        let current = type;
        for (const publicName of path.split(".")) {
            const resourceName = this.resourceGraph.getResourceContext(current).resourceName;
            const relationship = this.resourceGraph.getRelationship(current, publicName);
            if (!relationship) {
                throw new InvalidQueryStringParameterError(
                    "include",
                    `Relationship '${publicName}' in '${path}' does not exist on resource '${resourceName}'.`
                );
            }
            if (!relationship.canInclude) {
                throw new InvalidQueryStringParameterError(
                    "include",
                    `Including the relationship '${publicName}' on '${resourceName}' is not allowed.`
                );
            }
            chain.push(relationship);
            current = relationship.rightType;
        }
        return chain;
    }
}
