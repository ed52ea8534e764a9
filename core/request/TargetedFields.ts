import type { RelationshipAttribute } from "@/core/resources/Relationships";

/**
 * Fields a write request explicitly sets, by property name for attributes
 * and by relationship for relationships.
 */
export class TargetedFields {
    public readonly attributes: Set<string>;
    public readonly relationships: Set<RelationshipAttribute>;

    constructor(init: { attributes?: Iterable<string>; relationships?: Iterable<RelationshipAttribute> } = {}) {
        this.attributes = new Set(init.attributes);
        this.relationships = new Set(init.relationships);
    }

    public isTargeted(relationship: RelationshipAttribute): boolean {
        return this.relationships.has(relationship);
    }

    public static empty(): TargetedFields {
        return new TargetedFields();
    }
}
