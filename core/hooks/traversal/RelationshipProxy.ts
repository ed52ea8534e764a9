import type { Identifiable, ResourceClass } from "@/core/resources/Identifiable";
import type { RelationshipAttribute, RelationshipValue } from "@/core/resources/Relationships";

export type RelationshipProxyValue =
    | { kind: "single"; entity: Identifiable | null }
    | { kind: "collection"; entities: Identifiable[] };

/**
 * One navigable relationship as the traversal sees it. To-one and to-many
 * (including many-to-many through join entities) read the same way.
 */
export class RelationshipProxy {
    constructor(
        public readonly attribute: RelationshipAttribute,
        public readonly inverse: RelationshipAttribute | null
    ) {}

    public get leftType(): ResourceClass {
        return this.attribute.leftType;
    }

    public get rightType(): ResourceClass {
        return this.attribute.rightType;
    }

    public get isToMany(): boolean {
        return this.attribute.isToMany;
    }

    public getValue(owner: object): RelationshipProxyValue {
        const value = this.attribute.getValue(owner);
        if (this.attribute.isToMany) {
            return { kind: "collection", entities: value === null ? [] : Array.isArray(value) ? value : [value] };
        }
        return { kind: "single", entity: value === null || Array.isArray(value) ? null : value };
    }

    /**
     * Related entities as a flat list, empty when nothing is assigned
     */
    public getRelated(owner: object): Identifiable[] {
        const value = this.getValue(owner);
        if (value.kind === "collection") return value.entities;
        return value.entity ? [value.entity] : [];
    }

    /**
     * Whether the owner holds a non-null, non-empty value
     */
    public hasValue(owner: object): boolean {
        return this.getRelated(owner).length > 0;
    }

    public setValue(owner: object, value: RelationshipValue): void {
        this.attribute.setValue(owner, value);
    }

    public toString(): string {
        return this.attribute.toString();
    }
}
