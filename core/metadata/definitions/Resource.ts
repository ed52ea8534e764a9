import type { ResourceClass } from "../../resources/Identifiable";

export interface ResourceMetadata {
    target: ResourceClass;
    resourceName: string;
}

export interface AttributeMetadata {
    propertyName: string;
    publicName: string;
}

export interface RelationshipOptions {
    /** Property on the related type that points back to the owning type */
    inverse?: string;
    /** Name used in include chains; defaults to the property name */
    publicName?: string;
    /** Whether the relationship may appear in an include chain */
    canInclude?: boolean;
}

export interface HasManyThroughOptions extends RelationshipOptions {
    /** Property on the owning type holding the join entities */
    through: string;
    throughType: () => new () => object;
    /** Join entity property pointing at the owning entity */
    leftProperty: string;
    /** Join entity property pointing at the related entity */
    rightProperty: string;
}

export type RelationshipMetadata =
    | {
        kind: "hasOne" | "hasMany";
        propertyName: string;
        relatedType: () => ResourceClass;
        options: RelationshipOptions;
    }
    | {
        kind: "hasManyThrough";
        propertyName: string;
        relatedType: () => ResourceClass;
        options: HasManyThroughOptions;
    };
