import { getMetadataStorage } from "@/core/metadata";
import type { HasManyThroughOptions, RelationshipOptions } from "@/core/metadata";
import type { ResourceClass } from "./Identifiable";

/**
 * Default public resource name: camel-cased plural of the class name
 */
export function formatResourceName(className: string): string {
    const camel = className.charAt(0).toLowerCase() + className.slice(1);
    if (/[^aeiou]y$/.test(camel)) return camel.slice(0, -1) + "ies";
    if (/(s|x|z|ch|sh)$/.test(camel)) return camel + "es";
    return camel + "s";
}

export function Resource(resourceName?: string) {
    return function <T extends ResourceClass>(target: T): T {
        getMetadataStorage().collectResourceMetadata({
            target,
            resourceName: resourceName ?? formatResourceName(target.name),
        });
        return target;
    };
}

export function Attr(options?: { publicName?: string }) {
    return (target: object, propertyKey: string) => {
        getMetadataStorage().collectAttributeMetadata(target.constructor, {
            propertyName: propertyKey,
            publicName: options?.publicName ?? propertyKey,
        });
    };
}

export function HasOne(relatedType: () => ResourceClass, options: RelationshipOptions = {}) {
    return (target: object, propertyKey: string) => {
        getMetadataStorage().collectRelationshipMetadata(target.constructor, {
            kind: "hasOne",
            propertyName: propertyKey,
            relatedType,
            options,
        });
    };
}

export function HasMany(relatedType: () => ResourceClass, options: RelationshipOptions = {}) {
    return (target: object, propertyKey: string) => {
        getMetadataStorage().collectRelationshipMetadata(target.constructor, {
            kind: "hasMany",
            propertyName: propertyKey,
            relatedType,
            options,
        });
    };
}

/**
 * Many-to-many through a join entity:
 *
 * ```ts
 * @HasManyThrough(() => Tag, {
 *     through: "articleTags",
 *     throughType: () => ArticleTag,
 *     leftProperty: "article",
 *     rightProperty: "tag",
 * })
 * tags: Tag[] = [];
 * ```
 */
export function HasManyThrough(relatedType: () => ResourceClass, options: HasManyThroughOptions) {
    return (target: object, propertyKey: string) => {
        getMetadataStorage().collectRelationshipMetadata(target.constructor, {
            kind: "hasManyThrough",
            propertyName: propertyKey,
            relatedType,
            options,
        });
    };
}
