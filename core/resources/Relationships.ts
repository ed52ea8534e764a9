import { isIdentifiable, type Identifiable, type ResourceClass } from "./Identifiable";

export type RelationshipValue = Identifiable | Identifiable[] | null;

export interface RelationshipAttributeInit {
    leftType: ResourceClass;
    rightType: ResourceClass;
    propertyName: string;
    publicName: string;
    inverseNavigation: string | null;
    canInclude: boolean;
}

/**
 * A navigable edge between two resource types, read and written through the
 * owning entity's property.
 */
export abstract class RelationshipAttribute {
    public abstract readonly isToMany: boolean;
    public readonly leftType: ResourceClass;
    public readonly rightType: ResourceClass;
    public readonly propertyName: string;
    public readonly publicName: string;
    public readonly canInclude: boolean;
    /** Set by the resource graph builder when the inverse is declared on the other side */
    public inverseNavigation: string | null;

    constructor(init: RelationshipAttributeInit) {
        this.leftType = init.leftType;
        this.rightType = init.rightType;
        this.propertyName = init.propertyName;
        this.publicName = init.publicName;
        this.inverseNavigation = init.inverseNavigation;
        this.canInclude = init.canInclude;
    }

    /**
     * `null` means the relationship is not loaded (or a to-one is empty)
     */
    public abstract getValue(entity: object): RelationshipValue;

    public setValue(entity: object, value: RelationshipValue): void {
        Reflect.set(entity, this.propertyName, value);
    }

    public toString(): string {
        return `${this.leftType.name}.${this.propertyName}`;
    }
}

export class HasOneAttribute extends RelationshipAttribute {
    public readonly isToMany = false;

    public getValue(entity: object): Identifiable | null {
        const value: unknown = Reflect.get(entity, this.propertyName);
        return isIdentifiable(value) ? value : null;
    }

    public override setValue(entity: object, value: RelationshipValue): void {
        super.setValue(entity, Array.isArray(value) ? value[0] ?? null : value);
    }
}

export class HasManyAttribute extends RelationshipAttribute {
    public readonly isToMany = true;

    public getValue(entity: object): Identifiable[] | null {
        const value: unknown = Reflect.get(entity, this.propertyName);
        if (!Array.isArray(value)) return null;
        return value.filter(isIdentifiable);
    }

    public override setValue(entity: object, value: RelationshipValue): void {
        super.setValue(entity, value === null || Array.isArray(value) ? value : [value]);
    }
}

export interface HasManyThroughInit extends RelationshipAttributeInit {
    throughProperty: string;
    throughType: new () => object;
    leftProperty: string;
    rightProperty: string;
}

/**
 * Many-to-many relationship persisted as join entities, e.g.
 * `Article.tags` through `Article.articleTags: ArticleTag[]`.
 */
export class HasManyThroughAttribute extends HasManyAttribute {
    public readonly throughProperty: string;
    public readonly throughType: new () => object;
    public readonly leftProperty: string;
    public readonly rightProperty: string;

    constructor(init: HasManyThroughInit) {
        super(init);
        this.throughProperty = init.throughProperty;
        this.throughType = init.throughType;
        this.leftProperty = init.leftProperty;
        this.rightProperty = init.rightProperty;
    }

    public override getValue(entity: object): Identifiable[] | null {
        const joinEntities: unknown = Reflect.get(entity, this.throughProperty);
        if (!Array.isArray(joinEntities)) return null;
        const related: unknown[] = joinEntities.map((joinEntity: unknown) =>
            typeof joinEntity === "object" && joinEntity !== null
                ? Reflect.get(joinEntity, this.rightProperty)
                : undefined
        );
        return related.filter(isIdentifiable);
    }

    public override setValue(entity: object, value: RelationshipValue): void {
        super.setValue(entity, value);
        if (value === null) {
            Reflect.set(entity, this.throughProperty, null);
            return;
        }
        const related = Array.isArray(value) ? value : [value];
        const joinEntities = related.map(relatedEntity => {
            const joinEntity = new this.throughType();
            Reflect.set(joinEntity, this.leftProperty, entity);
            Reflect.set(joinEntity, this.rightProperty, relatedEntity);
            return joinEntity;
        });
        Reflect.set(entity, this.throughProperty, joinEntities);
    }
}

/**
 * A path of relationships, e.g. `article.owner.articles`
 */
export type RelationshipChain = RelationshipAttribute[];
