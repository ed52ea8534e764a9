import "reflect-metadata";

export const LOAD_DATABASE_VALUES_KEY = "jsonapi:loadDatabaseValues";

/**
 * Opt a hook in (or out) of receiving persisted values. Only valid on
 * `beforeUpdate`, `beforeUpdateRelationship` and `beforeDelete`.
 */
export function LoadDatabaseValues(enabled: boolean = true) {
    return function (target: object, propertyKey: string, _descriptor: PropertyDescriptor) {
        Reflect.defineMetadata(LOAD_DATABASE_VALUES_KEY, enabled, target, propertyKey);
    };
}

export function getLoadDatabaseValues(target: object, propertyKey: string): boolean | undefined {
    const value: unknown = Reflect.getMetadata(LOAD_DATABASE_VALUES_KEY, target, propertyKey);
    return typeof value === "boolean" ? value : undefined;
}
