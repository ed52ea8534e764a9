/**
 * Anything with an id that is unique within its resource type.
 */
export interface Identifiable {
    id: string | number;
}

export type ResourceClass<T extends Identifiable = Identifiable> = new () => T;

export function isIdentifiable(value: unknown): value is Identifiable {
    if (typeof value !== "object" || value === null) return false;
    const id: unknown = Reflect.get(value, "id");
    return typeof id === "string" || typeof id === "number";
}

/**
 * The id as used on the wire. Unsaved entities (no id, or the numeric
 * default 0) have an empty string id.
 */
export function getStringId(entity: Identifiable): string {
    const { id } = entity;
    if (id === undefined || id === null || id === 0) return "";
    return String(id);
}

const instanceTokens = new WeakMap<object, string>();
let tokenCounter = 0;

/**
 * Identity used by every set operation of the engine: the string id, or a
 * per-instance token for entities that have no id yet.
 */
export function identityOf(entity: Identifiable): string {
    const stringId = getStringId(entity);
    if (stringId !== "") return `id:${stringId}`;
    let token = instanceTokens.get(entity);
    if (!token) {
        token = `ref:${++tokenCounter}`;
        instanceTokens.set(entity, token);
    }
    return token;
}
