import { identityOf, getStringId, type Identifiable } from "./Identifiable";

/**
 * Insertion-ordered set that treats two instances with the same id as the
 * same entity. The first instance added wins.
 */
export class IdentifiableSet<T extends Identifiable> implements Iterable<T> {
    private readonly items = new Map<string, T>();

    constructor(entities?: Iterable<T>) {
        if (entities) {
            for (const entity of entities) this.add(entity);
        }
    }

    public get size(): number {
        return this.items.size;
    }

    public add(entity: T): boolean {
        const key = identityOf(entity);
        if (this.items.has(key)) return false;
        this.items.set(key, entity);
        return true;
    }

    public has(entity: Identifiable): boolean {
        return this.items.has(identityOf(entity));
    }

    /**
     * The instance held by this set for the given entity's identity
     */
    public get(entity: Identifiable): T | undefined {
        return this.items.get(identityOf(entity));
    }

    public delete(entity: Identifiable): boolean {
        return this.items.delete(identityOf(entity));
    }

    public values(): T[] {
        return [...this.items.values()];
    }

    public ids(): Set<string> {
        return new Set(this.values().map(getStringId));
    }

    /**
     * Own instances whose identity also occurs in `other`
     */
    public intersect(other: Iterable<Identifiable>): IdentifiableSet<T> {
        const keys = new Set<string>();
        for (const entity of other) keys.add(identityOf(entity));
        return new IdentifiableSet(this.values().filter(entity => keys.has(identityOf(entity))));
    }

    /**
     * Own instances whose identity does not occur in `other`
     */
    public except(other: Iterable<Identifiable>): IdentifiableSet<T> {
        const keys = new Set<string>();
        for (const entity of other) keys.add(identityOf(entity));
        return new IdentifiableSet(this.values().filter(entity => !keys.has(identityOf(entity))));
    }

    public filter(predicate: (entity: T) => boolean): IdentifiableSet<T> {
        return new IdentifiableSet(this.values().filter(predicate));
    }

    public [Symbol.iterator](): Iterator<T> {
        return this.items.values();
    }
}
