import { ResourceNotFoundError } from "@/core/ErrorHandler";
import { logger as MainLogger } from "@/core/Logger";
import { getStringId, type Identifiable, type ResourceClass } from "@/core/resources/Identifiable";
import type { ResourceGraph } from "@/core/resources/ResourceGraph";
import type { RelationshipAttribute, RelationshipChain } from "@/core/resources/Relationships";
import type { TargetedFields } from "@/core/request/TargetedFields";
import type { ResourceRepository } from "./ResourceRepository";

const logger = MainLogger.child({ scope: "MemoryResourceStore" });

type Row = Map<string, unknown>;

/**
 * Instances handed out during one read or write, one per (type, id)
 */
class IdentityMap {
    private readonly instances = new Map<ResourceClass, Map<string, Identifiable>>();

    public get(type: ResourceClass, id: string): Identifiable | undefined {
        return this.instances.get(type)?.get(id);
    }

    public set(type: ResourceClass, id: string, entity: Identifiable) {
        let byId = this.instances.get(type);
        if (!byId) {
            byId = new Map();
            this.instances.set(type, byId);
        }
        byId.set(id, entity);
    }
}

/**
 * In-process repository. Attributes live in rows, relationships as edges
 * between ids. Writes keep both sides of an inverse pair consistent.
 */
export class MemoryResourceStore implements ResourceRepository {
    private readonly rows = new Map<ResourceClass, Map<string, Row>>();
    private readonly edges = new Map<RelationshipAttribute, Map<string, string[]>>();
    private nextId = 1;

    constructor(private readonly resourceGraph: ResourceGraph) {}

    public async findAll<T extends Identifiable>(type: ResourceClass<T>, include: RelationshipChain[] = []): Promise<T[]> {
        const ids = [...this.table(type).keys()];
        logger.debug({ resource: type.name, count: ids.length }, "findAll");
        return this.read(type, ids, include);
    }

    public async findByIds<T extends Identifiable>(type: ResourceClass<T>, ids: string[], include: RelationshipChain[] = []): Promise<T[]> {
        const table = this.table(type);
        const existing = [...new Set(ids)].filter(id => table.has(id));
        logger.debug({ resource: type.name, ids: existing }, "findByIds");
        return this.read(type, existing, include);
    }

    public async create<T extends Identifiable>(type: ResourceClass<T>, entity: T, targetedFields: TargetedFields): Promise<T> {
        const table = this.table(type);
        const written = this.resourceGraph.getRelationships(type).filter(relationship =>
            targetedFields.isTargeted(relationship) || relatedOf(relationship, entity).length > 0
        );
        this.assertRelatedExist(type, getStringId(entity), entity, written);

        if (getStringId(entity) === "") {
            let next = this.nextId++;
            while (table.has(String(next))) next = this.nextId++;
            entity.id = typeof entity.id === "number" ? next : String(next);
        }
        const id = getStringId(entity);
        const row: Row = new Map([["id", entity.id]]);
        for (const attribute of this.resourceGraph.getAttributes(type)) {
            row.set(attribute.propertyName, Reflect.get(entity, attribute.propertyName));
        }
        table.set(id, row);

        this.writeRelationships(entity, id, written);
        logger.debug({ resource: type.name, id }, "create");
        return this.readOne(type, id, written.map(relationship => [relationship]));
    }

    public async update<T extends Identifiable>(type: ResourceClass<T>, entity: T, targetedFields: TargetedFields): Promise<T> {
        const id = getStringId(entity);
        const row = this.table(type).get(id);
        if (!row) {
            throw new ResourceNotFoundError(this.resourceGraph.getResourceContext(type).resourceName, id);
        }
        const written = this.resourceGraph.getRelationships(type).filter(relationship => targetedFields.isTargeted(relationship));
        this.assertRelatedExist(type, id, entity, written);

        for (const attribute of this.resourceGraph.getAttributes(type)) {
            if (targetedFields.attributes.has(attribute.propertyName)) {
                row.set(attribute.propertyName, Reflect.get(entity, attribute.propertyName));
            }
        }
        this.writeRelationships(entity, id, written);
        logger.debug({ resource: type.name, id }, "update");
        return this.readOne(type, id, written.map(relationship => [relationship]));
    }

    public async setRelationship(type: ResourceClass, id: string, relationship: RelationshipAttribute, relatedIds: string[]): Promise<void> {
        if (!this.table(type).has(id)) {
            throw new ResourceNotFoundError(this.resourceGraph.getResourceContext(type).resourceName, id);
        }
        this.assertExists(relationship.rightType, relatedIds);
        this.setEdges(relationship, id, relatedIds);
        logger.debug({ resource: type.name, id, relationship: relationship.propertyName, relatedIds }, "setRelationship");
    }

    public async delete(type: ResourceClass, id: string): Promise<boolean> {
        const table = this.table(type);
        if (!table.has(id)) return false;

        for (const relationship of this.resourceGraph.getRelationships(type)) {
            this.setEdges(relationship, id, []);
        }
        // relationships without an inverse still point at the deleted id
        for (const [relationship, byLeft] of this.edges) {
            if (relationship.rightType !== type) continue;
            for (const [leftId, rightIds] of byLeft) {
                byLeft.set(leftId, rightIds.filter(rightId => rightId !== id));
            }
        }
        table.delete(id);
        logger.debug({ resource: type.name, id }, "delete");
        return true;
    }

    private table(type: ResourceClass): Map<string, Row> {
        let table = this.rows.get(type);
        if (!table) {
            table = new Map();
            this.rows.set(type, table);
        }
        return table;
    }

    private edgesOf(relationship: RelationshipAttribute): Map<string, string[]> {
        let byLeft = this.edges.get(relationship);
        if (!byLeft) {
            byLeft = new Map();
            this.edges.set(relationship, byLeft);
        }
        return byLeft;
    }

    private assertExists(type: ResourceClass, ids: string[]) {
        const table = this.table(type);
        for (const id of ids) {
            if (!table.has(id)) {
                throw new ResourceNotFoundError(this.resourceGraph.getResourceContext(type).resourceName, id);
            }
        }
    }

    /**
     * Checked before anything is written. A reference of `type` to its own
     * `id` counts as existing.
     */
    private assertRelatedExist(type: ResourceClass, id: string, entity: Identifiable, relationships: RelationshipAttribute[]) {
        for (const relationship of relationships) {
            const relatedIds = relatedOf(relationship, entity)
                .map(getStringId)
                .filter(relatedId => relationship.rightType !== type || relatedId !== id || id === "");
            this.assertExists(relationship.rightType, relatedIds);
        }
    }

    /**
     * Writes the relationship values held by `entity`, then replaces them on
     * the entity with the instances the store knows for those ids.
     */
    private writeRelationships(entity: Identifiable, id: string, relationships: RelationshipAttribute[]) {
        const tracked = new IdentityMap();
        for (const relationship of relationships) {
            const relatedIds = relatedOf(relationship, entity).map(getStringId);
            this.setEdges(relationship, id, relatedIds);

            const substitutes = this.materialize(relationship.rightType, relatedIds, tracked);
            relationship.setValue(entity, relationship.isToMany ? substitutes : substitutes[0] ?? null);
        }
    }

    /**
     * Replaces the right side of `relationship` for `leftId`. When an inverse
     * is declared, the other side follows: a to-one inverse moves the right
     * entity away from its previous holder.
     */
    private setEdges(relationship: RelationshipAttribute, leftId: string, rightIds: string[]) {
        const byLeft = this.edgesOf(relationship);
        const previous = byLeft.get(leftId) ?? [];
        const unique = [...new Set(rightIds)];
        const next = relationship.isToMany ? unique : unique.slice(0, 1);
        byLeft.set(leftId, next);

        const inverse = this.resourceGraph.getInverse(relationship);
        if (!inverse) return;
        const inverseByRight = this.edgesOf(inverse);

        for (const removed of previous.filter(rightId => !next.includes(rightId))) {
            const lefts = inverseByRight.get(removed) ?? [];
            inverseByRight.set(removed, lefts.filter(candidate => candidate !== leftId));
        }
        for (const added of next.filter(rightId => !previous.includes(rightId))) {
            const holders = inverseByRight.get(added) ?? [];
            if (inverse.isToMany) {
                if (!holders.includes(leftId)) inverseByRight.set(added, [...holders, leftId]);
                continue;
            }
            for (const holder of holders) {
                if (holder === leftId) continue;
                const held = byLeft.get(holder) ?? [];
                byLeft.set(holder, held.filter(rightId => rightId !== added));
            }
            inverseByRight.set(added, [leftId]);
        }
    }

    private async readOne<T extends Identifiable>(type: ResourceClass<T>, id: string, include: RelationshipChain[]): Promise<T> {
        const [entity] = await this.read(type, [id], include);
        if (!entity) {
            throw new ResourceNotFoundError(this.resourceGraph.getResourceContext(type).resourceName, id);
        }
        return entity;
    }

    private async read<T extends Identifiable>(type: ResourceClass<T>, ids: string[], include: RelationshipChain[]): Promise<T[]> {
        const identityMap = new IdentityMap();
        const roots = this.materialize(type, ids, identityMap);
        for (const chain of include) {
            this.loadChain(roots, chain, identityMap);
        }
        return roots;
    }

    private loadChain(owners: Identifiable[], chain: RelationshipChain, identityMap: IdentityMap) {
        let current = owners;
        for (const relationship of chain) {
            const reached: Identifiable[] = [];
            const byLeft = this.edgesOf(relationship);
            for (const owner of current) {
                const related = this.materialize(relationship.rightType, byLeft.get(getStringId(owner)) ?? [], identityMap);
                relationship.setValue(owner, relationship.isToMany ? related : related[0] ?? null);
                reached.push(...related);
            }
            current = reached;
        }
    }

    private materialize<T extends Identifiable>(type: ResourceClass<T>, ids: string[], identityMap: IdentityMap): T[] {
        const table = this.table(type);
        const entities: T[] = [];
        for (const id of ids) {
            const known = identityMap.get(type, id);
            if (known instanceof type) {
                entities.push(known);
                continue;
            }
            const row = table.get(id);
            if (!row) continue;
            const entity = new type();
            for (const [property, value] of row) Reflect.set(entity, property, value);
            identityMap.set(type, id, entity);
            entities.push(entity);
        }
        return entities;
    }
}

function relatedOf(relationship: RelationshipAttribute, entity: object): Identifiable[] {
    const value = relationship.getValue(entity);
    if (value === null) return [];
    return Array.isArray(value) ? value : [value];
}
