import { DatabaseValuesUnavailableError } from "@/core/ErrorHandler";
import { IdentifiableSet } from "@/core/resources/IdentifiableSet";
import type { Identifiable } from "@/core/resources/Identifiable";
import type { RelationshipAttribute } from "@/core/resources/Relationships";
import type { TargetedFields } from "@/core/request/TargetedFields";
import type { EntityDiffPair } from "@/types/hooks.types";
import { EntityHashSet } from "./EntityHashSet";

/**
 * Entities of an update request next to their persisted versions.
 */
export class DiffableEntityHashSet<T extends Identifiable> extends EntityHashSet<T> {
    private readonly databaseValues: IdentifiableSet<T> | null;
    private readonly targetedAttributes: ReadonlySet<string>;

    constructor(
        entities: Iterable<T>,
        databaseValues: Iterable<T> | null,
        relationships: Map<RelationshipAttribute, Iterable<T>>,
        targetedFields: TargetedFields
    ) {
        super(entities, relationships);
        this.databaseValues = databaseValues ? new IdentifiableSet(databaseValues) : null;
        this.targetedAttributes = targetedFields.attributes;
    }

    public hasDatabaseValues(): boolean {
        return this.databaseValues !== null;
    }

    /**
     * Pairs every entity with its persisted version. Entities that were never
     * persisted have no pair.
     */
    public *getDiffs(): Generator<EntityDiffPair<T>> {
        const { databaseValues } = this;
        if (databaseValues === null) {
            throw new DatabaseValuesUnavailableError(this.resourceLabel());
        }
        for (const entity of this) {
            const databaseValue = databaseValues.get(entity);
            if (databaseValue) yield { entity, databaseValue };
        }
    }

    /**
     * For a relationship: the entities whose relationship the request
     * populated. For an attribute: every entity, when the request targets it.
     */
    public override getAffected(propertyName: string): IdentifiableSet<T> {
        for (const relationship of this.affectedRelationships.keys()) {
            if (relationship.propertyName === propertyName) {
                return super.getAffected(propertyName);
            }
        }
        if (this.targetedAttributes.has(propertyName)) {
            return new IdentifiableSet(this);
        }
        return new IdentifiableSet<T>();
    }

    private resourceLabel(): string {
        const [first] = this;
        return first ? first.constructor.name : "unknown";
    }
}
