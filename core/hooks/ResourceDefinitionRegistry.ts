import { logger as MainLogger } from "@/core/Logger";
import type { Identifiable, ResourceClass } from "@/core/resources/Identifiable";
import type { ResourceDefinition } from "./ResourceDefinition";

const logger = MainLogger.child({ scope: "ResourceDefinitionRegistry" });

export class ResourceDefinitionRegistry {
    private readonly definitions = new Map<Function, ResourceDefinition<Identifiable>>();

    public register<T extends Identifiable>(definition: ResourceDefinition<T>): this {
        if (this.definitions.has(definition.resourceType)) {
            logger.warn({ resource: definition.resourceType.name }, "Replacing an already registered resource definition");
        }
        this.definitions.set(definition.resourceType, definition);
        return this;
    }

    public get(type: ResourceClass): ResourceDefinition<Identifiable> | null {
        return this.definitions.get(type) ?? null;
    }

    public clear(): void {
        this.definitions.clear();
    }
}
