import "reflect-metadata";
import { ResourceSetupError } from "@/core/ErrorHandler";
import { DATABASE_VALUE_HOOKS, ResourceHook } from "@/types/hooks.types";
import type { Identifiable } from "@/core/resources/Identifiable";
import { LOAD_DATABASE_VALUES_KEY, getLoadDatabaseValues } from "./LoadDatabaseValues";
import { ResourceDefinition } from "./ResourceDefinition";

const HOOK_NAMES: ReadonlySet<string> = new Set(Object.values(ResourceHook));

function isResourceHook(name: string): name is ResourceHook {
    return HOOK_NAMES.has(name);
}

/**
 * Which hooks a resource definition overrides, and which of them asked for
 * database values. Resolved once per definition.
 */
export class HooksDiscovery {
    public readonly implementedHooks: ReadonlySet<ResourceHook>;
    private readonly databaseValuesEnabled = new Set<ResourceHook>();
    private readonly databaseValuesDisabled = new Set<ResourceHook>();

    constructor(definition: ResourceDefinition<Identifiable>) {
        const implemented = new Set<ResourceHook>();
        for (const hook of Object.values(ResourceHook)) {
            if (Reflect.get(definition, hook) !== Reflect.get(ResourceDefinition.prototype, hook)) {
                implemented.add(hook);
            }
        }
        this.implementedHooks = implemented;
        this.collectDatabaseValueOptions(definition);
    }

    public isImplemented(hook: ResourceHook): boolean {
        return this.implementedHooks.has(hook);
    }

    /**
     * `true`/`false` when the hook opted in or out, `undefined` otherwise
     */
    public databaseValuesOption(hook: ResourceHook): boolean | undefined {
        if (this.databaseValuesDisabled.has(hook)) return false;
        if (this.databaseValuesEnabled.has(hook)) return true;
        return undefined;
    }

    private collectDatabaseValueOptions(definition: ResourceDefinition<Identifiable>) {
        let prototype: unknown = Object.getPrototypeOf(definition);
        while (typeof prototype === "object" && prototype !== null && prototype !== ResourceDefinition.prototype) {
            for (const name of Object.getOwnPropertyNames(prototype)) {
                if (!Reflect.hasOwnMetadata(LOAD_DATABASE_VALUES_KEY, prototype, name)) continue;
                if (!isResourceHook(name) || !DATABASE_VALUE_HOOKS.has(name)) {
                    throw new ResourceSetupError(
                        `@LoadDatabaseValues is not supported on '${definition.constructor.name}.${name}'; ` +
                        `use it on ${[...DATABASE_VALUE_HOOKS].join(", ")}.`
                    );
                }
                // the most derived declaration wins
                if (this.databaseValuesEnabled.has(name) || this.databaseValuesDisabled.has(name)) continue;
                const enabled = getLoadDatabaseValues(prototype, name);
                if (enabled === true) this.databaseValuesEnabled.add(name);
                if (enabled === false) this.databaseValuesDisabled.add(name);
            }
            prototype = Object.getPrototypeOf(prototype);
        }
    }
}
