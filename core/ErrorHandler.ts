import * as z from "zod";
import { logger } from "./Logger";
import config from "./Config";
import { getErrorMessage, mapZodIssueToErrorCode, type ErrorCategory } from "../utils/errorMessages";

/**
 * A single JSON:API error object
 */
export interface ErrorObject {
    status: string;
    code: string;
    title: string;
    detail?: string;
    source?: { pointer?: string; parameter?: string };
    meta?: Record<string, unknown>;
}

export interface ErrorDocument {
    errors: ErrorObject[];
}

/**
 * Base class for every error the library raises on purpose.
 * Carries the HTTP status and error code rendered into the error document.
 */
export class JsonApiError extends Error {
    public readonly status: number;
    public readonly code: string;
    public readonly category: ErrorCategory;
    public readonly suggestion?: string;
    public readonly source?: ErrorObject["source"];

    constructor(status: number, code: string, detail?: string, source?: ErrorObject["source"]) {
        const info = getErrorMessage(code);
        super(detail ?? info.userMessage);
        this.name = new.target.name;
        this.status = status;
        this.code = code;
        this.category = info.category;
        this.suggestion = info.suggestion;
        this.source = source;
    }

    public toErrorObject(): ErrorObject {
        const info = getErrorMessage(this.code);
        return {
            status: String(this.status),
            code: this.code,
            title: info.userMessage,
            detail: this.message,
            ...(this.source && { source: this.source }),
            ...(this.suggestion && { meta: { suggestion: this.suggestion } })
        };
    }
}

export class ResourceNotFoundError extends JsonApiError {
    constructor(resourceName: string, id: string) {
        super(404, "RESOURCE_NOT_FOUND", `Resource of type '${resourceName}' with id '${id}' does not exist.`);
    }
}

export class RelationshipNotFoundError extends JsonApiError {
    constructor(resourceName: string, relationshipName: string) {
        super(404, "UNKNOWN_RELATIONSHIP", `Resource '${resourceName}' does not contain a relationship named '${relationshipName}'.`);
    }
}

export class InvalidRelationshipDataError extends JsonApiError {
    constructor(resourceName: string, relationshipName: string) {
        super(400, "INVALID_RELATIONSHIP_DATA", `Relationship '${relationshipName}' of '${resourceName}' is to-one and takes at most one related id.`);
    }
}

export class ResourceForbiddenError extends JsonApiError {
    constructor(detail: string) {
        super(403, "RESOURCE_FILTERED", detail);
    }
}

export class InvalidQueryStringParameterError extends JsonApiError {
    constructor(parameter: string, detail: string, code = "INVALID_INCLUDE") {
        super(400, code, detail, { parameter });
    }
}

/**
 * Raised when a hook implementation breaks the response contract,
 * e.g. returns several entities for a single-resource response.
 */
export class HookContractError extends JsonApiError {
    constructor(detail: string) {
        super(500, "HOOK_CONTRACT_VIOLATION", detail);
    }
}

export class ResourceSetupError extends JsonApiError {
    constructor(detail: string) {
        super(500, "RESOURCE_SETUP", detail);
    }
}

export class DatabaseValuesUnavailableError extends JsonApiError {
    constructor(resourceName: string) {
        super(500, "DATABASE_VALUES_UNAVAILABLE", `Cannot compute diffs for '${resourceName}': database values were not loaded.`);
    }
}

export function responseError(status: number, code: string, detail?: string): JsonApiError {
    return new JsonApiError(status, code, detail);
}

/**
 * Render any thrown value into a JSON:API error document.
 */
export function toErrorDocument(err: unknown): ErrorDocument {
    if (err instanceof JsonApiError) {
        return { errors: [err.toErrorObject()] };
    }

    if (err instanceof z.ZodError) {
        const errors = err.issues.map((issue): ErrorObject => {
            const received = issue.code === "invalid_type" ? issue.received : undefined;
            const code = mapZodIssueToErrorCode(issue.code, received);
            const info = getErrorMessage(code);
            return {
                status: "422",
                code,
                title: info.userMessage,
                detail: issue.message,
                source: { pointer: `/data/attributes/${issue.path.join("/")}` }
            };
        });
        if (errors.length === 0) {
            const info = getErrorMessage("VALIDATION_ERROR");
            return { errors: [{ status: "422", code: "VALIDATION_ERROR", title: info.userMessage }] };
        }
        return { errors };
    }

    logger.error({ err }, "Unhandled error rendered as internal error");
    const info = getErrorMessage("INTERNAL_ERROR");
    return {
        errors: [{
            status: "500",
            code: "INTERNAL_ERROR",
            title: info.userMessage,
            ...((config.isDevelopment() || config.isDebugMode()) && err instanceof Error && {
                detail: err.message,
                meta: { stack: err.stack }
            })
        }]
    };
}
