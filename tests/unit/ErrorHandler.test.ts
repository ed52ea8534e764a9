import { describe, test, expect, afterEach } from "vitest";
import { z } from "zod";
import {
    HookContractError,
    InvalidQueryStringParameterError,
    JsonApiError,
    RelationshipNotFoundError,
    ResourceNotFoundError,
    responseError,
    toErrorDocument
} from "../../core/ErrorHandler";
import { config } from "../../core/Config";

describe("JsonApiError", () => {
    test("renders status, title and suggestion into an error object", () => {
        const err = new ResourceNotFoundError("people", "1");

        expect(err).toBeInstanceOf(JsonApiError);
        expect(err.name).toBe("ResourceNotFoundError");
        expect(err.status).toBe(404);
        expect(err.category).toBe("request");
        expect(err.toErrorObject()).toEqual({
            status: "404",
            code: "RESOURCE_NOT_FOUND",
            title: "The requested resource does not exist",
            detail: "Resource of type 'people' with id '1' does not exist.",
            meta: { suggestion: "Check the resource type and id" }
        });
    });

    test("omits meta when the code has no suggestion", () => {
        expect(new RelationshipNotFoundError("articles", "editor").toErrorObject()).toEqual({
            status: "404",
            code: "UNKNOWN_RELATIONSHIP",
            title: "The relationship does not exist on this resource",
            detail: "Resource 'articles' does not contain a relationship named 'editor'."
        });
    });

    test("points query string errors at the parameter", () => {
        const err = new InvalidQueryStringParameterError("include", "bad path");
        expect(err.toErrorObject().source).toEqual({ parameter: "include" });
        expect(err.status).toBe(400);
    });

    test("falls back to the generic title for unknown codes", () => {
        const err = responseError(418, "TEAPOT");
        expect(err.message).toBe("An unexpected error occurred");
        expect(err.category).toBe("system");
    });
});

describe("toErrorDocument", () => {
    const debug = process.env.DEBUG;

    afterEach(() => {
        if (debug === undefined) delete process.env.DEBUG;
        else process.env.DEBUG = debug;
        config.reloadConfig();
    });

    test("wraps library errors", () => {
        const err = new HookContractError("too many");
        expect(toErrorDocument(err)).toEqual({ errors: [err.toErrorObject()] });
    });

    test("maps zod issues to attribute pointers", () => {
        const result = z.object({ title: z.string(), pages: z.number() }).safeParse({ pages: "ten" });
        if (result.success) throw new Error("expected a validation failure");

        const document = toErrorDocument(result.error);
        expect(document.errors.map(error => [error.code, error.source?.pointer])).toEqual([
            ["REQUIRED_FIELD", "/data/attributes/title"],
            ["INVALID_FORMAT", "/data/attributes/pages"]
        ]);
        expect(document.errors.every(error => error.status === "422")).toBe(true);
    });

    test("hides details of unexpected errors outside development", () => {
        expect(toErrorDocument(new Error("secret"))).toEqual({
            errors: [{ status: "500", code: "INTERNAL_ERROR", title: "An internal error occurred" }]
        });
    });

    test("includes details of unexpected errors in debug mode", () => {
        process.env.DEBUG = "true";
        config.reloadConfig();

        const err = new Error("secret");
        expect(toErrorDocument(err)).toEqual({
            errors: [{
                status: "500",
                code: "INTERNAL_ERROR",
                title: "An internal error occurred",
                detail: "secret",
                meta: { stack: err.stack }
            }]
        });
    });
});
