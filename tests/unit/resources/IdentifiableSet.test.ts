import { describe, test, expect } from "vitest";
import { IdentifiableSet } from "@/core/resources/IdentifiableSet";
import { getStringId, identityOf } from "@/core/resources/Identifiable";
import { person } from "../../fixtures/resources";

describe("IdentifiableSet", () => {
    test("treats instances with the same id as one entity and keeps the first", () => {
        const first = person("1", "first");
        const second = person("1", "second");
        const set = new IdentifiableSet([first, second, person("2")]);

        expect(set.size).toBe(2);
        expect(set.get(second)).toBe(first);
        expect(set.has(person("1"))).toBe(true);
    });

    test("keeps distinct unsaved instances apart", () => {
        const a = person("");
        const b = person("");
        const set = new IdentifiableSet([a, b, a]);

        expect(set.size).toBe(2);
        expect(identityOf(a)).not.toBe(identityOf(b));
        expect(getStringId(a)).toBe("");
    });

    test("intersect and except keep own instances", () => {
        const own = person("1", "own");
        const set = new IdentifiableSet([own, person("2"), person("3")]);

        const kept = set.intersect([person("1", "other"), person("3")]);
        expect(kept.values().map(getStringId)).toEqual(["1", "3"]);
        expect(kept.get(own)).toBe(own);

        expect(set.except([person("2")]).values().map(getStringId)).toEqual(["1", "3"]);
    });

    test("ids lists the string ids in insertion order", () => {
        const set = new IdentifiableSet([person("5"), person("3")]);
        expect([...set.ids()]).toEqual(["5", "3"]);
    });

    test("numeric ids and their string form are the same entity", () => {
        const set = new IdentifiableSet<{ id: string | number }>([{ id: 7 }]);
        expect(set.has({ id: "7" })).toBe(true);
        expect(getStringId({ id: 0 })).toBe("");
    });
});
