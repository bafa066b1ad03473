import { describe, expect, it } from "vitest";
import { InvalidOperationError } from "./errors.js";
import { VariableTable } from "./variables.js";

describe("VariableTable", () => {
    it("reads grouped variable tables", () => {
        const table = VariableTable.fromResponse([
            { variables: [{ name: "width", expression: "2 in", description: "Plate width" }] },
            { variables: [{ name: "holes", expression: "4" }] },
        ]);
        expect(table.size).toBe(2);
        expect(table.get("width")).toEqual({ name: "width", expression: "2 in", description: "Plate width" });
        expect(table.lookup("holes")).toBe("4");
    });

    it("reads a flat list", () => {
        const table = VariableTable.fromResponse([{ name: "depth", expression: "10 mm", description: null }]);
        expect(table.list()).toEqual([{ name: "depth", expression: "10 mm" }]);
    });

    it("returns undefined for names it does not know", () => {
        expect(new VariableTable().lookup("missing")).toBeUndefined();
    });

    it("rejects a response of another shape", () => {
        expect(() => VariableTable.fromResponse({ variables: "none" })).toThrow(InvalidOperationError);
    });
});
