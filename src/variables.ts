import { z } from "zod";
import { fromZodError } from "./errors.js";
import type { VariableLookup } from "./units.js";

const variableSchema = z.object({
    name: z.string().min(1),
    expression: z.string().default(""),
    description: z.string().nullish(),
});

const variableGroupSchema = z.object({ variables: z.array(variableSchema) });

// The variables endpoint answers either with a flat list or with one group per variable table.
const variablesResponseSchema = z.union([
    z.array(variableGroupSchema),
    z.array(variableSchema),
]);

type VariableRow = z.infer<typeof variableSchema>;
type VariableGroup = z.infer<typeof variableGroupSchema>;

export interface Variable {
    name: string;
    expression: string;
    description?: string;
}

/** A Part Studio's variables, read once and looked up by name. */
export class VariableTable implements VariableLookup {
    private readonly byName = new Map<string, Variable>();

    constructor(variables: Iterable<Variable> = []) {
        for (const variable of variables) {
            this.byName.set(variable.name, variable);
        }
    }

    static fromResponse(response: unknown): VariableTable {
        const parsed = variablesResponseSchema.safeParse(response);
        if (!parsed.success) {
            throw fromZodError(parsed.error, "variable table response");
        }
        const entries: Array<VariableGroup | VariableRow> = parsed.data;
        const rows = entries.flatMap((entry) => ("variables" in entry ? entry.variables : [entry]));
        return new VariableTable(rows.map((row) => ({
            name: row.name,
            expression: row.expression,
            ...(row.description ? { description: row.description } : {}),
        })));
    }

    lookup(name: string): string | undefined {
        return this.byName.get(name)?.expression;
    }

    get(name: string): Variable | undefined {
        return this.byName.get(name);
    }

    list(): Variable[] {
        return [...this.byName.values()];
    }

    get size(): number {
        return this.byName.size;
    }
}
