/**
 * Test dictionary parser: the definition file is JSON of the form
 * `{ "<schemaId>": { "columns": {...}, "values": {...} } }`.
 */

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

export const parse = (text: string): unknown => {
    const document: unknown = JSON.parse(text);
    if (!isRecord(document)) {
        throw new Error("Dictionary must be a JSON object");
    }

    const section = (schemaId: string, key: "columns" | "values"): unknown => {
        const record = document[schemaId];
        return isRecord(record) && isRecord(record[key]) ? record[key] : {};
    };

    return {
        getColumnLabels: (schemaId: string) => section(schemaId, "columns"),
        getValueLabels: (schemaId: string) => section(schemaId, "values"),
    };
};
