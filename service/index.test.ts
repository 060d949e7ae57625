import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
    buildDictionaryArchive,
    buildTerritoryArchive,
    territoryFiles,
    writeFixture,
} from "./helpers/__fixtures__/archives";
import { fsp } from "./helpers/fs";
import { load } from "./index";

const fixture = (name: string) =>
    path.join(__dirname, "helpers", "__fixtures__", name);

describe("load", () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fsp.mkdtemp(path.join(os.tmpdir(), "censokit-load-"));
    });

    afterEach(async () => {
        await fsp.rm(tempDir, { recursive: true, force: true });
    });

    it("should decode, label and export a release", async () => {
        const files = territoryFiles("05", [1]);
        files["CNPV2018_5PER_A2_05.dta"] = {
            p_sexo: { type: "float64", values: [1, 2] },
        };
        await writeFixture(
            path.join(tempDir, "data", "05_ANTIOQUIA.zip"),
            buildTerritoryArchive(files),
        );
        const dictionaryPath = await writeFixture(
            path.join(tempDir, "dictionary.zip"),
            buildDictionaryArchive({
                REGPER: {
                    columns: { P_SEXO: "Sexo de la persona" },
                    values: { P_SEXO: { "1": "Hombre", "2": "Mujer" } },
                },
            }),
        );
        const outputDir = path.join(tempDir, "out");

        const result = await load({
            dataDir: path.join(tempDir, "data"),
            dictionaryPath,
            outputDir,
            decoderModule: fixture("json-decoder.ts"),
            parserModule: fixture("json-parser.ts"),
            columnLabels: true,
        });

        expect(result.tables.persons.rowCount).toBe(2);
        expect(result.files).toHaveLength(9);
        expect(
            await fsp.readFile(path.join(outputDir, "persons.csv"), "utf-8"),
        ).toBe("P_SEXO\nHombre\nMujer\n");
        expect(
            await fsp.readFile(
                path.join(outputDir, "persons_columns.csv"),
                "utf-8",
            ),
        ).toBe("COLUMN,LABEL\nP_SEXO,Sexo de la persona\n");
        expect(
            await fsp.readFile(path.join(outputDir, "deaths.csv"), "utf-8"),
        ).toBe("ID\n1\n");
    });

    it("should fail before reading data when no decoder is configured", async () => {
        await expect(
            load({
                dataDir: path.join(tempDir, "data"),
                decoderModule: "",
                parserModule: fixture("json-parser.ts"),
            }),
        ).rejects.toThrow(/No decoder module configured/);
    });
});
