import * as os from "node:os";
import * as path from "node:path";
import AdmZip from "adm-zip";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DictionaryFormatError } from "../errors";
import type { DictionaryParser } from "../types";
import {
    buildDictionaryArchive,
    jsonParser,
    writeFixture,
} from "./__fixtures__/archives";
import { getColumnLabels, getValueLabels, loadDictionary } from "./dictionary";
import { fsp } from "./fs";

describe("dictionary", () => {
    let tempDir: string;
    let dictionaryPath: string;

    beforeEach(async () => {
        tempDir = await fsp.mkdtemp(
            path.join(os.tmpdir(), "censokit-dictionary-"),
        );
        dictionaryPath = path.join(tempDir, "dict", "dictionary.zip");
    });

    afterEach(async () => {
        await fsp.rm(tempDir, { recursive: true, force: true });
    });

    it("should parse the definition file and answer label queries", async () => {
        await writeFixture(
            dictionaryPath,
            buildDictionaryArchive({
                REGPER: {
                    columns: { P_SEXO: "Sexo" },
                    values: { P_SEXO: { "1": "Hombre", "2": "Mujer" } },
                },
            }),
        );

        const dictionary = loadDictionary(dictionaryPath, jsonParser);

        expect(getColumnLabels(dictionary, "persons")).toEqual({
            P_SEXO: "Sexo",
        });
        expect(getValueLabels(dictionary, "persons")).toEqual({
            P_SEXO: { "1": "Hombre", "2": "Mujer" },
        });
        expect(getValueLabels(dictionary, "dwellings")).toEqual({});
    });

    it("should hand the parser the decoded text", async () => {
        const archive = new AdmZip();
        archive.addFile(
            "Diccionario_datosCNPV.dcf",
            Buffer.from("[Dictionary]\nLabel=Añadido", "utf-8"),
        );
        await writeFixture(dictionaryPath, archive.toBuffer());
        const seen: string[] = [];
        const parser: DictionaryParser = (text) => {
            seen.push(text);
            return { getColumnLabels: () => ({}), getValueLabels: () => ({}) };
        };

        loadDictionary(dictionaryPath, parser);

        expect(seen).toEqual(["[Dictionary]\nLabel=Añadido"]);
    });

    it("should reject a missing archive", () => {
        expect(() => loadDictionary(dictionaryPath, jsonParser)).toThrow(
            new DictionaryFormatError(
                `Cannot open dictionary archive '${dictionaryPath}'`,
                dictionaryPath,
            ),
        );
    });

    it("should reject an archive without the definition file", async () => {
        await writeFixture(
            dictionaryPath,
            buildDictionaryArchive({}, "other.dcf"),
        );

        expect(() => loadDictionary(dictionaryPath, jsonParser)).toThrow(
            `Dictionary archive '${dictionaryPath}' has no 'Diccionario_datosCNPV.dcf'`,
        );
    });

    it("should reject a definition file that is not UTF-8", async () => {
        const archive = new AdmZip();
        archive.addFile(
            "Diccionario_datosCNPV.dcf",
            Buffer.from([0x4c, 0x61, 0xff, 0xfe]),
        );
        await writeFixture(dictionaryPath, archive.toBuffer());

        expect(() => loadDictionary(dictionaryPath, jsonParser)).toThrow(
            `Cannot read 'Diccionario_datosCNPV.dcf' in '${dictionaryPath}' as UTF-8`,
        );
    });

    it("should wrap parser failures", async () => {
        const archive = new AdmZip();
        archive.addFile(
            "Diccionario_datosCNPV.dcf",
            Buffer.from("not json", "utf-8"),
        );
        await writeFixture(dictionaryPath, archive.toBuffer());

        let caught: unknown;
        try {
            loadDictionary(dictionaryPath, jsonParser);
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(DictionaryFormatError);
        expect(caught).toHaveProperty(
            "message",
            `Cannot parse 'Diccionario_datosCNPV.dcf' in '${dictionaryPath}'`,
        );
        expect(caught).toHaveProperty("cause.name", "SyntaxError");
    });
});
