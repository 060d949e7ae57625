import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { toRecords } from "../../core";
import { ArchiveFormatError } from "../errors";
import { RECORD_TYPES } from "../types";
import {
    buildTerritoryArchive,
    jsonDecoder,
    territoryFiles,
    writeFixture,
} from "./__fixtures__/archives";
import {
    type TerritoryProgress,
    aggregateFolder,
    findTerritoryArchives,
} from "./aggregate";
import { fsp } from "./fs";

describe("aggregate", () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fsp.mkdtemp(
            path.join(os.tmpdir(), "censokit-aggregate-"),
        );
    });

    afterEach(async () => {
        await fsp.rm(tempDir, { recursive: true, force: true });
    });

    const writeTerritory = (relativePath: string, ids: number[]) =>
        writeFixture(
            path.join(tempDir, relativePath),
            buildTerritoryArchive(
                territoryFiles(relativePath.slice(0, 2), ids),
            ),
        );

    describe("findTerritoryArchives", () => {
        it("should find numbered archives recursively in lexical order", async () => {
            await writeTerritory("02_CALDAS.zip", [1]);
            await writeTerritory("nested/01_AMAZONAS.zip", [1]);
            await writeFixture(path.join(tempDir, "dictionary.zip"), "x");
            await writeFixture(path.join(tempDir, "123_TOO_LONG.zip"), "x");

            const archives = await findTerritoryArchives(tempDir);

            expect(archives).toEqual([
                path.join(tempDir, "02_CALDAS.zip"),
                path.join(tempDir, "nested", "01_AMAZONAS.zip"),
            ]);
        });

        it("should ignore directories named like archives", async () => {
            await fsp.mkdir(path.join(tempDir, "07_FOLDER"));

            expect(await findTerritoryArchives(tempDir)).toEqual([]);
        });
    });

    describe("aggregateFolder", () => {
        it("should return five empty tables for an empty folder", async () => {
            const tables = await aggregateFolder(tempDir, jsonDecoder);

            expect(Object.keys(tables)).toEqual([...RECORD_TYPES]);
            for (const recordType of RECORD_TYPES) {
                expect(tables[recordType].rowCount).toBe(0);
                expect(tables[recordType].columns.size).toBe(0);
            }
        });

        it("should return five empty tables for a missing folder", async () => {
            const tables = await aggregateFolder(
                path.join(tempDir, "missing"),
                jsonDecoder,
            );

            for (const recordType of RECORD_TYPES) {
                expect(tables[recordType].rowCount).toBe(0);
            }
        });

        it("should stack the territories of each record type", async () => {
            await writeTerritory("01_AMAZONAS.zip", [1]);
            await writeTerritory("02_CALDAS.zip", [2]);

            const tables = await aggregateFolder(tempDir, jsonDecoder);

            for (const recordType of RECORD_TYPES) {
                expect(tables[recordType].rowCount).toBe(2);
                expect(toRecords(tables[recordType])).toEqual([
                    { ID: 1 },
                    { ID: 2 },
                ]);
            }
        });

        it("should report progress for each territory", async () => {
            await writeTerritory("01_AMAZONAS.zip", [1]);
            await writeTerritory("02_CALDAS.zip", [2]);
            const started: number[] = [];
            const finished: TerritoryProgress[] = [];

            await aggregateFolder(tempDir, jsonDecoder, {
                onTerritoryStart: ({ index }) => started.push(index),
                onTerritory: (progress) => finished.push(progress),
            });

            expect(started).toEqual([1, 2]);
            expect(finished).toEqual([
                {
                    archivePath: path.join(tempDir, "01_AMAZONAS.zip"),
                    index: 1,
                    total: 2,
                },
                {
                    archivePath: path.join(tempDir, "02_CALDAS.zip"),
                    index: 2,
                    total: 2,
                },
            ]);
        });

        it("should stack differing columns on their union", async () => {
            await writeTerritory("01_AMAZONAS.zip", [1]);
            const files = territoryFiles("02", [2]);
            files["CNPV2018_1VIV_A2_02.dta"] = {
                id: { type: "float64", values: [2] },
                estrato: { type: "float64", values: [3] },
            };
            await writeFixture(
                path.join(tempDir, "02_CALDAS.zip"),
                buildTerritoryArchive(files),
            );

            const tables = await aggregateFolder(tempDir, jsonDecoder);

            expect(toRecords(tables.dwellings)).toEqual([
                { ID: 1, ESTRATO: null },
                { ID: 2, ESTRATO: 3 },
            ]);
        });

        it("should reject a territory missing a record type", async () => {
            const files = territoryFiles("05", [1]);
            delete files["CNPV2018_3FALL_A2_05.dta"];
            const archivePath = await writeFixture(
                path.join(tempDir, "05_ANTIOQUIA.zip"),
                buildTerritoryArchive(files),
            );

            await expect(aggregateFolder(tempDir, jsonDecoder)).rejects.toThrow(
                new ArchiveFormatError(
                    `Territory archive '${archivePath}' has no deaths data`,
                    archivePath,
                ),
            );
        });
    });
});
