/* eslint-disable max-lines-per-function */
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { Bcasm } from "../../../src/Bcasm.js";
import { readInstructionSet, readSourceFile } from "../../../src/io/SourceFiles.js";
import { ListingWriter } from "../../../src/outputformats/ListingWriter.js";
import { compareListing } from "../../../src/outputformats/compareListing.js";
import { InstructionTable, TableKind } from "../../../src/tables/InstructionTable.js";

function fixture(name: string): string {
    return fileURLToPath(new URL(`../../fixtures/${name}`, import.meta.url));
}

describe("GIVEN an assembly listing", () => {
    const listing = "ORG 100\nCLE\nEND";

    describe("WHEN assembled by Bcasm with the built-in tables", () => {
        const bcasm = new Bcasm({});
        bcasm.setInput("test.asm", listing);
        const out = bcasm.run();

        test("THEN it should produce the binary mapping", () => {
            expect(out.errors.length).toBe(0);
            expect(out.binary).toEqual({ "000100000000": "0111010000000000" });
        });
    });

    describe("WHEN a table is replaced", () => {
        const bcasm = new Bcasm({
            tables: {
                rri: new InstructionTable(TableKind.RegisterReference, [["cle", "0111100000000000"]]),
            },
        });
        bcasm.setInput("test.asm", listing);
        const out = bcasm.run();

        test("THEN the replacement should be used", () => {
            expect(out.binary).toEqual({ "000100000000": "0111100000000000" });
        });
    });

    describe("WHEN run without input", () => {
        test("THEN it should fail", () => {
            expect(() => new Bcasm({}).run()).toThrow("No input given");
        });
    });
});

describe("GIVEN a source file and table files", () => {
    describe("WHEN assembling the example program", () => {
        const tables = readInstructionSet({
            mri: fixture("tables/mri.txt"),
            rri: fixture("tables/rri.txt"),
            ioi: fixture("tables/ioi.txt"),
        });
        const bcasm = new Bcasm({ tables });
        bcasm.setInput("program.asm", readSourceFile(fixture("program.asm")));
        const out = bcasm.run();

        const writer = new ListingWriter();
        writer.writeImage(out.image);
        const expected = readFileSync(fixture("program.lst"), "utf-8");

        test("THEN the output should match the expected listing", () => {
            expect(out.errors).toEqual([]);
            expect(out.warnings).toEqual([]);
            expect(writer.finish()).toEqual(expected);
            expect(compareListing("program.lst", writer.finish(), expected)).toBe(true);
        });

        test("THEN the labels should be at the end of the code", () => {
            expect([...out.labels]).toEqual([
                ["a", 0x107],
                ["b", 0x108],
                ["c", 0x109],
                ["ptr", 0x10a],
            ]);
        });
    });

    describe("WHEN the source file has the wrong extension", () => {
        test("THEN it should be rejected before reading", () => {
            expect(() => readSourceFile("program.txt")).toThrow("program.txt does not end with .asm or .S");
        });
    });

    describe("WHEN only some tables are given", () => {
        const tables = readInstructionSet({ ioi: fixture("tables/ioi.txt") });
        test("THEN only those should be loaded", () => {
            expect(tables.ioi?.lookup("ski")).toEqual("1111001000000000");
            expect(tables.mri).toBeUndefined();
            expect(tables.rri).toBeUndefined();
        });
    });
});
