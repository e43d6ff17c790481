/* eslint-disable max-lines-per-function */
import { InstructionSet, lookupFixedWord, lookupMri, loadPreludeInstructionSet } from "../../src/tables/InstructionSet.js";
import { InstructionTable, TableKind } from "../../src/tables/InstructionTable.js";
import { AssemblyErrorKind, CodeError, formatCodeError } from "../../src/utils/CodeError.js";

function parseError(kind: TableKind, text: string): CodeError {
    try {
        InstructionTable.parse(kind, "table.txt", text);
    } catch (e) {
        if (e instanceof CodeError) {
            return e;
        }
        throw e;
    }
    throw Error("Expected an error");
}

describe("GIVEN an instruction table file", () => {
    describe("WHEN it is well-formed", () => {
        const table = InstructionTable.parse(TableKind.MemoryReference, "mri.txt", "AND 000\n\nLDA 010  / load\n");
        test("THEN mnemonics should be looked up case-insensitively", () => {
            expect(table.lookup("LDA")).toEqual("010");
            expect(table.lookup("and")).toEqual("000");
            expect(table.has("sta")).toBe(false);
            expect(table.width).toEqual(3);
            expect([...table.getEntries().keys()]).toEqual(["and", "lda"]);
        });
    });

    describe("WHEN an encoding has the wrong width", () => {
        const err = parseError(TableKind.MemoryReference, "AND 0000");
        test("THEN it should report the encoding", () => {
            expect(err.kind).toEqual(AssemblyErrorKind.MalformedTable);
            expect(formatCodeError(err)).toEqual(
                "table.txt:1:5: MalformedTable: Encoding of and must be 3 binary digits, got 0000\n    and 0000",
            );
        });
    });

    describe("WHEN an encoding is missing", () => {
        const err = parseError(TableKind.RegisterReference, "CLA");
        test("THEN it should report the mnemonic", () => {
            expect(err.message).toEqual("No encoding for cla");
            expect(err.col).toEqual(1);
        });
    });

    describe("WHEN a mnemonic is repeated", () => {
        const err = parseError(TableKind.InputOutput, "INP 1111100000000000\nINP 1111100000000000");
        test("THEN the second entry should fail", () => {
            expect(err.message).toEqual("Redefining InputOutput instruction inp");
            expect(err.line).toEqual(2);
        });
    });

    describe("WHEN an encoding is not binary", () => {
        const err = parseError(TableKind.RegisterReference, "CLA 7800");
        test("THEN it should fail", () => {
            expect(err.kind).toEqual(AssemblyErrorKind.MalformedTable);
        });
    });
});

describe("GIVEN the built-in instruction set", () => {
    const set = loadPreludeInstructionSet();

    test("THEN it should contain the basic computer instructions", () => {
        expect(set.mri.getEntries().size).toEqual(7);
        expect(set.rri.getEntries().size).toEqual(12);
        expect(set.ioi.getEntries().size).toEqual(6);
    });

    test("THEN memory-reference lookups should honor the indirect suffix", () => {
        expect(lookupMri(set, "lda")).toEqual({ opcode: "010", indirect: false });
        expect(lookupMri(set, "ldai")).toEqual({ opcode: "010", indirect: true });
        expect(lookupMri(set, "isz")).toEqual({ opcode: "110", indirect: false });
        expect(lookupMri(set, "ski")).toBeUndefined();
        expect(lookupMri(set, "i")).toBeUndefined();
    });

    test("THEN complete words should come from the register or I/O table", () => {
        expect(lookupFixedWord(set, "cla")).toEqual("0111100000000000");
        expect(lookupFixedWord(set, "out")).toEqual("1111010000000000");
        expect(lookupFixedWord(set, "lda")).toBeUndefined();
    });
});

describe("GIVEN a mnemonic in both register and I/O table", () => {
    const set: InstructionSet = {
        mri: new InstructionTable(TableKind.MemoryReference, [["ldx", "111"]]),
        rri: new InstructionTable(TableKind.RegisterReference, [["xyz", "0000000000000001"]]),
        ioi: new InstructionTable(TableKind.InputOutput, [["xyz", "1000000000000000"]]),
    };

    test("THEN the I/O encoding should win", () => {
        expect(lookupFixedWord(set, "xyz")).toEqual("1000000000000000");
    });

    test("THEN an exact memory-reference entry should win over the suffix", () => {
        set.mri.define("ldxi", "001");
        expect(lookupMri(set, "ldxi")).toEqual({ opcode: "001", indirect: false });
    });
});
