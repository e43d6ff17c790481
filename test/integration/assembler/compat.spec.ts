/* eslint-disable max-lines-per-function */
import { AssemblyErrorKind, formatCodeError } from "../../../src/utils/CodeError.js";
import { assemble, assembleWithErrors, src } from "./TestUtils.js";

describe("GIVEN a memory-reference instruction after a label", () => {
    const listing = src(
        "ORG 10",
        "X, LDA Y",
        "Y, HEX 5",
        "END",
    );

    describe("WHEN assembled with default options", () => {
        const data = assemble(listing);
        test("THEN the mnemonic should stay unencoded and produce a warning", () => {
            expect(data.memory).toEqual({
                "000000010000": "lda",
                "000000010001": "0000000000000101",
            });
            expect(data.warnings.length).toEqual(1);
            expect(data.warnings[0].kind).toEqual(AssemblyErrorKind.UnresolvedSymbol);
            expect(formatCodeError(data.warnings[0])).toEqual(
                "test.asm:2:4: UnresolvedSymbol: lda after label at 10 left unencoded\n    x, lda y",
            );
        });
    });

    describe("WHEN assembled with labeled MRI encoding enabled", () => {
        const data = assemble(listing, { encodeLabeledMri: true });
        test("THEN it should be encoded like an unlabeled one", () => {
            expect(data.memory["000000010000"]).toEqual("0010000000010001");
            expect(data.warnings).toEqual([]);
        });
    });

    describe("WHEN labeled MRI encoding is enabled and the operand is missing", () => {
        const data = assembleWithErrors(src("X, STA", "END"), { encodeLabeledMri: true });
        test("THEN it should fail", () => {
            expect(data.errors[0].kind).toEqual(AssemblyErrorKind.MissingOperand);
        });
    });
});

describe("GIVEN the DEC directive", () => {
    describe("WHEN used without a label", () => {
        const data = assemble(src("DEC 5", "CLE", "END"));
        test("THEN the keyword should pass through and still take a location", () => {
            expect(data.memory).toEqual({
                "000000000000": "dec",
                "000000000001": "0111010000000000",
            });
            expect(data.warnings.map(w => w.message)).toEqual(["dec at 0 left unencoded"]);
        });
    });

    describe("WHEN used after a label", () => {
        const data = assemble(src("N, DEC 5", "END"));
        test("THEN the keyword should pass through as well", () => {
            expect(data.memory).toEqual({ "000000000000": "dec" });
            expect(data.labels["n"]).toEqual(0);
            expect(data.warnings.map(w => w.message)).toEqual(["dec after label at 0 left unencoded"]);
        });
    });
});

describe("GIVEN a program without END", () => {
    const listing = src("CLE", "CLA");

    describe("WHEN assembled with default options", () => {
        const data = assemble(listing);
        test("THEN everything scanned should be returned with a warning", () => {
            expect(data.memory).toEqual({
                "000000000000": "0111010000000000",
                "000000000001": "0111100000000000",
            });
            expect(data.warnings.length).toEqual(1);
            expect(data.warnings[0].kind).toEqual(AssemblyErrorKind.MissingEndDirective);
            expect(data.warnings[0].line).toEqual(2);
        });
    });

    describe("WHEN END is required", () => {
        const data = assembleWithErrors(listing, { requireEnd: true });
        test("THEN it should fail", () => {
            expect(data.errors.length).toEqual(1);
            expect(formatCodeError(data.errors[0])).toEqual("test.asm:2:1: MissingEndDirective: Input ended without END");
            expect(data.image.size).toEqual(0);
        });
    });
});

describe("GIVEN lines the source grammar rejects", () => {
    describe("WHEN a directive follows a label", () => {
        const data = assemble(src("X, ORG 10", "END"));
        test("THEN it should be stored raw with a warning", () => {
            expect(data.memory).toEqual({ "000000000000": "org" });
            expect(data.warnings.map(w => w.message)).toEqual(["org after label at 0 left unencoded"]);
        });
    });

    describe("WHEN an instruction has an extra operand", () => {
        const data = assemble(src("LDA X Y", "X, HEX 1", "END"));
        test("THEN the extra word should be ignored", () => {
            expect(data.memory).toEqual({
                "000000000000": "0010000000000001",
                "000000000001": "0000000000000001",
            });
            expect(data.warnings).toEqual([]);
        });
    });
});
