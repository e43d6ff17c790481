/* eslint-disable max-lines-per-function */
import { dumpAst } from "../../../src/parser/nodes/dumpAst.js";
import { assemble } from "./TestUtils.js";

describe("GIVEN a full example listing", () => {
    describe("WHEN assembling a program that multiplies by repeated addition", () => {
        const data = assemble(`
            / MULTIPLY X BY Y, RESULT IN P
                    ORG 10
                    CLA
                    STA P
                    LDA Y
                    CMA
                    INC
                    STA CTR
            LOOP,   CLE
                    LDA P
                    ADD X
                    STA P
                    ISZ CTR
                    BUN LOOP
                    HLT
            X,      HEX F
            Y,      HEX B
            P,      HEX 0
            CTR,    HEX 0
                    END
        `);

        test("THEN the labels should follow the code", () => {
            expect(data.labels).toEqual({
                loop: 0x16,
                x: 0x1d,
                y: 0x1e,
                p: 0x1f,
                ctr: 0x20,
            });
        });

        test("THEN the output should contain the encoded program", () => {
            expect(data.memory).toEqual({
                "000000010000": "0111100000000000",
                "000000010001": "0011000000011111",
                "000000010010": "0010000000011110",
                "000000010011": "0111001000000000",
                "000000010100": "0111000000100000",
                "000000010101": "0011000000100000",
                "000000010110": "0111010000000000",
                "000000010111": "0010000000011111",
                "000000011000": "0001000000011101",
                "000000011001": "0011000000011111",
                "000000011010": "0110000000100000",
                "000000011011": "0100000000010110",
                "000000011100": "0111000000000001",
                "000000011101": "0000000000001111",
                "000000011110": "0000000000001011",
                "000000011111": "0000000000000000",
                "000000100000": "0000000000000000",
            });
            expect(data.warnings).toEqual([]);
        });

        test("THEN dumping the AST should not crash", () => {
            let ast = "";
            dumpAst(data.ast, line => ast += line + "\n");
            expect(ast.length).toBeGreaterThan(0);
        });
    });
});
