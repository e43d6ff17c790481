/* eslint-disable max-lines-per-function */
import { Parser } from "../../src/parser/Parser.js";
import { NodeType } from "../../src/parser/nodes/Node.js";
import { dumpAst } from "../../src/parser/nodes/dumpAst.js";

describe("GIVEN source lines", () => {
    describe("WHEN parsing them", () => {
        const prog = new Parser("test.asm", [
            "ORG 100",
            "",
            "X, HEX 1F",
            "Y, LDA X",
            "Z,",
            "LDAI X EXTRA / comment",
            "DEC 5",
            "END",
        ].join("\n")).parseProgram();

        test("THEN empty lines should be kept but produce no statement", () => {
            expect(prog.lines.length).toEqual(8);
            expect(prog.stmts.length).toEqual(7);
        });

        test("THEN each line should be classified by its first token", () => {
            expect(prog.stmts.map(s => s.type)).toEqual([
                NodeType.Origin,
                NodeType.Label,
                NodeType.Label,
                NodeType.Label,
                NodeType.Instruction,
                NodeType.Instruction,
                NodeType.End,
            ]);
        });

        test("THEN label bodies should be parsed", () => {
            const hex = prog.stmts[1];
            const instr = prog.stmts[2];
            const empty = prog.stmts[3];
            if (hex.type != NodeType.Label || instr.type != NodeType.Label || empty.type != NodeType.Label) {
                throw Error("Expected labels");
            }
            expect(hex.sym.name).toEqual("x");
            expect(hex.body?.type).toEqual(NodeType.HexLiteral);
            expect(instr.body?.type).toEqual(NodeType.Instruction);
            expect(empty.sym.name).toEqual("z");
            expect(empty.body).toBeUndefined();
        });

        test("THEN the AST dump should list one statement per line", () => {
            const out: string[] = [];
            dumpAst(prog, line => out.push(line));
            expect(out).toEqual([
                "Program(\"test.asm\"",
                "  1:1: Origin(100)",
                "  3:1: Label(Symbol(\"x\"), Hex(1f))",
                "  4:1: Label(Symbol(\"y\"), Instruction(\"lda\", \"x\"))",
                "  5:1: Label(Symbol(\"z\"))",
                "  6:1: Instruction(\"ldai\", \"x\")",
                "  7:1: Instruction(\"dec\", \"5\")",
                "  8:1: End()",
                ")",
            ]);
        });
    });
});
