/*
 *   Yamas - Yet Another Macro Assembler (for the PDP-8)
 *   Copyright (C) 2023 Folke Will <folko@solhost.org>
 *
 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU Affero General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.
 *
 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU Affero General Public License for more details.
 *
 *   You should have received a copy of the GNU Affero General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

import { Lexer } from "../lexer/Lexer.js";
import { CursorExtent, calcExtent } from "../lexer/Cursor.js";
import { Token, TokenLine, isLabelToken } from "../lexer/Token.js";
import { LabelDelimiter, Pseudos } from "../utils/BasicComputer.js";
import * as Nodes from "./nodes/Node.js";
import { NodeType } from "./nodes/Node.js";

/**
 * Classifies token lines by their first token. Nothing is validated here:
 * missing operands and bad literals are reported by the passes.
 */
export class Parser {
    private lexer: Lexer;

    public constructor(inputName: string, input: string) {
        this.lexer = new Lexer(inputName, input);
    }

    public parseProgram(): Nodes.Program {
        const lines = this.lexer.tokenize();
        const stmts: Nodes.Statement[] = [];

        for (const line of lines) {
            const stmt = this.parseLine(line);
            if (stmt) {
                stmts.push(stmt);
            }
        }

        return {
            type: NodeType.Program,
            inputName: this.lexer.getInputName(),
            lines: lines,
            stmts: stmts,
            extent: {
                cursor: { inputName: this.lexer.getInputName(), lineIdx: 0, colIdx: 0 },
                width: 0,
            },
        };
    }

    private parseLine(line: TokenLine): Nodes.Statement | undefined {
        const [first, second, third] = line.tokens;
        if (!first) {
            return undefined;
        }

        if (isLabelToken(first, LabelDelimiter)) {
            return this.parseLabel(line, first, second, third);
        }

        switch (first.text) {
            case Pseudos.Origin:
                return {
                    type: NodeType.Origin, line, directive: first, value: second,
                    extent: this.lineExtent(first, line),
                };
            case Pseudos.End:
                return {
                    type: NodeType.End, line, directive: first,
                    extent: this.lineExtent(first, line),
                };
        }

        return this.parseInstruction(line, first, second);
    }

    private parseLabel(line: TokenLine, labelTok: Token, second?: Token, third?: Token): Nodes.LabelStatement {
        const sym: Nodes.SymbolNode = {
            type: NodeType.Symbol,
            name: labelTok.text.substring(0, labelTok.text.length - LabelDelimiter.length),
            extent: labelTok.extent,
        };

        let body: Nodes.LabelBody | undefined;
        if (second?.text == Pseudos.Hex) {
            body = {
                type: NodeType.HexLiteral, directive: second, value: third,
                extent: calcExtent(second, third),
            };
        } else if (second) {
            body = this.parseInstruction(line, second, third);
        }

        return {
            type: NodeType.Label, line, sym, body,
            extent: this.lineExtent(labelTok, line),
        };
    }

    private parseInstruction(line: TokenLine, mnemonic: Token, operand?: Token): Nodes.InstructionStatement {
        return {
            type: NodeType.Instruction, line, mnemonic, operand,
            extent: calcExtent(mnemonic, operand),
        };
    }

    private lineExtent(first: Token, line: TokenLine): CursorExtent {
        return calcExtent(first, line.tokens[line.tokens.length - 1]);
    }
}
