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

import { Token, TokenLine } from "../../lexer/Token.js";
import { BaseNode, HexLiteral, NodeType, SymbolNode } from "./Node.js";

export type Statement =
    LabelStatement | OriginStatement |
    EndStatement | InstructionStatement;

export interface BaseStatement extends BaseNode {
    line: TokenLine;
}

// X, LDA Y  or  X, HEX 1F
export interface LabelStatement extends BaseStatement {
    type: NodeType.Label;
    sym: SymbolNode;

    // missing if nothing follows the label
    body?: LabelBody;
}

export type LabelBody = HexLiteral | InstructionStatement;

// ORG 100
export interface OriginStatement extends BaseStatement {
    type: NodeType.Origin;
    directive: Token;
    value?: Token;
}

// END
export interface EndStatement extends BaseStatement {
    type: NodeType.End;
    directive: Token;
}

// CLE, LDA X, LDAI X or anything not matching the other statements
export interface InstructionStatement extends BaseStatement {
    type: NodeType.Instruction;
    mnemonic: Token;
    operand?: Token;
}
