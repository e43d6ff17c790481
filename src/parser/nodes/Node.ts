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

import { CursorExtent } from "../../lexer/Cursor.js";
import { Token, TokenLine, lineToString } from "../../lexer/Token.js";
import { AssemblyErrorKind, CodeError } from "../../utils/CodeError.js";
import { Statement } from "./Statement.js";

export * from "./Statement.js";

export enum NodeType {
    // Program
    Program,

    // Statement
    Label, Origin, End, Instruction,

    // Leaf only
    HexLiteral, Symbol,
}

export type Node = Program | Statement | HexLiteral | SymbolNode;

export interface BaseNode {
    type: NodeType;
    extent: CursorExtent;
}

export interface Program extends BaseNode {
    type: NodeType.Program;
    inputName: string;
    lines: TokenLine[];
    stmts: Statement[];
}

// X in X,
export interface SymbolNode extends BaseNode {
    type: NodeType.Symbol;
    name: string;
}

// HEX 1F after a label
export interface HexLiteral extends BaseNode {
    type: NodeType.HexLiteral;
    directive: Token;
    value?: Token;
}

export function mkNodeError(msg: string, kind: AssemblyErrorKind, node: BaseNode, line: TokenLine): CodeError {
    return new CodeError(msg, node.extent.cursor, kind, lineToString(line));
}

export function mkTokenError(msg: string, kind: AssemblyErrorKind, tok: Token, line: TokenLine): CodeError {
    return new CodeError(msg, tok.extent.cursor, kind, lineToString(line));
}
