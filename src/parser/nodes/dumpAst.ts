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

import * as Nodes from "./Node.js";

export function dumpAst(prog: Nodes.Program, write: (line: string) => void) {
    write(`Program("${prog.inputName}"`);
    for (const stmt of prog.stmts) {
        const pos = `${stmt.line.lineIdx + 1}:${stmt.extent.cursor.colIdx + 1}`;
        write(`  ${pos}: ${formatNode(stmt)}`);
    }
    write(")");
}

export function formatNode(node: Nodes.Node): string {
    switch (node.type) {
        case Nodes.NodeType.Program:
            return `Program("${node.inputName}", ${node.stmts.length} statements)`;
        case Nodes.NodeType.Label:
            return `Label(${formatNode(node.sym)}${node.body ? ", " + formatNode(node.body) : ""})`;
        case Nodes.NodeType.Origin:
            return `Origin(${node.value?.text ?? ""})`;
        case Nodes.NodeType.End:
            return "End()";
        case Nodes.NodeType.Instruction:
            if (node.operand) {
                return `Instruction("${node.mnemonic.text}", "${node.operand.text}")`;
            }
            return `Instruction("${node.mnemonic.text}")`;
        case Nodes.NodeType.HexLiteral:
            return `Hex(${node.value?.text ?? ""})`;
        case Nodes.NodeType.Symbol:
            return `Symbol("${node.name}")`;
    }
}
