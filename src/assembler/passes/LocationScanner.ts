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

import * as Nodes from "../../parser/nodes/Node.js";
import { NodeType } from "../../parser/nodes/Node.js";
import { formatWord } from "../../utils/BasicComputer.js";
import { AssemblyErrorKind } from "../../utils/CodeError.js";
import { CellType, CellValue, mkEncodedCell } from "../CellValue.js";
import { Context } from "../Context.js";
import { LabelTable } from "../LabelTable.js";
import { parseHexAddress, parseHexWord } from "../util/Literals.js";
import { RegisterFunction, StatementEffect } from "../util/StatementEffect.js";

/**
 * Pass 1: binds labels to locations and stores what each location holds,
 * leaving instruction mnemonics unencoded.
 */
export class LocationScanner {
    private labels: LabelTable;

    public constructor(labels: LabelTable) {
        this.labels = labels;
    }

    public registerStatements(register: RegisterFunction) {
        register(NodeType.Label, this.handleLabel.bind(this));
        register(NodeType.Origin, this.handleOrigin.bind(this));
        register(NodeType.End, this.handleEnd.bind(this));
        register(NodeType.Instruction, this.handleInstruction.bind(this));
    }

    private handleLabel(ctx: Context, stmt: Nodes.LabelStatement): StatementEffect {
        if (this.labels.has(stmt.sym.name)) {
            throw Nodes.mkNodeError(`Redefining label ${stmt.sym.name}`, AssemblyErrorKind.DuplicateLabel, stmt.sym, stmt.line);
        }

        if (!stmt.body) {
            throw Nodes.mkNodeError(`Nothing to store at label ${stmt.sym.name}`, AssemblyErrorKind.MissingOperand, stmt.sym, stmt.line);
        }

        this.labels.defineLabel(stmt.sym.name, ctx.location);

        return { output: this.scanLabelBody(stmt, stmt.body) };
    }

    private scanLabelBody(stmt: Nodes.LabelStatement, body: Nodes.LabelBody): CellValue {
        switch (body.type) {
            case NodeType.HexLiteral:
                if (!body.value) {
                    throw Nodes.mkNodeError("HEX without value", AssemblyErrorKind.MissingOperand, body, stmt.line);
                }
                return mkEncodedCell(formatWord(parseHexWord(body.value, stmt.line)));
            case NodeType.Instruction:
                return { type: CellType.Raw, mnemonic: body.mnemonic, line: stmt.line, labeled: true };
        }
    }

    private handleOrigin(ctx: Context, stmt: Nodes.OriginStatement): StatementEffect {
        if (!stmt.value) {
            throw Nodes.mkNodeError("ORG without address", AssemblyErrorKind.MissingOperand, stmt, stmt.line);
        }
        return { setOrigin: parseHexAddress(stmt.value, stmt.line) };
    }

    private handleEnd(): StatementEffect {
        return { end: true };
    }

    private handleInstruction(ctx: Context, stmt: Nodes.InstructionStatement): StatementEffect {
        return {
            output: { type: CellType.Raw, mnemonic: stmt.mnemonic, line: stmt.line, labeled: false },
        };
    }
}
