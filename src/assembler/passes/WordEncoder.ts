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
import { InstructionSet, lookupFixedWord, lookupMri } from "../../tables/InstructionSet.js";
import { composeMriWord, isPseudo } from "../../utils/BasicComputer.js";
import { AssemblyErrorKind } from "../../utils/CodeError.js";
import { normalizeSymbolName } from "../../utils/Strings.js";
import { AddressSymbolTable } from "../AddressSymbolTable.js";
import { AssemblerOptions, SubComponents } from "../Assembler.js";
import { CellType, mkEncodedCell } from "../CellValue.js";
import { Context } from "../Context.js";
import { parseHexAddress } from "../util/Literals.js";
import { RegisterFunction, StatementEffect } from "../util/StatementEffect.js";

/**
 * Pass 2: substitutes complete words for register-reference and I/O mnemonics,
 * then walks the program again to encode memory-reference instructions.
 */
export class WordEncoder {
    private opts: AssemblerOptions;
    private tables: InstructionSet;
    private labels: ReadonlyMap<string, number>;
    private cells: AddressSymbolTable;

    public constructor(components: SubComponents, labels: ReadonlyMap<string, number>, cells: AddressSymbolTable) {
        this.opts = components.options;
        this.tables = components.tables;
        this.labels = labels;
        this.cells = cells;
    }

    public registerStatements(register: RegisterFunction) {
        register(NodeType.Label, this.handleLabel.bind(this));
        register(NodeType.Origin, this.handleOrigin.bind(this));
        register(NodeType.End, this.handleEnd.bind(this));
        register(NodeType.Instruction, this.handleInstruction.bind(this));
    }

    public resolveFixedWords() {
        for (const [loc, cell] of this.cells.entries()) {
            if (cell.type != CellType.Raw) {
                continue;
            }

            const word = lookupFixedWord(this.tables, cell.mnemonic.text);
            if (word !== undefined) {
                this.cells.set(loc, mkEncodedCell(word));
            }
        }
    }

    private handleLabel(ctx: Context, stmt: Nodes.LabelStatement): StatementEffect {
        // stored in pass 1 already, memory-reference bodies stay raw unless requested
        if (this.opts.encodeLabeledMri && stmt.body?.type == NodeType.Instruction) {
            return this.encodeInstruction(ctx, stmt.body);
        }
        this.checkResolvable(ctx);
        return { skip: true };
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
        return this.encodeInstruction(ctx, stmt);
    }

    private encodeInstruction(ctx: Context, stmt: Nodes.InstructionStatement): StatementEffect {
        const mri = lookupMri(this.tables, stmt.mnemonic.text);
        if (!mri) {
            this.checkResolvable(ctx);
            return { skip: true };
        }

        if (!stmt.operand) {
            throw Nodes.mkTokenError(`${stmt.mnemonic.text} needs an address`, AssemblyErrorKind.MissingOperand, stmt.mnemonic, stmt.line);
        }

        const addr = this.labels.get(normalizeSymbolName(stmt.operand.text));
        if (addr === undefined) {
            throw Nodes.mkTokenError(`Undefined label ${stmt.operand.text}`, AssemblyErrorKind.UnresolvedSymbol, stmt.operand, stmt.line);
        }

        return { output: mkEncodedCell(composeMriWord(mri.indirect, mri.opcode, addr)) };
    }

    // whatever pass 1 left raw here must be a directive or a memory-reference instruction by now
    private checkResolvable(ctx: Context) {
        const cell = this.cells.get(ctx.location);
        if (cell?.type != CellType.Raw) {
            return;
        }

        const text = cell.mnemonic.text;
        if (!isPseudo(text) && !lookupMri(this.tables, text)) {
            throw Nodes.mkTokenError(`Unknown instruction ${text}`, AssemblyErrorKind.UnresolvedSymbol, cell.mnemonic, cell.line);
        }
    }
}
