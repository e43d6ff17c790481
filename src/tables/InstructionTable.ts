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
import { lineToString } from "../lexer/Token.js";
import { OpcodeWidth, WordWidth } from "../utils/BasicComputer.js";
import { AssemblyErrorKind, CodeError } from "../utils/CodeError.js";
import { isBinaryString, normalizeSymbolName } from "../utils/Strings.js";

export enum TableKind {
    MemoryReference,    // AND, ADD, LDA, ...: opcode only, address follows
    RegisterReference,  // CLA, CLE, ...: complete word
    InputOutput,        // INP, OUT, ...: complete word
}

export const TableWidths: Readonly<Record<TableKind, number>> = {
    [TableKind.MemoryReference]: OpcodeWidth,
    [TableKind.RegisterReference]: WordWidth,
    [TableKind.InputOutput]: WordWidth,
};

/**
 * Mnemonic to binary encoding, all encodings of the same width.
 */
export class InstructionTable {
    public readonly kind: TableKind;
    private entries = new Map<string, string>();

    public constructor(kind: TableKind, entries: Iterable<[string, string]> = []) {
        this.kind = kind;
        for (const [mnemonic, encoding] of entries) {
            this.define(mnemonic, encoding);
        }
    }

    /**
     * Reads a table from text with one `mnemonic encoding` pair per line.
     */
    public static parse(kind: TableKind, inputName: string, text: string): InstructionTable {
        const table = new InstructionTable(kind);
        for (const line of new Lexer(inputName, text).tokenize()) {
            const [mnemonic, encoding] = line.tokens;
            if (!mnemonic) {
                continue;
            }

            if (!encoding) {
                throw new CodeError(`No encoding for ${mnemonic.text}`, mnemonic.extent.cursor, AssemblyErrorKind.MalformedTable, lineToString(line));
            }

            try {
                table.define(mnemonic.text, encoding.text);
            } catch (e) {
                if (e instanceof Error) {
                    throw new CodeError(e.message, encoding.extent.cursor, AssemblyErrorKind.MalformedTable, lineToString(line));
                }
                throw e;
            }
        }
        return table;
    }

    public get width(): number {
        return TableWidths[this.kind];
    }

    public define(mnemonic: string, encoding: string) {
        const normName = normalizeSymbolName(mnemonic);
        if (this.entries.has(normName)) {
            throw Error(`Redefining ${TableKind[this.kind]} instruction ${normName}`);
        }
        if (!isBinaryString(encoding, this.width)) {
            throw Error(`Encoding of ${normName} must be ${this.width} binary digits, got ${encoding}`);
        }
        this.entries.set(normName, encoding);
    }

    public lookup(mnemonic: string): string | undefined {
        return this.entries.get(normalizeSymbolName(mnemonic));
    }

    public has(mnemonic: string): boolean {
        return this.entries.has(normalizeSymbolName(mnemonic));
    }

    public getEntries(): ReadonlyMap<string, string> {
        return this.entries;
    }
}
