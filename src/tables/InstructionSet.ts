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

import { PreludeIoi, PreludeMri, PreludeRri } from "../prelude/BasicComputer.js";
import { IndirectMarker } from "../utils/BasicComputer.js";
import { InstructionTable, TableKind } from "./InstructionTable.js";

export interface InstructionSet {
    mri: InstructionTable;
    rri: InstructionTable;
    ioi: InstructionTable;
}

export interface MriLookup {
    opcode: string;
    indirect: boolean;
}

export function loadPreludeInstructionSet(): InstructionSet {
    return {
        mri: InstructionTable.parse(TableKind.MemoryReference, "prelude/mri.txt", PreludeMri),
        rri: InstructionTable.parse(TableKind.RegisterReference, "prelude/rri.txt", PreludeRri),
        ioi: InstructionTable.parse(TableKind.InputOutput, "prelude/ioi.txt", PreludeIoi),
    };
}

/**
 * Complete word of a register-reference or I/O mnemonic. I/O wins if both define it.
 */
export function lookupFixedWord(set: InstructionSet, mnemonic: string): string | undefined {
    return set.ioi.lookup(mnemonic) ?? set.rri.lookup(mnemonic);
}

/**
 * Opcode of a memory-reference mnemonic, either plain (direct) or with the
 * indirect marker appended. A plain table entry takes precedence.
 */
export function lookupMri(set: InstructionSet, mnemonic: string): MriLookup | undefined {
    const direct = set.mri.lookup(mnemonic);
    if (direct !== undefined) {
        return { opcode: direct, indirect: false };
    }

    if (mnemonic.length > IndirectMarker.length && mnemonic.endsWith(IndirectMarker)) {
        const base = mnemonic.substring(0, mnemonic.length - IndirectMarker.length);
        const indirect = set.mri.lookup(base);
        if (indirect !== undefined) {
            return { opcode: indirect, indirect: true };
        }
    }

    return undefined;
}
