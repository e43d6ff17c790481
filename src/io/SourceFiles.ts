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

import { readFileSync } from "fs";
import { extname } from "path";
import { InstructionTable, TableKind } from "../tables/InstructionTable.js";
import { InstructionSet } from "../tables/InstructionSet.js";

export const SourceExtensions = [".asm", ".S"];

export interface TablePaths {
    mri?: string;
    rri?: string;
    ioi?: string;
}

export function readSourceFile(path: string): string {
    if (!SourceExtensions.includes(extname(path))) {
        throw Error(`${path} does not end with ${SourceExtensions.join(" or ")}`);
    }
    return readFileSync(path, "utf-8");
}

export function readInstructionTable(kind: TableKind, path: string): InstructionTable {
    return InstructionTable.parse(kind, path, readFileSync(path, "utf-8"));
}

export function readInstructionSet(paths: TablePaths): Partial<InstructionSet> {
    const set: Partial<InstructionSet> = {};
    if (paths.mri) {
        set.mri = readInstructionTable(TableKind.MemoryReference, paths.mri);
    }
    if (paths.rri) {
        set.rri = readInstructionTable(TableKind.RegisterReference, paths.rri);
    }
    if (paths.ioi) {
        set.ioi = readInstructionTable(TableKind.InputOutput, paths.ioi);
    }
    return set;
}
