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

import { Assembler, AssemblerOptions } from "./assembler/Assembler.js";
import { CellValue } from "./assembler/CellValue.js";
import { imageToRecord } from "./outputformats/ImageFormat.js";
import { Program } from "./parser/nodes/Node.js";
import { InstructionSet, loadPreludeInstructionSet } from "./tables/InstructionSet.js";
import { CodeError } from "./utils/CodeError.js";

export interface BcasmOptions extends AssemblerOptions {
    // replaces the built-in table of the same kind
    tables?: Partial<InstructionSet>;
};

export interface BcasmOutput {
    image: ReadonlyMap<number, CellValue>;
    binary: Record<string, string>;
    labels: ReadonlyMap<string, number>;
    errors: ReadonlyArray<CodeError>;
    warnings: ReadonlyArray<CodeError>;
}

export class Bcasm {
    private asm: Assembler;
    private program?: Program;

    public constructor(opts: BcasmOptions) {
        const prelude = loadPreludeInstructionSet();
        const tables: InstructionSet = {
            mri: opts.tables?.mri ?? prelude.mri,
            rri: opts.tables?.rri ?? prelude.rri,
            ioi: opts.tables?.ioi ?? prelude.ioi,
        };
        this.asm = new Assembler(opts, tables);
    }

    public setInput(name: string, content: string): Program {
        this.program = this.asm.parseInput(name, content);
        return this.program;
    }

    public run(): BcasmOutput {
        if (!this.program) {
            throw Error("No input given");
        }

        const { image, labels, errors, warnings } = this.asm.assemble(this.program);
        const binary = imageToRecord(image);

        return { image, binary, labels, errors, warnings };
    }
}
