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

import { isValidAddress } from "../utils/BasicComputer.js";
import { CellValue } from "./CellValue.js";

/**
 * Memory image under construction: location to cell value.
 * Iteration follows the order in which locations were first assigned.
 */
export class AddressSymbolTable {
    private cells = new Map<number, CellValue>();

    public constructor(cells: Iterable<[number, CellValue]> = []) {
        for (const [loc, cell] of cells) {
            this.set(loc, cell);
        }
    }

    public set(loc: number, cell: CellValue) {
        if (!isValidAddress(loc)) {
            throw Error(`Location ${loc.toString(16)} outside of memory`);
        }
        this.cells.set(loc, cell);
    }

    public get(loc: number): CellValue | undefined {
        return this.cells.get(loc);
    }

    public entries(): IterableIterator<[number, CellValue]> {
        return this.cells.entries();
    }

    public snapshot(): ReadonlyMap<number, CellValue> {
        return new Map(this.cells);
    }
}
