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

import { CellValue, formatCell } from "../assembler/CellValue.js";
import { formatAddress } from "../utils/BasicComputer.js";

/**
 * Location and word as fixed-width binary strings, e.g. {"000100000000": "0111100000000000"}.
 * Cells left unencoded keep their mnemonic.
 */
export function imageToRecord(image: ReadonlyMap<number, CellValue>): Record<string, string> {
    const res: Record<string, string> = {};
    for (const [loc, cell] of image) {
        res[formatAddress(loc)] = formatCell(cell);
    }
    return res;
}

export function writeJson(image: ReadonlyMap<number, CellValue>): string {
    return JSON.stringify(imageToRecord(image), null, 4) + "\n";
}
