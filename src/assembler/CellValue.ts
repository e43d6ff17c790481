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

import { Token, TokenLine } from "../lexer/Token.js";

export enum CellType {
    Raw,        // mnemonic stored by pass 1, awaiting resolution
    Encoded,    // complete binary word
}

export type CellValue = RawCell | EncodedCell;

export interface RawCell {
    type: CellType.Raw;
    mnemonic: Token;
    line: TokenLine;

    // whether the mnemonic followed a label on its line
    labeled: boolean;
}

export interface EncodedCell {
    type: CellType.Encoded;
    word: string;
}

export function mkEncodedCell(word: string): EncodedCell {
    return { type: CellType.Encoded, word };
}

export function formatCell(cell: CellValue): string {
    switch (cell.type) {
        case CellType.Raw:      return cell.mnemonic.text;
        case CellType.Encoded:  return cell.word;
    }
}
