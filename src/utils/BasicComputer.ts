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

import { numToBinary } from "./Strings.js";

export const AddressWidth = 12;
export const WordWidth = 16;
export const OpcodeWidth = 3;

export const MaxAddress = (1 << AddressWidth) - 1;
export const MaxWord = (1 << WordWidth) - 1;

export const LabelDelimiter = ",";
export const CommentMarker = "/";
export const IndirectMarker = "i";

export function isValidAddress(loc: number): boolean {
    return Number.isInteger(loc) && loc >= 0 && loc <= MaxAddress;
}

export function formatAddress(loc: number): string {
    return numToBinary(loc, AddressWidth);
}

export function formatWord(word: number): string {
    return numToBinary(word, WordWidth);
}

/**
 * Composes a memory-reference instruction word: mode bit, opcode, address.
 */
export function composeMriWord(indirect: boolean, opcode: string, addr: number): string {
    return (indirect ? "1" : "0") + opcode + formatAddress(addr);
}

export const Pseudos = {
    Origin: "org",
    End: "end",
    Hex: "hex",
    Decimal: "dec",
} as const;

export function isPseudo(text: string): boolean {
    return Object.values<string>(Pseudos).includes(text);
}
