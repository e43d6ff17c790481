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

import { CursorExtent } from "./Cursor.js";

// a whitespace-delimited word of a source line, already in lower case
export interface Token {
    text: string;
    extent: CursorExtent;
}

export interface TokenLine {
    inputName: string;
    lineIdx: number;
    tokens: Token[];
}

export function lineToString(line: TokenLine): string {
    return line.tokens.map(t => t.text).join(" ");
}

export function isLabelToken(tok: Token, delimiter: string): boolean {
    return tok.text.length > delimiter.length && tok.text.endsWith(delimiter);
}
