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

import { Token, TokenLine } from "../../lexer/Token.js";
import { mkTokenError } from "../../parser/nodes/Node.js";
import { MaxAddress, MaxWord } from "../../utils/BasicComputer.js";
import { AssemblyErrorKind } from "../../utils/CodeError.js";
import { parseIntSafe } from "../../utils/Strings.js";

function parseHex(tok: Token, line: TokenLine): number {
    try {
        return parseIntSafe(tok.text, 16);
    } catch (e) {
        if (e instanceof Error) {
            throw mkTokenError(`Invalid hexadecimal number ${tok.text}`, AssemblyErrorKind.MalformedLiteral, tok, line);
        }
        throw e;
    }
}

export function parseHexWord(tok: Token, line: TokenLine): number {
    const val = parseHex(tok, line);
    if (val > MaxWord) {
        throw mkTokenError(`Literal ${tok.text} does not fit into a word`, AssemblyErrorKind.MalformedLiteral, tok, line);
    }
    return val;
}

export function parseHexAddress(tok: Token, line: TokenLine): number {
    const val = parseHex(tok, line);
    if (val > MaxAddress) {
        throw mkTokenError(`Address ${tok.text} outside of memory`, AssemblyErrorKind.AddressOverflow, tok, line);
    }
    return val;
}
