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

import { CommentMarker } from "../utils/BasicComputer.js";
import { Cursor } from "./Cursor.js";
import { Token, TokenLine } from "./Token.js";

export class Lexer {
    private static LineBreakRegex = /\r?\n/;
    private static WordRegex = /\S+/g;
    private inputName: string;
    private inputData: string;

    public constructor(inputName: string, input: string) {
        this.inputName = inputName;
        this.inputData = input;
    }

    public getInputName(): string {
        return this.inputName;
    }

    /**
     * Splits the input into lines of lower-case tokens.
     * A token starting with the comment marker ends the line, so lines
     * consisting only of a comment come back without tokens.
     */
    public tokenize(): TokenLine[] {
        return this.inputData
            .split(Lexer.LineBreakRegex)
            .map((text, lineIdx) => this.tokenizeLine(text, lineIdx));
    }

    private tokenizeLine(text: string, lineIdx: number): TokenLine {
        const line: TokenLine = {
            inputName: this.inputName,
            lineIdx: lineIdx,
            tokens: [],
        };

        for (const match of text.matchAll(Lexer.WordRegex)) {
            const word = match[0];
            const colIdx = match.index ?? 0;
            if (word.startsWith(CommentMarker)) {
                break;
            }
            line.tokens.push(this.mkToken(word, lineIdx, colIdx));
        }

        return line;
    }

    private mkToken(word: string, lineIdx: number, colIdx: number): Token {
        const cursor: Cursor = {
            inputName: this.inputName,
            lineIdx: lineIdx,
            colIdx: colIdx,
        };
        return {
            text: word.toLowerCase(),
            extent: { cursor, width: word.length },
        };
    }
}
