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

// memory-reference instructions, opcode only
export const PreludeMri = `
    AND 000
    ADD 001
    LDA 010
    STA 011
    BUN 100
    BSA 101
    ISZ 110
`;

// register-reference instructions
export const PreludeRri = `
    CLA 0111100000000000    / CLEAR AC
    CLE 0111010000000000    / CLEAR E
    CMA 0111001000000000    / COMPLEMENT AC
    CME 0111000100000000    / COMPLEMENT E
    CIR 0111000010000000    / CIRCULATE RIGHT
    CIL 0111000001000000    / CIRCULATE LEFT
    INC 0111000000100000    / INCREMENT AC
    SPA 0111000000010000    / SKIP ON POSITIVE AC
    SNA 0111000000001000    / SKIP ON NEGATIVE AC
    SZA 0111000000000100    / SKIP ON ZERO AC
    SZE 0111000000000010    / SKIP ON ZERO E
    HLT 0111000000000001    / HALT
`;

// input-output instructions
export const PreludeIoi = `
    INP 1111100000000000    / INPUT CHARACTER
    OUT 1111010000000000    / OUTPUT CHARACTER
    SKI 1111001000000000    / SKIP ON INPUT FLAG
    SKO 1111000100000000    / SKIP ON OUTPUT FLAG
    ION 1111000010000000    / INTERRUPT ON
    IOF 1111000001000000    / INTERRUPT OFF
`;
