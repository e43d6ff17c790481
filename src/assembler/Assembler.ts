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

import { Parser } from "../parser/Parser.js";
import * as Nodes from "../parser/nodes/Node.js";
import { InstructionSet } from "../tables/InstructionSet.js";
import { isValidAddress } from "../utils/BasicComputer.js";
import { AssemblyErrorKind, CodeError } from "../utils/CodeError.js";
import { AddressSymbolTable } from "./AddressSymbolTable.js";
import { CellType, CellValue } from "./CellValue.js";
import { Context } from "./Context.js";
import { LabelTable } from "./LabelTable.js";
import { LocationScanner } from "./passes/LocationScanner.js";
import { WordEncoder } from "./passes/WordEncoder.js";
import { HandlerTable, StatementEffect, StatementHandler } from "./util/StatementEffect.js";

export interface AssemblerOptions {
    encodeLabeledMri?: boolean;     // also encode memory-reference instructions that follow a label
    requireEnd?: boolean;           // input without END is an error instead of a warning
}

export interface SubComponents {
    options: AssemblerOptions;
    tables: InstructionSet;
}

export interface ScanResult {
    cells: ReadonlyMap<number, CellValue>;
    labels: ReadonlyMap<string, number>;
    ended: boolean;
}

export interface AssemblerOutput {
    image: ReadonlyMap<number, CellValue>;
    labels: ReadonlyMap<string, number>;
    errors: readonly CodeError[];
    warnings: readonly CodeError[];
}

export class Assembler {
    private opts: AssemblerOptions;
    private tables: InstructionSet;

    public constructor(options: AssemblerOptions, tables: InstructionSet) {
        this.opts = options;
        this.tables = tables;
    }

    public parseInput(name: string, input: string): Nodes.Program {
        const parser = new Parser(name, input);
        return parser.parseProgram();
    }

    public assemble(prog: Nodes.Program): AssemblerOutput {
        const warnings: CodeError[] = [];
        let labels: ReadonlyMap<string, number> = new Map();

        try {
            // pass 1: assign locations to labels, store literals and raw mnemonics
            const scan = this.scanLocations(prog);
            labels = scan.labels;
            if (!scan.ended) {
                const err = this.mkMissingEndError(prog);
                if (this.opts.requireEnd) {
                    throw err;
                }
                warnings.push(err);
            }

            // pass 2: encode everything, using the complete label table from pass 1
            const image = this.encodeWords(prog, scan);
            this.checkResolved(image, warnings);

            return { image, labels, errors: [], warnings };
        } catch (e) {
            if (e instanceof CodeError) {
                return { image: new Map(), labels, errors: [e], warnings };
            }
            throw e;
        }
    }

    private scanLocations(prog: Nodes.Program): ScanResult {
        const labels = new LabelTable();
        const cells = new AddressSymbolTable();
        const handlers = new HandlerTable();

        const scanner = new LocationScanner(labels);
        scanner.registerStatements(handlers.register.bind(handlers));

        const ended = this.doPass(new Context(), prog, handlers, cells);
        return {
            cells: cells.snapshot(),
            labels: labels.snapshot(),
            ended: ended,
        };
    }

    private encodeWords(prog: Nodes.Program, scan: ScanResult): ReadonlyMap<number, CellValue> {
        const cells = new AddressSymbolTable(scan.cells);
        const handlers = new HandlerTable();

        const encoder = new WordEncoder(this.getComponents(), scan.labels, cells);
        encoder.registerStatements(handlers.register.bind(handlers));
        encoder.resolveFixedWords();

        this.doPass(new Context(), prog, handlers, cells);
        return cells.snapshot();
    }

    private getComponents(): SubComponents {
        return {
            options: this.opts,
            tables: this.tables,
        };
    }

    // returns whether the pass was stopped by END
    private doPass(ctx: Context, prog: Nodes.Program, handlers: HandlerTable, cells: AddressSymbolTable): boolean {
        for (const stmt of prog.stmts) {
            const handler = handlers.get(stmt.type);
            if (!handler) {
                continue;
            }

            const effect = this.runHandler(handler, ctx, stmt);

            if (effect.setOrigin !== undefined) {
                ctx = ctx.withLocation(effect.setOrigin);
            }

            if (effect.output) {
                if (!isValidAddress(ctx.location)) {
                    const msg = `Location ${ctx.location.toString(16)} outside of memory`;
                    throw Nodes.mkNodeError(msg, AssemblyErrorKind.AddressOverflow, stmt, stmt.line);
                }
                cells.set(ctx.location, effect.output);
                ctx = ctx.advance();
            } else if (effect.skip) {
                ctx = ctx.advance();
            }

            if (effect.end) {
                return true;
            }
        }
        return false;
    }

    private runHandler(handler: StatementHandler<Nodes.Statement>, ctx: Context, stmt: Nodes.Statement): StatementEffect {
        try {
            return handler(ctx, stmt);
        } catch (e) {
            if (!(e instanceof CodeError) && e instanceof Error) {
                throw Nodes.mkNodeError(e.message, AssemblyErrorKind.Internal, stmt, stmt.line);
            }
            throw e;
        }
    }

    // unknown mnemonics already failed in pass 2, what is left raw are MRIs after labels and directives like DEC
    private checkResolved(image: ReadonlyMap<number, CellValue>, warnings: CodeError[]) {
        for (const [loc, cell] of image) {
            if (cell.type == CellType.Encoded) {
                continue;
            }

            const where = cell.labeled ? "after label at" : "at";
            const msg = `${cell.mnemonic.text} ${where} ${loc.toString(16)} left unencoded`;
            warnings.push(Nodes.mkTokenError(msg, AssemblyErrorKind.UnresolvedSymbol, cell.mnemonic, cell.line));
        }
    }

    private mkMissingEndError(prog: Nodes.Program): CodeError {
        const cursor = {
            inputName: prog.inputName,
            lineIdx: Math.max(prog.lines.length - 1, 0),
            colIdx: 0,
        };
        return new CodeError("Input ended without END", cursor, AssemblyErrorKind.MissingEndDirective);
    }
}
