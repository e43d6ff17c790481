#!/usr/bin/env node
/* eslint-disable max-lines-per-function */
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

import { command, flag, oneOf, option, optional, positional, run, string } from "cmd-ts";
import { closeSync, openSync, readFileSync, writeFileSync } from "fs";
import { basename } from "path";
import { Bcasm, BcasmOptions } from "../src/Bcasm.js";
import { readInstructionSet, readSourceFile } from "../src/io/SourceFiles.js";
import { writeJson } from "../src/outputformats/ImageFormat.js";
import { ListingWriter } from "../src/outputformats/ListingWriter.js";
import { compareListing } from "../src/outputformats/compareListing.js";
import { dumpAst } from "../src/parser/nodes/dumpAst.js";
import { formatAddress } from "../src/utils/BasicComputer.js";
import { CodeError, formatCodeError } from "../src/utils/CodeError.js";

// eslint-disable-next-line max-lines-per-function
const cmd = command({
    name: "bcasm",
    description: "Two-pass assembler for the basic computer",
    args: {
        mri: option({
            long: "mri",
            description: "Memory-reference instruction table",
            type: optional(string),
        }),
        rri: option({
            long: "rri",
            description: "Register-reference instruction table",
            type: optional(string),
        }),
        ioi: option({
            long: "ioi",
            description: "Input-output instruction table",
            type: optional(string),
        }),
        format: option({
            long: "format",
            short: "f",
            description: "Output format",
            type: oneOf(["listing", "json"]),
            defaultValue: () => "listing" as const,
        }),
        output: option({
            long: "output",
            short: "o",
            description: "Output file, default is the source name with .lst or .json appended",
            type: optional(string),
        }),
        symbols: flag({
            long: "symbols",
            short: "s",
            description: "Print label table",
        }),
        outputAst: flag({
            long: "write-ast",
            short: "a",
            description: "Write abstract syntax tree",
        }),
        encodeLabeledMri: flag({
            long: "encode-labeled-mri",
            description: "Also encode memory-reference instructions that follow a label",
        }),
        requireEnd: flag({
            long: "require-end",
            description: "Fail if the source has no END",
        }),
        compareWith: option({
            long: "compare",
            short: "c",
            description: "Compare output with given listing",
            type: optional(string),
        }),
        file: positional({
            description: "Input source file",
            displayName: "source",
            type: string,
        }),
    },

    handler: (args) => {
        const opts: BcasmOptions = {};
        opts.encodeLabeledMri = args.encodeLabeledMri;
        opts.requireEnd = args.requireEnd;

        let src: string;
        try {
            opts.tables = readInstructionSet({ mri: args.mri, rri: args.rri, ioi: args.ioi });
            src = readSourceFile(args.file);
        } catch (e) {
            console.error(e instanceof CodeError ? formatCodeError(e) : String(e));
            process.exit(-1);
        }

        const bcasm = new Bcasm(opts);
        const ast = bcasm.setInput(args.file, src);
        if (args.outputAst) {
            const astFile = openSync(basename(args.file) + ".ast.txt", "w");
            dumpAst(ast, line => writeFileSync(astFile, line + "\n"));
            closeSync(astFile);
        }

        const output = bcasm.run();
        output.warnings.forEach(w => console.warn(formatCodeError(w)));
        if (output.errors.length > 0) {
            output.errors.forEach(e => console.error(formatCodeError(e)));
            process.exit(-1);
        }

        const listing = new ListingWriter();
        listing.writeImage(output.image);

        const text = args.format == "json" ? writeJson(output.image) : listing.finish();
        const outName = args.output ?? basename(args.file) + (args.format == "json" ? ".json" : ".lst");
        writeFileSync(outName, text);
        console.log(`Wrote ${output.image.size} words to ${outName}`);

        if (args.symbols) {
            for (const [name, loc] of output.labels) {
                console.log(`${name.padEnd(10)} ${formatAddress(loc)}`);
            }
        }

        if (args.compareWith) {
            const other = readFileSync(args.compareWith, "utf-8");
            const name = basename(args.compareWith);
            if (compareListing(name, listing.finish(), other)) {
                console.log("No differences");
            } else {
                process.exit(-1);
            }
        }

        process.exit(0);
    }
});

void run(cmd, process.argv.slice(2));
