#!/usr/bin/env node
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

import { command, positional, run } from "cmd-ts";
import { existsSync, readFileSync, readdirSync } from "fs";
import path, { basename } from "path";
import { Bcasm, BcasmOptions } from "../src/Bcasm.js";
import { ListingWriter } from "../src/outputformats/ListingWriter.js";
import { compareListing } from "../src/outputformats/compareListing.js";
import { formatCodeError } from "../src/utils/CodeError.js";

const cmd = command({
    name: "bcasm-tb",
    description: "Bcasm Testbench",
    args: {
        dir: positional({
            description: "Input directory with .asm and .lst files",
            displayName: "directory",
        }),
    },
    handler: (args) => {
        let allGood = true;
        for (const fileName of readdirSync(args.dir)) {
            if (!fileName.match(/\.(asm|S)$/)) {
                continue;
            }
            const filePath = args.dir + "/" + fileName;
            const lstPath = path.format({ ...path.parse(filePath), base: "", ext: ".lst" });
            if (!existsSync(lstPath)) {
                continue;
            }

            const optsPath = path.format({ ...path.parse(filePath), base: "", ext: ".options.json" });
            let rawOpts: unknown;
            if (existsSync(optsPath)) {
                rawOpts = JSON.parse(readFileSync(optsPath, "utf-8"));
            }
            const opts = createOptions(rawOpts);
            const res = testOne(opts, filePath, lstPath);
            if (!res) {
                allGood = false;
            }
            console.log(`Checked ${basename(filePath)}: ${res ? "good" : "bad"}`);
        }
        console.log(`All good: ${allGood}`);
        process.exit(allGood ? 0 : 1);
    },
});

function createOptions(json: unknown): BcasmOptions {
    const opts: BcasmOptions = {};

    if (typeof json != "object" || json === null) {
        return opts;
    }

    if ("encodeLabeledMri" in json) {
        opts.encodeLabeledMri = json.encodeLabeledMri === true;
    }

    if ("requireEnd" in json) {
        opts.requireEnd = json.requireEnd === true;
    }

    return opts;
}

function testOne(opts: BcasmOptions, srcPath: string, lstPath: string): boolean {
    const bcasm = new Bcasm(opts);
    bcasm.setInput(basename(srcPath), readFileSync(srcPath, "utf-8"));
    const output = bcasm.run();

    if (output.errors.length > 0) {
        output.errors.forEach(e => console.error(formatCodeError(e)));
        return false;
    }

    const listing = new ListingWriter();
    listing.writeImage(output.image);
    return compareListing(basename(srcPath), listing.finish(), readFileSync(lstPath, "utf-8"));
}

void run(cmd, process.argv.slice(2));
