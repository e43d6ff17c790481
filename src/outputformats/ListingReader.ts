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

import { AddressWidth } from "../utils/BasicComputer.js";
import { isBinaryString } from "../utils/Strings.js";

export class ListingReader {
    private data: string;

    public constructor(data: string) {
        this.data = data;
    }

    public read(): Map<string, string> {
        const state = new Map<string, string>();
        const lines = this.data.split(/\r?\n/);

        for (let i = 0; i < lines.length; i++) {
            const line = lines[i].trim();
            if (line.length == 0) {
                continue;
            }

            const parts = line.split(/\s+/);
            if (parts.length != 2 || !isBinaryString(parts[0], AddressWidth)) {
                throw Error(`Invalid listing entry in line ${i + 1}: ${line}`);
            }
            state.set(parts[0], parts[1]);
        }

        return state;
    }
}
