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

import { ListingReader } from "./ListingReader.js";

export function compareListing(name: string, ours: string, other: string): boolean {
    const ourState = new ListingReader(ours).read();
    const otherState = new ListingReader(other).read();
    const addrs = new Set([...ourState.keys(), ...otherState.keys()]);
    let good = true;

    for (const addr of [...addrs].sort()) {
        const ourStr = ourState.get(addr) ?? "null";
        const otherStr = otherState.get(addr) ?? "null";
        if (ourStr != otherStr) {
            good = false;
            console.log(`${addr}: our ${ourStr} != other ${otherStr} in ${name}`);
        }
    }

    return good;
}
