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

import * as Nodes from "../../parser/nodes/Node.js";
import { NodeType } from "../../parser/nodes/Node.js";
import { CellValue } from "../CellValue.js";
import { Context } from "../Context.js";

export type StatementHandler<T extends Nodes.Statement> = (ctx: Context, stmt: T) => StatementEffect;
export type RegisterFunction = <T extends Nodes.Statement>(type: T["type"], handler: StatementHandler<T>) => void;

export interface StatementEffect {
    // store value at current location (and implicitly advance the location by one)
    output?: CellValue;

    // advance the location by one without storing anything
    skip?: boolean;

    // set location to new value, no advance
    setOrigin?: number;

    // stop the pass after this statement
    end?: boolean;
}

export class HandlerTable {
    private handlers: StatementHandler<Nodes.Statement>[] = [];

    public register<T extends Nodes.Statement>(type: T["type"], handler: StatementHandler<T>) {
        if (this.handlers[type]) {
            throw Error(`Multiple handlers for ${NodeType[type]}`);
        }

        // storing as if it was a generic handler for any handler, so promise:
        // only calling [x] with matching type index
        this.handlers[type] = handler as StatementHandler<Nodes.Statement>;
    }

    public get(type: Nodes.Statement["type"]): StatementHandler<Nodes.Statement> | undefined {
        return this.handlers[type];
    }
}
