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

export class Context {
    private location_ = 0;

    public get location() {
        return this.location_;
    }

    public clone(): Context {
        const newCtx = new Context();
        newCtx.location_ = this.location_;
        return newCtx;
    }

    public withLocation(newLoc: number): Context {
        const newCtx = this.clone();
        newCtx.location_ = newLoc;
        return newCtx;
    }

    public advance(): Context {
        return this.withLocation(this.location_ + 1);
    }
}
