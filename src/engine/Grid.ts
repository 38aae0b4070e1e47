/*
 * Copyright (C) Online-Go.com
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *  http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { Intersection, StoneColor } from "./formats/stones";

/**
 * A square board held in a single row-major buffer, indexed by
 * `y * size + x`.
 */
export class Grid {
    public readonly size: number;
    private readonly cells: StoneColor[];

    constructor(size: number) {
        this.size = size;
        this.cells = new Array<StoneColor>(size * size).fill(StoneColor.EMPTY);
    }

    public index(x: number, y: number): number {
        return y * this.size + x;
    }

    public contains(x: number, y: number): boolean {
        return (
            Number.isInteger(x) &&
            Number.isInteger(y) &&
            x >= 0 &&
            y >= 0 &&
            x < this.size &&
            y < this.size
        );
    }

    public get(x: number, y: number): StoneColor {
        return this.cells[this.index(x, y)];
    }

    public set(x: number, y: number, color: StoneColor): void {
        this.cells[this.index(x, y)] = color;
    }

    /** Orthogonal neighbors that lie on the board */
    public neighbors(x: number, y: number): Intersection[] {
        const ret: Intersection[] = [];
        if (x > 0) {
            ret.push({ x: x - 1, y });
        }
        if (x < this.size - 1) {
            ret.push({ x: x + 1, y });
        }
        if (y > 0) {
            ret.push({ x, y: y - 1 });
        }
        if (y < this.size - 1) {
            ret.push({ x, y: y + 1 });
        }
        return ret;
    }

    /** Returns the board as rows, `[y][x]` */
    public toMatrix(): StoneColor[][] {
        const ret: StoneColor[][] = [];
        for (let y = 0; y < this.size; ++y) {
            ret.push(this.cells.slice(y * this.size, (y + 1) * this.size));
        }
        return ret;
    }
}
