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

import { Grid } from "./Grid";
import { Intersection, StoneColor } from "./formats/stones";

/**
 * Returns the stones of `stones` that have no path to an empty point
 * through other stones of the same list.
 *
 * A stone is safe if one of its neighbors is empty or is a stone already
 * known to be safe. We sweep the list, in order, until a sweep marks nothing
 * new; whatever is left unmarked is dead. Every stone of the list is
 * checked, not only those near the last move.
 */
export function findDeadStones(grid: Grid, stones: readonly Intersection[]): Intersection[] {
    const safe = new Set<number>();

    let marked_new_stone = true;
    while (marked_new_stone) {
        marked_new_stone = false;

        for (const stone of stones) {
            const idx = grid.index(stone.x, stone.y);
            if (safe.has(idx)) {
                continue;
            }

            for (const n of grid.neighbors(stone.x, stone.y)) {
                if (grid.get(n.x, n.y) === StoneColor.EMPTY || safe.has(grid.index(n.x, n.y))) {
                    safe.add(idx);
                    marked_new_stone = true;
                    break;
                }
            }
        }
    }

    return stones.filter((stone) => !safe.has(grid.index(stone.x, stone.y)));
}

/**
 * Clears the dead stones of `stones` from the grid and returns the
 * survivors, in their original order.
 */
export function removeDeadStones(grid: Grid, stones: readonly Intersection[]): Intersection[] {
    const dead = findDeadStones(grid, stones);
    if (dead.length === 0) {
        return stones.slice();
    }

    const dead_idx = new Set<number>();
    for (const stone of dead) {
        grid.set(stone.x, stone.y, StoneColor.EMPTY);
        dead_idx.add(grid.index(stone.x, stone.y));
    }
    return stones.filter((stone) => !dead_idx.has(grid.index(stone.x, stone.y)));
}
