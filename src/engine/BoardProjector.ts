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

import { removeDeadStones } from "./DeadStones";
import { GameRecordError } from "./FusekiError";
import { Grid } from "./Grid";
import { PropertyEvent } from "./PropertyEvent";
import { Intersection, PlayerColor, StoneColor, opponentOf } from "./formats/stones";
import { isLegacyPass } from "./util";

export interface BoardProjectorOptions {
    /** console.log every property that doesn't affect the board */
    log_ignored_properties?: boolean;
}

/**
 * Replays property events onto a grid and two stone lists. The grid and
 * the lists always agree: a cell holds a color exactly when its point is in
 * that color's list.
 */
export class BoardProjector {
    private board_size: number = 0;
    private grid: Grid = new Grid(0);
    private white: Intersection[] = [];
    private black: Intersection[] = [];

    private options: BoardProjectorOptions;
    private event_index = -1;

    constructor(options: BoardProjectorOptions = {}) {
        this.options = options;
    }

    get size(): number {
        return this.board_size;
    }

    /** Copies, in placement order */
    get white_stones(): Intersection[] {
        return this.stones(StoneColor.WHITE);
    }

    get black_stones(): Intersection[] {
        return this.stones(StoneColor.BLACK);
    }

    public stoneAt(x: number, y: number): StoneColor {
        return this.grid.get(x, y);
    }

    public apply(event: PropertyEvent, index: number = this.event_index + 1): void {
        this.event_index = index;

        switch (event.type) {
            case "board_size":
                this.setBoardSize(event.size);
                break;

            case "move": {
                if (event.point === null) {
                    break;
                }
                const ident = event.color === StoneColor.BLACK ? "B" : "W";
                this.requireBoard(ident);
                if (isLegacyPass(event.point, this.size)) {
                    break;
                }
                this.placeStone(event.color, event.point, ident);
                /* The mover's own stones are checked first, then the opponent's */
                this.removeDeadStones(event.color);
                this.removeDeadStones(opponentOf(event.color));
                break;
            }

            case "add_stones": {
                const ident = event.color === StoneColor.BLACK ? "AB" : "AW";
                this.requireBoard(ident);
                for (const pt of event.points) {
                    this.placeStone(event.color, pt, ident);
                }
                break;
            }

            case "other":
                if (this.options.log_ignored_properties) {
                    console.log(`Other prop: ${event.ident}[${event.values.join("][")}]`);
                }
                break;
        }
    }

    public stones(color: PlayerColor): Intersection[] {
        return this.list(color).map((pt) => ({ x: pt.x, y: pt.y }));
    }

    private list(color: PlayerColor): Intersection[] {
        return color === StoneColor.BLACK ? this.black : this.white;
    }

    private setBoardSize(size: number): void {
        if (this.white.length > 0 || this.black.length > 0) {
            if (size === this.board_size) {
                return;
            }
            throw new GameRecordError(
                "board_size_redeclared",
                this.event_index,
                "SZ",
                `${this.board_size} -> ${size} with stones on the board`,
            );
        }
        this.board_size = size;
        this.grid = new Grid(size);
    }

    private requireBoard(ident: string): void {
        if (this.board_size === 0) {
            throw new GameRecordError("missing_board_size", this.event_index, ident);
        }
    }

    private placeStone(color: PlayerColor, pt: Intersection, ident: string): void {
        if (!this.grid.contains(pt.x, pt.y)) {
            throw new GameRecordError(
                "coordinate_out_of_range",
                this.event_index,
                ident,
                `(${pt.x}, ${pt.y}) on a ${this.board_size}x${this.board_size} board`,
            );
        }
        if (this.grid.get(pt.x, pt.y) !== StoneColor.EMPTY) {
            throw new GameRecordError(
                "stone_already_placed_here",
                this.event_index,
                ident,
                `(${pt.x}, ${pt.y})`,
            );
        }

        this.list(color).push({ x: pt.x, y: pt.y });
        this.grid.set(pt.x, pt.y, color);
    }

    private removeDeadStones(color: PlayerColor): void {
        const survivors = removeDeadStones(this.grid, this.list(color));
        if (color === StoneColor.BLACK) {
            this.black = survivors;
        } else {
            this.white = survivors;
        }
    }
}
