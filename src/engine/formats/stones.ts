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

export interface Intersection {
    /** Horizontal coordinate, counting left to right */
    x: number;

    /** Vertical coordinate, counting top to bottom */
    y: number;
}

export enum StoneColor {
    EMPTY = 0,
    BLACK = 1,
    WHITE = 2,
}

export type PlayerColor = StoneColor.BLACK | StoneColor.WHITE;

export type PlayerColorName = "black" | "white";

/**
 * The result of interpreting a game record. Coordinates are 1-based, and
 * each list is sorted by `x * size + y`.
 */
export interface GameData {
    size: number;
    white_stones: Intersection[];
    black_stones: Intersection[];
}

export function opponentOf(color: PlayerColor): PlayerColor {
    return color === StoneColor.BLACK ? StoneColor.WHITE : StoneColor.BLACK;
}

export function colorName(color: PlayerColor): PlayerColorName {
    return color === StoneColor.BLACK ? "black" : "white";
}
