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

import { BoardProjector, BoardProjectorOptions } from "./BoardProjector";
import { GameRecordError } from "./FusekiError";
import { toPropertyEvent } from "./PropertyEvent";
import { GameData, Intersection } from "./formats/stones";
import { getSGFProperties } from "./sgf";

export type GameRecordOptions = BoardProjectorOptions;

/**
 * Sorts by `x * size + y` and shifts every point to the 1-based convention
 * used for display. Does not modify `stones`.
 */
export function normalizeStones(stones: readonly Intersection[], size: number): Intersection[] {
    return stones
        .slice()
        .sort((a, b) => a.x * size + a.y - (b.x * size + b.y))
        .map((pt) => ({ x: pt.x + 1, y: pt.y + 1 }));
}

/**
 * Replays an SGF game record and returns the stones left on the board.
 *
 * Every variation in the record is replayed, in document order, on the same
 * board. After each move, stones with no liberties are removed.
 *
 * Throws SGFParseError if the text can't be parsed, and GameRecordError if
 * the record can't be placed on a board.
 */
export function getGameData(sgf: string, options: GameRecordOptions = {}): GameData {
    const props = getSGFProperties(sgf);
    const projector = new BoardProjector(options);

    props.forEach((prop, index) => {
        projector.apply(toPropertyEvent(prop, index), index);
    });

    if (projector.size === 0) {
        throw new GameRecordError("missing_board_size", -1, "SZ");
    }

    return {
        size: projector.size,
        white_stones: normalizeStones(projector.white_stones, projector.size),
        black_stones: normalizeStones(projector.black_stones, projector.size),
    };
}
