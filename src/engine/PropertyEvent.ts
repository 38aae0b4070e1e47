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

import { GameRecordError } from "./FusekiError";
import { Intersection, PlayerColor, StoneColor } from "./formats/stones";
import { SGFProperty } from "./sgf";
import { MAX_SGF_BOARD_SIZE, decodeSGFPoint, expandPointList } from "./util";

export interface BoardSizeEvent {
    type: "board_size";
    size: number;
}

export interface MoveEvent {
    type: "move";
    color: PlayerColor;
    /** null for a pass */
    point: Intersection | null;
}

export interface AddStonesEvent {
    type: "add_stones";
    color: PlayerColor;
    points: Intersection[];
}

export interface OtherPropertyEvent {
    type: "other";
    ident: string;
    values: string[];
}

export type PropertyEvent = BoardSizeEvent | MoveEvent | AddStonesEvent | OtherPropertyEvent;

/**
 * Classifies a single SGF property. `index` is only used for error
 * reporting.
 */
export function toPropertyEvent(prop: SGFProperty, index: number = -1): PropertyEvent {
    switch (prop.ident) {
        case "SZ":
            return { type: "board_size", size: parseBoardSize(prop, index) };

        case "B":
        case "W": {
            const color = prop.ident === "B" ? StoneColor.BLACK : StoneColor.WHITE;
            const val = prop.values[0] ?? "";
            if (val === "") {
                return { type: "move", color, point: null };
            }
            const point = decodeSGFPoint(val);
            if (!point) {
                throw new GameRecordError("invalid_point", index, prop.ident, `'${val}'`);
            }
            return { type: "move", color, point };
        }

        case "AB":
        case "AW": {
            const color = prop.ident === "AB" ? StoneColor.BLACK : StoneColor.WHITE;
            const points: Intersection[] = [];
            for (const val of prop.values) {
                if (val === "") {
                    continue;
                }
                const expanded = expandPointList(val);
                if (!expanded) {
                    throw new GameRecordError("invalid_point", index, prop.ident, `'${val}'`);
                }
                points.push(...expanded);
            }
            return { type: "add_stones", color, points };
        }
    }

    return { type: "other", ident: prop.ident, values: prop.values };
}

function parseBoardSize(prop: SGFProperty, index: number): number {
    const val = (prop.values[0] ?? "").trim();
    const m = val.match(/^([0-9]+)(?::([0-9]+))?$/);
    if (!m) {
        throw new GameRecordError("invalid_board_size", index, prop.ident, `'${val}'`);
    }

    const width = parseInt(m[1]);
    const height = m[2] === undefined ? width : parseInt(m[2]);
    if (width !== height) {
        throw new GameRecordError(
            "invalid_board_size",
            index,
            prop.ident,
            `only square boards are supported, got ${width}x${height}`,
        );
    }
    if (width < 1 || width > MAX_SGF_BOARD_SIZE) {
        throw new GameRecordError("invalid_board_size", index, prop.ident, `'${val}'`);
    }
    return width;
}
