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

import { Intersection } from "../formats/stones";
import { decodeCoordinate } from "./coordinates";

/*
 * SGF FF[4]: https://www.red-bean.com/sgf/go.html#types
 *
 * A point is two letters, column first: "cd" is x = 2, y = 3. Lists of
 * points may be compressed as "ul:lr", which stands for every point of the
 * rectangle spanned by the upper left and lower right corners.
 */

/** Decodes a two letter SGF point, returns undefined if it isn't one */
export function decodeSGFPoint(value: string): Intersection | undefined {
    if (value.length !== 2) {
        return undefined;
    }
    const x = decodeCoordinate(value[0]);
    const y = decodeCoordinate(value[1]);
    if (x < 0 || y < 0) {
        return undefined;
    }
    return { x, y };
}

/**
 * Expands a single point, or a compressed "ul:lr" rectangle, into its
 * points, row by row. Returns undefined for a malformed value.
 */
export function expandPointList(value: string): Intersection[] | undefined {
    const colon = value.indexOf(":");
    if (colon < 0) {
        const pt = decodeSGFPoint(value);
        return pt ? [pt] : undefined;
    }

    const a = decodeSGFPoint(value.substring(0, colon));
    const b = decodeSGFPoint(value.substring(colon + 1));
    if (!a || !b) {
        return undefined;
    }

    const ret: Intersection[] = [];
    for (let y = Math.min(a.y, b.y); y <= Math.max(a.y, b.y); ++y) {
        for (let x = Math.min(a.x, b.x); x <= Math.max(a.x, b.x); ++x) {
            ret.push({ x, y });
        }
    }
    return ret;
}

/**
 * FF[3] and earlier wrote a pass as "tt" on boards no larger than 19x19.
 */
export function isLegacyPass(pt: Intersection, board_size: number): boolean {
    return board_size <= 19 && pt.x === 19 && pt.y === 19;
}
