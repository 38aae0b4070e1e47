/*
 * Copyright (C)  Online-Go.com
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

import { FusekiError } from "../FusekiError";
import { Intersection } from "../formats/stones";

/* SGF point letters: a-z are 0-25, A-Z continue from 26 for boards up to 52 */
const COORDINATE_SEQUENCE = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";

/* Upper case, and doesn't have I */
const PRETTY_COORDINATE_SEQUENCE = "ABCDEFGHJKLMNOPQRSTUVWXYZ";

export const MAX_SGF_BOARD_SIZE = COORDINATE_SEQUENCE.length;

/** Decodes a single SGF coordinate letter, returns -1 for anything else */
export function decodeCoordinate(ch: string): number {
    if (ch.length !== 1) {
        return -1;
    }
    return COORDINATE_SEQUENCE.indexOf(ch);
}

/** Encodes a single 0-based coordinate as an SGF letter */
export function encodeCoordinate(coor: number): string {
    return COORDINATE_SEQUENCE[coor];
}

/** Decodes the pretty X coordinate to a 0-based number */
export function decodePrettyXCoordinate(ch: string): number {
    return PRETTY_COORDINATE_SEQUENCE.indexOf(ch.toUpperCase());
}

/** Encodes a 0-based X coordinate to a display encoding */
export function encodePrettyXCoordinate(coor: number): string {
    return PRETTY_COORDINATE_SEQUENCE[coor];
}

/**
 * Encodes a 1-based point as a GTP vertex, like `"A1"` or `"K10"`. The row
 * number is `y` itself; the board is never flipped.
 */
export function encodeVertex(pt: Intersection): string {
    const column = encodePrettyXCoordinate(pt.x - 1);
    if (column === undefined || !Number.isInteger(pt.y) || pt.y < 1) {
        throw new FusekiError(`Cannot encode (${pt.x}, ${pt.y}) as a GTP vertex`);
    }
    return column + pt.y;
}

/** Decodes a GTP vertex to a 1-based point */
export function decodeVertex(vertex: string): Intersection | "pass" {
    const v = vertex.trim();
    if (v.toLowerCase() === "pass") {
        return "pass";
    }

    const x = decodePrettyXCoordinate(v.charAt(0));
    const row = v.substring(1);
    if (x < 0 || !/^[0-9]+$/.test(row) || parseInt(row) < 1) {
        throw new FusekiError(`Invalid GTP vertex '${vertex}'`);
    }
    return { x: x + 1, y: parseInt(row) };
}
