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

import { FusekiError } from "../FusekiError";
import { Intersection } from "../formats/stones";
import { decodeVertex } from "../util";

export interface GtpResponse {
    success: boolean;
    id?: number;
    text: string;
}

/**
 * Parses one response block, that is everything up to (not including) the
 * empty line that terminates it:
 *
 *   success = "=" [id] " " text
 *   failure = "?" [id] " " error_message
 */
export function parseGtpResponse(block: string): GtpResponse {
    const body = block.replace(/\r/g, "").replace(/\t/g, " ").replace(/^\n+/, "");
    const m = body.match(/^([=?])([0-9]+)?(?:[ \n]([\s\S]*))?$/);
    if (!m) {
        throw new FusekiError(`Malformed GTP response '${block}'`);
    }

    const ret: GtpResponse = {
        success: m[1] === "=",
        text: (m[3] ?? "").trim(),
    };
    if (m[2] !== undefined) {
        ret.id = parseInt(m[2]);
    }
    return ret;
}

/** Parses a whitespace separated vertex list, as returned by list_stones */
export function parseVertexList(text: string): Intersection[] {
    const ret: Intersection[] = [];
    for (const token of text.split(/\s+/)) {
        if (token === "") {
            continue;
        }
        const v = decodeVertex(token);
        if (v !== "pass") {
            ret.push(v);
        }
    }
    return ret;
}
