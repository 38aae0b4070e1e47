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

import { SGFParseError } from "../FusekiError";

export interface SGFProperty {
    ident: string;
    values: string[];
}

export interface SGFNode {
    properties: SGFProperty[];
    children: SGFNode[];
}

/**
 * Parses an SGF collection into one root node per game tree.
 *
 *   Collection = GameTree { GameTree }
 *   GameTree   = "(" Sequence { GameTree } ")"
 *   Sequence   = Node { Node }
 *   Node       = ";" { Property }
 *   Property   = PropIdent PropValue { PropValue }
 *
 * Each node of a sequence becomes the only child of the node before it, and
 * the variations that follow a sequence hang off its last node.
 */
export function parseSGF(sgf: string): SGFNode[] {
    let pos = 0;
    let line = 1;

    if (sgf.charCodeAt(0) === 0xfeff) {
        /* Byte Order Mark */
        sgf = sgf.substring(1);
    }

    function fail(reason: string): never {
        throw new SGFParseError(reason, line, pos);
    }

    function found(): string {
        return pos < sgf.length ? `'${sgf[pos]}'` : "end of input";
    }

    function collection(): SGFNode[] {
        const ret: SGFNode[] = [];
        whitespace();
        while (pos < sgf.length) {
            ret.push(game_tree());
        }
        if (ret.length === 0) {
            fail("Expecting a GameTree");
        }
        return ret;
    }

    function whitespace(): void {
        while (
            sgf[pos] === " " ||
            sgf[pos] === "\t" ||
            sgf[pos] === "\n" ||
            sgf[pos] === "\r"
        ) {
            if (sgf[pos] === "\n") {
                ++line;
            }
            ++pos;
        }
    }

    function game_tree(): SGFNode {
        whitespace();
        if (sgf[pos] !== "(") {
            fail(`Expecting '(' to start a GameTree, found ${found()}`);
        }
        ++pos;

        const nodes = sequence();
        const last = nodes[nodes.length - 1];

        whitespace();
        while (sgf[pos] === "(") {
            last.children.push(game_tree());
        }

        whitespace();
        if (sgf[pos] !== ")") {
            fail(`Expecting ')' to end GameTree, found ${found()}`);
        }
        ++pos;
        whitespace();

        return nodes[0];
    }

    function sequence(): SGFNode[] {
        whitespace();
        const ret: SGFNode[] = [];
        while (sgf[pos] === ";") {
            const n = node();
            if (ret.length > 0) {
                ret[ret.length - 1].children.push(n);
            }
            ret.push(n);
        }
        if (ret.length === 0) {
            fail(`Expecting Sequence, found ${found()}`);
        }
        return ret;
    }

    function node(): SGFNode {
        const ret: SGFNode = { properties: [], children: [] };
        ++pos; // ';'
        whitespace();
        while (pos < sgf.length && /[A-Za-z]/.test(sgf[pos])) {
            ret.properties.push(property());
        }
        return ret;
    }

    function property(): SGFProperty {
        let ident = "";
        while (pos < sgf.length && /[A-Za-z]/.test(sgf[pos])) {
            ident += sgf[pos++];
        }

        whitespace();

        if (sgf[pos] !== "[") {
            fail(`Expecting '[' to start a value of ${ident}, found ${found()}`);
        }

        const values: string[] = [];
        while (sgf[pos] === "[") {
            ++pos;
            values.push(value());
            ++pos; // ']'
            whitespace();
        }

        return { ident, values };
    }

    function value(): string {
        let ret = "";
        while (sgf[pos] !== "]") {
            if (pos >= sgf.length) {
                fail("Expecting ']' to close a PropValue");
            }
            if (sgf[pos] === "\\") {
                ++pos;
                if (pos >= sgf.length) {
                    fail("Expecting ']' to close a PropValue");
                }
                /* soft line break */
                if (sgf[pos] === "\r" || sgf[pos] === "\n") {
                    const pair = sgf[pos] === "\r" ? "\n" : "\r";
                    ++line;
                    ++pos;
                    if (sgf[pos] === pair) {
                        ++pos;
                    }
                    continue;
                }
            }
            if (sgf[pos] === "\n") {
                ++line;
            }
            ret += sgf[pos++];
        }
        return ret;
    }

    return collection();
}
