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

import { SGFNode, SGFProperty, parseSGF } from "./SGFParser";

/**
 * Depth first, pre-order: a node's own properties come before those of its
 * children, and every tree of the collection is visited in document order.
 * Variations are not separated; their properties are simply appended.
 */
export function flattenProperties(nodes: SGFNode[]): SGFProperty[] {
    const ret: SGFProperty[] = [];

    function visit(node: SGFNode): void {
        for (const prop of node.properties) {
            ret.push(prop);
        }
        for (const child of node.children) {
            visit(child);
        }
    }

    for (const node of nodes) {
        visit(node);
    }
    return ret;
}

/** Parses the SGF text and flattens it, throws SGFParseError on bad input */
export function getSGFProperties(sgf: string): SGFProperty[] {
    return flattenProperties(parseSGF(sgf));
}
