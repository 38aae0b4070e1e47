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
import { encodeVertex } from "../util";

/** Points are 1-based and are sent as vertices */
export type GtpArgument = string | number | Intersection;

/*
 * GTP version 2: https://www.lysator.liu.se/~gunnar/gtp/gtp2-spec-draft2/gtp2-spec.html#SECTION00030000000000000000
 *
 *   command = [id] command_name [arguments]
 */
export class GtpCommand {
    public readonly name: string;
    public readonly args: GtpArgument[];
    public readonly id?: number;

    constructor(name: string, args: GtpArgument[] = [], id?: number) {
        if (!/^[A-Za-z0-9_-]+$/.test(name)) {
            throw new FusekiError(`Invalid GTP command name '${name}'`);
        }
        this.name = name;
        this.args = args;
        this.id = id;
    }

    public toString(): string {
        const parts: string[] = [];
        if (this.id !== undefined) {
            parts.push(String(this.id));
        }
        parts.push(this.name);
        for (const arg of this.args) {
            parts.push(encodeArgument(arg));
        }
        return parts.join(" ");
    }
}

function encodeArgument(arg: GtpArgument): string {
    if (typeof arg === "number") {
        return String(arg);
    }
    if (typeof arg === "string") {
        if (arg === "" || /[\s#]/.test(arg)) {
            throw new FusekiError(`Invalid GTP argument '${arg}'`);
        }
        return arg;
    }
    return encodeVertex(arg);
}
