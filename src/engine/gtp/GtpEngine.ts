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

import { EventEmitter } from "eventemitter3";
import { FusekiError, GtpClosedError, GtpCommandError, GtpTimeoutError } from "../FusekiError";
import { Intersection, PlayerColor, colorName } from "../formats/stones";
import { decodeVertex } from "../util";
import { GtpArgument, GtpCommand } from "./GtpCommand";
import { GtpResponse, parseGtpResponse, parseVertexList } from "./GtpResponse";

/**
 * A line oriented, duplex channel to an engine. Usually the stdin/stdout of
 * a child process, see ChildProcessTransport.
 */
export interface GtpTransport {
    write(data: string): void;
    onData(listener: (chunk: string) => void): void;
    onClose(listener: () => void): void;
    close(): void;
}

export interface GtpEngineEvents {
    /** Emitted with the serialized command as it is written */
    command: (command: string) => void;
    response: (command: string, response: GtpResponse) => void;
    close: () => void;
}

export interface GtpEngineOptions {
    /** Reject a command if no response arrives within this many milliseconds */
    response_timeout?: number;

    /** Don't log commands and responses */
    quiet?: boolean;
}

export type GenmoveResult = Intersection | "pass" | "resign";

interface PendingCommand {
    command: string;
    sent: number;
    resolve: (text: string) => void;
    reject: (err: Error) => void;
    timer?: ReturnType<typeof setTimeout>;
}

/**
 * Speaks GTP to an engine over a GtpTransport. Every command carries an id,
 * responses are matched by id (or, if the engine omits it, to the oldest
 * outstanding command) and each command gets a promise for its response.
 *
 * Points going in and out are 1-based.
 */
export class GtpEngine extends EventEmitter<GtpEngineEvents> {
    public options: GtpEngineOptions;

    private transport: GtpTransport;
    private buffer = "";
    private last_request_id = 0;
    private in_flight: Map<number, PendingCommand> = new Map();
    private closed = false;

    constructor(transport: GtpTransport, options: GtpEngineOptions = {}) {
        super();

        this.transport = transport;
        this.options = options;

        transport.onData((chunk) => this.receive(chunk));
        transport.onClose(() => this.shutdown());
    }

    get is_closed(): boolean {
        return this.closed;
    }

    /** Sends a command and resolves with the text of a successful response */
    public command(name: string, ...args: GtpArgument[]): Promise<string> {
        const id = ++this.last_request_id;
        const cmd = new GtpCommand(name, args, id);
        const label = new GtpCommand(name, args).toString();

        if (this.closed) {
            return Promise.reject(new GtpClosedError(label));
        }

        return new Promise<string>((resolve, reject) => {
            const pending: PendingCommand = {
                command: label,
                sent: Date.now(),
                resolve,
                reject,
            };

            if (this.options.response_timeout) {
                const timeout = this.options.response_timeout;
                pending.timer = setTimeout(() => {
                    this.in_flight.delete(id);
                    reject(new GtpTimeoutError(label, timeout));
                }, timeout);
            }

            this.in_flight.set(id, pending);
            const serialized = cmd.toString();
            this.emit("command", serialized);
            this.transport.write(serialized + "\n");
        });
    }

    public async setBoardSize(size: number): Promise<void> {
        await this.command("boardsize", size);
    }

    public async clearBoard(): Promise<void> {
        await this.command("clear_board");
    }

    /** Resolves false if the engine refuses the move */
    public async play(color: PlayerColor, pt: Intersection): Promise<boolean> {
        try {
            await this.command("play", colorName(color), pt);
            return true;
        } catch (e) {
            if (e instanceof GtpCommandError) {
                if (!this.options.quiet) {
                    console.log(`Engine refused ${e.command}: ${e.response}`);
                }
                return false;
            }
            throw e;
        }
    }

    public async genmove(color: PlayerColor): Promise<GenmoveResult> {
        const text = await this.command("genmove", colorName(color));
        if (text.toLowerCase() === "resign") {
            return "resign";
        }
        return decodeVertex(text);
    }

    public async listStones(color: PlayerColor): Promise<Intersection[]> {
        return parseVertexList(await this.command("list_stones", colorName(color)));
    }

    /** Number of stones captured by `color` */
    public async captures(color: PlayerColor): Promise<number> {
        const text = await this.command("captures", colorName(color));
        const count = parseInt(text);
        if (!/^[0-9]+$/.test(text) || isNaN(count)) {
            throw new GtpCommandError(`captures ${colorName(color)}`, `unexpected '${text}'`);
        }
        return count;
    }

    /** Resolves false if there was nothing to undo */
    public async undo(): Promise<boolean> {
        try {
            await this.command("undo");
            return true;
        } catch (e) {
            if (e instanceof GtpCommandError) {
                return false;
            }
            throw e;
        }
    }

    public close(): void {
        if (this.closed) {
            return;
        }
        this.transport.close();
        this.shutdown();
    }

    private receive(chunk: string): void {
        this.buffer += chunk.replace(/\r/g, "");

        let end = this.buffer.indexOf("\n\n");
        while (end >= 0) {
            const block = this.buffer.substring(0, end);
            this.buffer = this.buffer.substring(end + 2);
            if (block.trim() !== "") {
                this.receiveBlock(block);
            }
            end = this.buffer.indexOf("\n\n");
        }
    }

    /** Blocks that aren't GTP responses, such as engine debug output, are dropped */
    private receiveBlock(block: string): void {
        let response: GtpResponse;
        try {
            response = parseGtpResponse(block);
        } catch (e) {
            if (!(e instanceof FusekiError)) {
                throw e;
            }
            console.warn(`Dropping malformed GTP output: ${block}`);
            return;
        }
        this.dispatch(response);
    }

    private dispatch(response: GtpResponse): void {
        let id = response.id;
        if (id === undefined) {
            id = this.in_flight.keys().next().value;
        }

        const pending = id === undefined ? undefined : this.in_flight.get(id);
        if (id === undefined || !pending) {
            console.warn(`Dropping unexpected GTP response: ${response.text}`);
            return;
        }

        this.in_flight.delete(id);
        if (pending.timer) {
            clearTimeout(pending.timer);
        }

        if (!this.options.quiet) {
            console.log(
                `${pending.command} -> '${response.text}' (${Date.now() - pending.sent}ms)`,
            );
        }

        try {
            this.emit("response", pending.command, response);
        } catch (e) {
            console.error("Error in GTP response handler", e);
        }

        if (response.success) {
            pending.resolve(response.text);
        } else {
            pending.reject(new GtpCommandError(pending.command, response.text));
        }
    }

    private shutdown(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;

        for (const [, pending] of this.in_flight) {
            if (pending.timer) {
                clearTimeout(pending.timer);
            }
            pending.reject(new GtpClosedError(pending.command));
        }
        this.in_flight.clear();

        this.emit("close");
    }
}
