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

import { ChildProcessWithoutNullStreams, spawn } from "child_process";
import { GtpTransport } from "./GtpEngine";

/**
 * Runs an engine binary and talks GTP over its stdin and stdout. A failed
 * write to stdin, such as EPIPE after the engine exits, closes the transport.
 */
export class ChildProcessTransport implements GtpTransport {
    private proc: ChildProcessWithoutNullStreams;
    private close_listeners: Array<() => void> = [];
    private closed = false;

    constructor(binary: string, args: string[]) {
        this.proc = spawn(binary, args, { stdio: "pipe" });
        this.proc.stdout.setEncoding("utf8");
        this.proc.on("error", (err) => {
            console.error(`GTP engine ${binary} failed`, err);
        });
        this.proc.stdin.on("error", (err) => {
            console.error(`Writing to GTP engine ${binary} failed`, err);
            this.hangUp();
        });
        this.proc.on("close", () => this.hangUp());
    }

    public write(data: string): void {
        if (this.closed) {
            return;
        }
        this.proc.stdin.write(data);
    }

    public onData(listener: (chunk: string) => void): void {
        this.proc.stdout.on("data", (chunk: string) => listener(chunk));
    }

    public onClose(listener: () => void): void {
        this.close_listeners.push(listener);
    }

    public close(): void {
        this.proc.stdin.end();
        this.proc.kill();
    }

    private hangUp(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        for (const listener of this.close_listeners) {
            listener();
        }
    }
}
