/*
 * Copyright (C) Online-Go.com
 */

import { EventEmitter } from "eventemitter3";
import { ChildProcessTransport, GtpClosedError, GtpEngine } from "engine";

class MockPipe extends EventEmitter {
    public written: string[] = [];
    public ended = false;

    public setEncoding(): void {}

    public write(data: string): boolean {
        this.written.push(data);
        return true;
    }

    public end(): void {
        this.ended = true;
    }
}

class MockProcess extends EventEmitter {
    public stdin = new MockPipe();
    public stdout = new MockPipe();
    public killed = false;
    public binary: string;
    public args: string[];

    constructor(binary: string, args: string[]) {
        super();
        this.binary = binary;
        this.args = args;
    }

    public kill(): boolean {
        this.killed = true;
        return true;
    }
}

const mockProcesses: MockProcess[] = [];

jest.mock("child_process", () => ({
    spawn: (binary: string, args: string[]) => {
        const proc = new MockProcess(binary, args);
        mockProcesses.push(proc);
        return proc;
    },
}));

function spawned(): MockProcess {
    const proc = mockProcesses.pop();
    if (!proc) {
        throw new Error("No engine was spawned");
    }
    return proc;
}

describe("ChildProcessTransport", () => {
    test("GTP goes over the engine's stdin and stdout", async () => {
        const transport = new ChildProcessTransport("/opt/gnugo", ["--mode", "gtp"]);
        const proc = spawned();
        const engine = new GtpEngine(transport, { quiet: true });

        const reply = engine.command("name");
        proc.stdout.emit("data", "=1 Fake Engine\n\n");

        await expect(reply).resolves.toBe("Fake Engine");
        expect(proc.binary).toBe("/opt/gnugo");
        expect(proc.args).toEqual(["--mode", "gtp"]);
        expect(proc.stdin.written).toEqual(["1 name\n"]);
    });

    test("a failed write closes the engine", async () => {
        const error = jest.spyOn(console, "error").mockImplementation(() => {});
        try {
            const transport = new ChildProcessTransport("/opt/gnugo", []);
            const proc = spawned();
            const engine = new GtpEngine(transport, { quiet: true });
            const closed = jest.fn();
            engine.on("close", closed);

            const reply = engine.command("name");
            const epipe = new Error("write EPIPE");
            proc.stdin.emit("error", epipe);
            proc.emit("close");

            await expect(reply).rejects.toThrow(GtpClosedError);
            await expect(engine.command("version")).rejects.toThrow(GtpClosedError);
            expect(engine.is_closed).toBe(true);
            expect(closed).toHaveBeenCalledTimes(1);
            expect(proc.stdin.written).toEqual(["1 name\n"]);
            expect(error).toHaveBeenCalledWith("Writing to GTP engine /opt/gnugo failed", epipe);
        } finally {
            error.mockRestore();
        }
    });

    test("the engine exiting closes the transport", async () => {
        const transport = new ChildProcessTransport("/opt/gnugo", []);
        const proc = spawned();
        const engine = new GtpEngine(transport, { quiet: true });

        const reply = engine.command("genmove", "black");
        proc.emit("close");

        await expect(reply).rejects.toThrow(GtpClosedError);
        expect(engine.is_closed).toBe(true);
    });

    test("closing ends stdin and stops the engine", () => {
        const transport = new ChildProcessTransport("/opt/gnugo", []);
        const proc = spawned();
        const engine = new GtpEngine(transport, { quiet: true });

        engine.close();

        expect(proc.stdin.ended).toBe(true);
        expect(proc.killed).toBe(true);
        expect(engine.is_closed).toBe(true);
    });
});
