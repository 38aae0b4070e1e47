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

import { z } from "zod";
import { AtariGame, DEFAULT_LOCAL_BOARD_SIZE, MachineGame } from "./games";
import { ChildProcessTransport, GtpEngine, GtpTransport } from "./gtp";
import { DEFAULT_DGS_BASE_URL, DragonGoServerClient, HttpFetcher } from "./remote";

export interface FusekiConfig {
    gtp: {
        binary: string;
        args: string[];
        /** milliseconds, undefined waits forever */
        response_timeout?: number;
    };
    /** Board size for games against the local engine */
    board_size: number;
    dragon_go_server: {
        base_url: string;
    };
    quiet: boolean;
}

export const DEFAULT_GTP_BINARY = "/home/root/gnugo";
export const DEFAULT_GTP_ARGS = ["--mode", "gtp", "--level", "8"];

const EnvSchema = z.object({
    GNUGO_BINARY: z.string().min(1).default(DEFAULT_GTP_BINARY),
    FUSEKI_GTP_TIMEOUT: z.coerce.number().int().positive().optional(),
    /* GTP vertices have 25 columns */
    FUSEKI_BOARD_SIZE: z.coerce.number().int().min(2).max(25).default(DEFAULT_LOCAL_BOARD_SIZE),
    DGS_BASE_URL: z.string().url().default(DEFAULT_DGS_BASE_URL),
    FUSEKI_QUIET: z
        .enum(["0", "1", "false", "true"])
        .default("0")
        .transform((v) => v === "1" || v === "true"),
});

/**
 * Builds the configuration from environment variables, filling in defaults
 * for anything unset. Throws a ZodError for values that don't validate.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FusekiConfig {
    const parsed = EnvSchema.parse(env);

    return {
        gtp: {
            binary: parsed.GNUGO_BINARY,
            args: DEFAULT_GTP_ARGS.slice(),
            response_timeout: parsed.FUSEKI_GTP_TIMEOUT,
        },
        board_size: parsed.FUSEKI_BOARD_SIZE,
        dragon_go_server: {
            base_url: parsed.DGS_BASE_URL,
        },
        quiet: parsed.FUSEKI_QUIET,
    };
}

/**
 * Connects to the engine. Without a transport, the configured binary is
 * started as a child process.
 */
export function createEngine(config: FusekiConfig, transport?: GtpTransport): GtpEngine {
    const channel = transport ?? new ChildProcessTransport(config.gtp.binary, config.gtp.args);
    return new GtpEngine(channel, {
        response_timeout: config.gtp.response_timeout,
        quiet: config.quiet,
    });
}

export function createAtariGame(config: FusekiConfig, engine: GtpEngine): AtariGame {
    return new AtariGame(engine, { board_size: config.board_size, quiet: config.quiet });
}

export function createMachineGame(config: FusekiConfig, engine: GtpEngine): MachineGame {
    return new MachineGame(engine, { board_size: config.board_size, quiet: config.quiet });
}

export function createRemoteStore(config: FusekiConfig, fetch?: HttpFetcher): DragonGoServerClient {
    return new DragonGoServerClient({
        base_url: config.dragon_go_server.base_url,
        fetch,
        quiet: config.quiet,
    });
}
