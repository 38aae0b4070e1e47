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

import { RemoteStoreError } from "../FusekiError";
import { GameRecordOptions, getGameData } from "../GameRecord";
import { GameData } from "../formats/stones";
import { StatusGame, parseQuickStatus } from "./QuickStatus";

/** The subset of the fetch Response this client reads */
export interface HttpResponse {
    ok: boolean;
    status: number;
    headers: { get(name: string): string | null };
    text(): Promise<string>;
}

export interface HttpRequestInit {
    method?: string;
    headers?: Record<string, string>;
}

export type HttpFetcher = (url: string, init?: HttpRequestInit) => Promise<HttpResponse>;

export interface LoginInfo {
    username: string;
    password: string;
}

export interface RemoteGameStore {
    listGames(): Promise<StatusGame[]>;
    fetchGameRecord(game_id: number): Promise<string>;
}

export interface DragonGoServerOptions {
    base_url?: string;
    /** Defaults to the global fetch */
    fetch?: HttpFetcher;
    /** Don't log requests */
    quiet?: boolean;
}

export const DEFAULT_DGS_BASE_URL = "https://www.dragongoserver.net";

export class DragonGoServerClient implements RemoteGameStore {
    public readonly base_url: string;
    public options: DragonGoServerOptions;
    public username?: string;

    private fetcher: HttpFetcher;
    private cookies: Map<string, string> = new Map();

    constructor(options: DragonGoServerOptions = {}) {
        this.options = options;
        this.base_url = (options.base_url ?? DEFAULT_DGS_BASE_URL).replace(/\/+$/, "");
        this.fetcher = options.fetch ?? ((url, init) => fetch(url, init));
    }

    /** Logs in and keeps the session cookie for later requests */
    public async login(info: LoginInfo): Promise<void> {
        const url =
            `${this.base_url}/login.php?quick_mode=1` +
            `&userid=${encodeURIComponent(info.username)}` +
            `&passwd=${encodeURIComponent(info.password)}`;
        const text = await this.request(url, "POST", "login.php");

        if (!text.includes("Ok")) {
            throw new RemoteStoreError(
                "login_failed",
                `Error logging in as ${info.username}: ${text.trim()}`,
            );
        }
        this.username = info.username;
    }

    public async listGames(user: string | undefined = this.username): Promise<StatusGame[]> {
        if (!user) {
            throw new RemoteStoreError("login_failed", "Not logged in");
        }
        const url =
            `${this.base_url}/quick_status.php` + `?user=${encodeURIComponent(user)}&version=2`;
        return parseQuickStatus(await this.request(url));
    }

    public async fetchGameRecord(game_id: number): Promise<string> {
        return this.request(`${this.base_url}/sgf.php?gid=${game_id}`);
    }

    public async fetchGameData(game_id: number, options?: GameRecordOptions): Promise<GameData> {
        return getGameData(await this.fetchGameRecord(game_id), options);
    }

    private async request(
        url: string,
        method: string = "GET",
        label: string = url,
    ): Promise<string> {
        const headers: Record<string, string> = {};
        if (this.cookies.size > 0) {
            headers["Cookie"] = Array.from(this.cookies, ([k, v]) => `${k}=${v}`).join("; ");
        }

        if (!this.options.quiet) {
            console.log(`${method} ${label}`);
        }
        const response = await this.fetcher(url, { method, headers });
        this.storeCookies(response.headers.get("set-cookie"));

        if (!response.ok) {
            throw new RemoteStoreError(
                "http_error",
                `${method} ${label} failed with status ${response.status}`,
                label,
            );
        }
        return response.text();
    }

    private storeCookies(header: string | null): void {
        if (!header) {
            return;
        }
        /* Multiple cookies arrive comma joined; commas inside Expires are
         * not followed by a name=value pair */
        for (const cookie of header.split(/,\s*(?=[^;,\s]+=)/)) {
            const pair = cookie.split(";")[0];
            const eq = pair.indexOf("=");
            if (eq > 0) {
                this.cookies.set(pair.substring(0, eq).trim(), pair.substring(eq + 1).trim());
            }
        }
    }
}
