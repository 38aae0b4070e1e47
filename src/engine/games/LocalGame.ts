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
import { Intersection, PlayerColor, StoneColor, colorName } from "../formats/stones";
import { GtpEngine } from "../gtp";

export interface LocalGameEvents {
    turn: (color: PlayerColor) => void;
    "game-over": (winner: PlayerColor) => void;
}

export interface LocalGameOptions {
    board_size?: number;
    quiet?: boolean;
}

export type PlayResult = "accepted" | "refused" | "off_board" | "game_over" | "not_your_turn";

/** Stones as reported by the engine, 1-based */
export interface BoardStones {
    white_stones: Intersection[];
    black_stones: Intersection[];
}

export const DEFAULT_LOCAL_BOARD_SIZE = 9;

/**
 * State shared by games played against a local engine. Points passed to
 * `play` are 0-based board positions; everything sent to the engine is
 * shifted to 1-based.
 */
export abstract class LocalGame extends EventEmitter<LocalGameEvents> {
    public readonly board_size: number;
    public readonly options: LocalGameOptions;
    public turn: PlayerColor = StoneColor.BLACK;

    protected engine: GtpEngine;

    /** Set while a move is waiting on the engine */
    protected moving = false;

    constructor(engine: GtpEngine, options: LocalGameOptions = {}) {
        super();

        this.engine = engine;
        this.options = options;
        this.board_size = options.board_size ?? DEFAULT_LOCAL_BOARD_SIZE;
    }

    public abstract start(): Promise<void>;
    public abstract play(pt: Intersection): Promise<PlayResult>;

    public async stones(): Promise<BoardStones> {
        const white_stones = await this.engine.listStones(StoneColor.WHITE);
        const black_stones = await this.engine.listStones(StoneColor.BLACK);
        return { white_stones, black_stones };
    }

    public isOnBoard(pt: Intersection): boolean {
        return (
            Number.isInteger(pt.x) &&
            Number.isInteger(pt.y) &&
            pt.x >= 0 &&
            pt.y >= 0 &&
            pt.x < this.board_size &&
            pt.y < this.board_size
        );
    }

    protected setTurn(color: PlayerColor): void {
        this.log(`Set turn ${colorName(color)}`);
        this.turn = color;
        this.emit("turn", color);
    }

    protected log(message: string): void {
        if (!this.options.quiet) {
            console.log(message);
        }
    }
}
