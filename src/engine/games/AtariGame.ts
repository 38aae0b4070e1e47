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

import { Intersection, PlayerColor, StoneColor, colorName, opponentOf } from "../formats/stones";
import { LocalGame, PlayResult } from "./LocalGame";

/**
 * Atari Go: two players share the tablet, Black moves first, and whoever
 * captures first wins.
 */
export class AtariGame extends LocalGame {
    public winner?: PlayerColor;

    public async start(): Promise<void> {
        await this.engine.setBoardSize(this.board_size);
        await this.reset();
    }

    public async reset(): Promise<void> {
        await this.engine.clearBoard();
        this.winner = undefined;
        this.setTurn(StoneColor.BLACK);
    }

    public async play(pt: Intersection): Promise<PlayResult> {
        if (this.winner !== undefined) {
            return "game_over";
        }
        if (this.moving) {
            this.log("Ignoring move, previous move pending");
            return "not_your_turn";
        }
        if (!this.isOnBoard(pt)) {
            this.log(`Bad point (${pt.x}, ${pt.y})`);
            return "off_board";
        }

        this.moving = true;
        try {
            return await this.move(pt);
        } finally {
            this.moving = false;
        }
    }

    /** Takes back the last move, including a winning one */
    public async undo(): Promise<boolean> {
        if (this.moving || !(await this.engine.undo())) {
            return false;
        }
        if (this.winner === undefined) {
            this.setTurn(opponentOf(this.turn));
        } else {
            /* the winner made the last move and keeps the turn to replay it */
            this.winner = undefined;
            this.setTurn(this.turn);
        }
        return true;
    }

    private async move(pt: Intersection): Promise<PlayResult> {
        const color = this.turn;
        if (!(await this.engine.play(color, { x: pt.x + 1, y: pt.y + 1 }))) {
            this.log(`Bad ${colorName(color)} move`);
            return "refused";
        }

        if ((await this.engine.captures(color)) > 0) {
            this.log(`${colorName(color)} wins`);
            this.winner = color;
            this.emit("game-over", color);
        } else {
            this.setTurn(opponentOf(color));
        }
        return "accepted";
    }
}
