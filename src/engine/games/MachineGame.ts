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

import { Intersection, PlayerColor, StoneColor } from "../formats/stones";
import { GenmoveResult } from "../gtp";
import { LocalGame, PlayResult } from "./LocalGame";

export const MACHINE_COLOR = StoneColor.BLACK;
export const HUMAN_COLOR = StoneColor.WHITE;

/** The engine plays Black and opens; the human answers with White. */
export class MachineGame extends LocalGame {
    public last_machine_move?: GenmoveResult;

    /** Only ever the human, once the engine resigns */
    public winner?: PlayerColor;

    public async start(): Promise<void> {
        await this.engine.setBoardSize(this.board_size);
        await this.engine.clearBoard();
        this.winner = undefined;
        this.setTurn(MACHINE_COLOR);
        await this.machineMove();
    }

    public async play(pt: Intersection): Promise<PlayResult> {
        if (this.winner !== undefined) {
            return "game_over";
        }
        if (this.turn !== HUMAN_COLOR || this.moving) {
            this.log("Ignoring move, as machine turn");
            return "not_your_turn";
        }
        if (!this.isOnBoard(pt)) {
            this.log(`Bad point (${pt.x}, ${pt.y})`);
            return "off_board";
        }

        this.moving = true;
        try {
            if (!(await this.engine.play(HUMAN_COLOR, { x: pt.x + 1, y: pt.y + 1 }))) {
                this.log("Bad human move");
                return "refused";
            }
        } finally {
            this.moving = false;
        }

        this.setTurn(MACHINE_COLOR);
        await this.machineMove();
        return "accepted";
    }

    private async machineMove(): Promise<void> {
        this.log("waiting for machine response");
        const move = await this.engine.genmove(MACHINE_COLOR);
        this.last_machine_move = move;
        if (move === "resign") {
            this.log("Machine resigns");
            this.winner = HUMAN_COLOR;
            this.emit("game-over", HUMAN_COLOR);
        } else {
            this.setTurn(HUMAN_COLOR);
        }
    }
}
