/*
 * Copyright (C) Online-Go.com
 */

import { AtariGame, GtpEngine, MachineGame, PlayerColor, StoneColor } from "engine";
import { FakeGoEngine } from "./test_utils";

function setup(): { fake: FakeGoEngine; engine: GtpEngine } {
    const fake = new FakeGoEngine();
    const engine = new GtpEngine(fake.transport, { quiet: true });
    return { fake, engine };
}

describe("AtariGame", () => {
    test("start", async () => {
        const { fake, engine } = setup();
        const game = new AtariGame(engine, { quiet: true });
        const turns: PlayerColor[] = [];
        game.on("turn", (color) => turns.push(color));

        await game.start();

        expect(fake.commands).toEqual(["boardsize 9", "clear_board"]);
        expect(game.turn).toBe(StoneColor.BLACK);
        expect(turns).toEqual([StoneColor.BLACK]);
    });

    test("players alternate, points are sent 1-based", async () => {
        const { fake, engine } = setup();
        const game = new AtariGame(engine, { quiet: true });
        await game.start();

        await expect(game.play({ x: 2, y: 3 })).resolves.toBe("accepted");
        expect(game.turn).toBe(StoneColor.WHITE);
        await expect(game.play({ x: 4, y: 4 })).resolves.toBe("accepted");
        expect(game.turn).toBe(StoneColor.BLACK);

        expect(fake.commands.filter((c) => c.startsWith("play"))).toEqual([
            "play black C4",
            "play white E5",
        ]);
        await expect(game.stones()).resolves.toEqual({
            white_stones: [{ x: 5, y: 5 }],
            black_stones: [{ x: 3, y: 4 }],
        });
    });

    test("the first capture wins", async () => {
        const { fake, engine } = setup();
        const game = new AtariGame(engine, { quiet: true });
        const game_over = jest.fn();
        game.on("game-over", game_over);
        await game.start();

        fake.capturing.add("D4");
        await game.play({ x: 2, y: 3 });
        await expect(game.play({ x: 3, y: 3 })).resolves.toBe("accepted");

        expect(game.winner).toBe(StoneColor.WHITE);
        expect(game.turn).toBe(StoneColor.WHITE);
        expect(game_over).toHaveBeenCalledWith(StoneColor.WHITE);
        await expect(game.play({ x: 0, y: 0 })).resolves.toBe("game_over");
    });

    test("undoing the winning move", async () => {
        const { fake, engine } = setup();
        const game = new AtariGame(engine, { quiet: true });
        await game.start();

        fake.capturing.add("D4");
        await game.play({ x: 2, y: 3 });
        await game.play({ x: 3, y: 3 });

        await expect(game.undo()).resolves.toBe(true);
        expect(game.winner).toBeUndefined();
        expect(game.turn).toBe(StoneColor.WHITE);
        expect(fake.moves).toEqual([{ color: "black", vertex: "C4" }]);
    });

    test("undoing an ordinary move", async () => {
        const { engine } = setup();
        const game = new AtariGame(engine, { quiet: true });
        await game.start();

        await game.play({ x: 2, y: 3 });
        await expect(game.undo()).resolves.toBe(true);
        expect(game.turn).toBe(StoneColor.BLACK);
        await expect(game.undo()).resolves.toBe(false);
        expect(game.turn).toBe(StoneColor.BLACK);
    });

    test("refused and off board moves keep the turn", async () => {
        const { fake, engine } = setup();
        const game = new AtariGame(engine, { quiet: true });
        await game.start();
        await game.play({ x: 2, y: 3 });

        await expect(game.play({ x: 2, y: 3 })).resolves.toBe("refused");
        await expect(game.play({ x: 9, y: 0 })).resolves.toBe("off_board");
        await expect(game.play({ x: -1, y: 0 })).resolves.toBe("off_board");
        expect(game.turn).toBe(StoneColor.WHITE);
        expect(fake.moves).toHaveLength(1);
    });

    test("a second tap while a move is pending is ignored", async () => {
        const { fake, engine } = setup();
        const game = new AtariGame(engine, { quiet: true });
        await game.start();

        await expect(
            Promise.all([game.play({ x: 0, y: 0 }), game.play({ x: 2, y: 2 })]),
        ).resolves.toEqual(["accepted", "not_your_turn"]);

        expect(fake.moves).toEqual([{ color: "black", vertex: "A1" }]);
        expect(game.turn).toBe(StoneColor.WHITE);
        await expect(game.play({ x: 2, y: 2 })).resolves.toBe("accepted");
        expect(fake.moves.map((m) => m.color)).toEqual(["black", "white"]);
    });

    test("reset", async () => {
        const { fake, engine } = setup();
        const game = new AtariGame(engine, { board_size: 13, quiet: true });
        await game.start();
        fake.capturing.add("A1");
        await game.play({ x: 0, y: 0 });
        expect(game.winner).toBe(StoneColor.BLACK);

        await game.reset();

        expect(fake.board_size).toBe(13);
        expect(fake.moves).toEqual([]);
        expect(game.winner).toBeUndefined();
        expect(game.turn).toBe(StoneColor.BLACK);
    });

    test("turns are logged unless quiet", async () => {
        const log = jest.spyOn(console, "log").mockImplementation(() => {});
        try {
            const { engine } = setup();
            const game = new AtariGame(engine);
            await game.start();
            await game.play({ x: 20, y: 0 });

            expect(log.mock.calls).toEqual([["Set turn black"], ["Bad point (20, 0)"]]);
        } finally {
            log.mockRestore();
        }
    });
});

describe("MachineGame", () => {
    test("the machine opens as black", async () => {
        const { fake, engine } = setup();
        fake.genmoves = ["E5"];
        const game = new MachineGame(engine, { quiet: true });
        const turns: PlayerColor[] = [];
        game.on("turn", (color) => turns.push(color));

        await game.start();

        expect(fake.commands).toEqual(["boardsize 9", "clear_board", "genmove black"]);
        expect(game.last_machine_move).toEqual({ x: 5, y: 5 });
        expect(game.turn).toBe(StoneColor.WHITE);
        expect(turns).toEqual([StoneColor.BLACK, StoneColor.WHITE]);
    });

    test("each human move is answered", async () => {
        const { fake, engine } = setup();
        fake.genmoves = ["E5", "C3"];
        const game = new MachineGame(engine, { quiet: true });
        await game.start();

        await expect(game.play({ x: 3, y: 3 })).resolves.toBe("accepted");

        expect(fake.commands.slice(3)).toEqual(["play white D4", "genmove black"]);
        expect(game.last_machine_move).toEqual({ x: 3, y: 3 });
        expect(game.turn).toBe(StoneColor.WHITE);
        await expect(game.stones()).resolves.toEqual({
            white_stones: [{ x: 4, y: 4 }],
            black_stones: [
                { x: 5, y: 5 },
                { x: 3, y: 3 },
            ],
        });
    });

    test("a refused move is not answered", async () => {
        const { fake, engine } = setup();
        fake.genmoves = ["E5"];
        const game = new MachineGame(engine, { quiet: true });
        await game.start();

        await expect(game.play({ x: 4, y: 4 })).resolves.toBe("refused");
        await expect(game.play({ x: 9, y: 9 })).resolves.toBe("off_board");
        expect(fake.commands.slice(3)).toEqual(["play white E5"]);
        expect(game.turn).toBe(StoneColor.WHITE);
    });

    test("moves out of turn are ignored", async () => {
        const { fake, engine } = setup();
        const game = new MachineGame(engine, { quiet: true });

        await expect(game.play({ x: 0, y: 0 })).resolves.toBe("not_your_turn");
        expect(fake.commands).toEqual([]);
    });

    test("the human wins when the machine resigns", async () => {
        const { fake, engine } = setup();
        fake.genmoves = ["pass", "resign"];
        const game = new MachineGame(engine, { quiet: true });
        const game_over = jest.fn();
        game.on("game-over", game_over);
        await game.start();
        expect(game.last_machine_move).toBe("pass");
        expect(game_over).not.toHaveBeenCalled();

        await game.play({ x: 0, y: 0 });

        expect(game.last_machine_move).toBe("resign");
        expect(game.winner).toBe(StoneColor.WHITE);
        expect(game.turn).toBe(StoneColor.BLACK);
        expect(game_over).toHaveBeenCalledWith(StoneColor.WHITE);
    });

    test("a resigned game takes no more moves", async () => {
        const { fake, engine } = setup();
        fake.genmoves = ["resign", "C3"];
        const game = new MachineGame(engine, { quiet: true });
        const turns: PlayerColor[] = [];
        game.on("turn", (color) => turns.push(color));

        await game.start();
        await expect(game.play({ x: 0, y: 0 })).resolves.toBe("game_over");

        expect(game.winner).toBe(StoneColor.WHITE);
        expect(turns).toEqual([StoneColor.BLACK]);
        expect(fake.commands).toEqual(["boardsize 9", "clear_board", "genmove black"]);
    });

    test("starting again clears the resignation", async () => {
        const { fake, engine } = setup();
        fake.genmoves = ["resign", "E5"];
        const game = new MachineGame(engine, { quiet: true });
        await game.start();

        await game.start();

        expect(game.winner).toBeUndefined();
        expect(game.turn).toBe(StoneColor.WHITE);
        await expect(game.play({ x: 0, y: 0 })).resolves.toBe("accepted");
    });

    test("a second tap while the human move is pending is ignored", async () => {
        const { fake, engine } = setup();
        fake.genmoves = ["E5", "C3"];
        const game = new MachineGame(engine, { quiet: true });
        await game.start();

        await expect(
            Promise.all([game.play({ x: 0, y: 0 }), game.play({ x: 1, y: 1 })]),
        ).resolves.toEqual(["accepted", "not_your_turn"]);

        expect(fake.commands.slice(3)).toEqual(["play white A1", "genmove black"]);
        expect(game.turn).toBe(StoneColor.WHITE);
    });
});
