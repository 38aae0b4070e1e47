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
import { RemoteStoreError } from "../FusekiError";

const MS_PER_UNIT: { [unit: string]: number } = {
    d: 24 * 60 * 60 * 1000,
    h: 60 * 60 * 1000,
    m: 60 * 1000,
};

/**
 * Parses the main time of a clock description such as `F: 2d 5h (+ 1d)`
 * (Fischer), `J: 3d (+ 5 * 1d)` (byo-yomi) or `C: 12h (+ 1d / 10)`
 * (Canadian) into milliseconds. Returns undefined if it can't.
 */
export function parseTimeRemaining(value: string): number | undefined {
    const m = value.trim().match(/^[A-Z]:\s*([^(]*?)\s*(\(.*\))?$/);
    if (!m) {
        return undefined;
    }

    let total = 0;
    for (const piece of m[1].split(/\s+/)) {
        if (piece === "") {
            continue;
        }
        const pm = piece.match(/^([0-9]+)([dhm])$/);
        if (!pm) {
            return undefined;
        }
        total += parseInt(pm[1]) * MS_PER_UNIT[pm[2]];
    }
    return total;
}

/** Dates in the feed are `YYYY-MM-DD HH:MM:SS`, in UTC */
const ServerDate = z
    .string()
    .regex(/^[0-9]{4}-[0-9]{2}-[0-9]{2} [0-9]{2}:[0-9]{2}:[0-9]{2}$/, "expected a date")
    .transform((s) => new Date(s.replace(" ", "T") + "Z"));

const TimeRemaining = z.string().transform((s, ctx) => {
    const ms = parseTimeRemaining(s);
    if (ms === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `bad time remaining '${s}'` });
        return z.NEVER;
    }
    return ms;
});

const Integer = z.coerce.number().int();

export const StatusGameSchema = z.object({
    game_id: Integer.positive(),
    opponent_handle: z.string().min(1),
    player_color: z.enum(["B", "W"]),
    lastmove_date: ServerDate,
    /** main time left, in milliseconds */
    time_remaining: TimeRemaining,
    game_action: Integer,
    game_status: z.string(),
    move_id: Integer.nonnegative(),
    tournament_id: Integer.nonnegative(),
    shape_id: Integer.nonnegative(),
    game_type: z.string(),
    game_prio: Integer,
    opponent_lastaccess_date: ServerDate,
    handicap: Integer.nonnegative(),
});

export type StatusGame = z.infer<typeof StatusGameSchema>;

/* Column order of a "G" row after the leading "G" */
const GAME_FIELDS = [
    "game_id",
    "opponent_handle",
    "player_color",
    "lastmove_date",
    "time_remaining",
    "game_action",
    "game_status",
    "move_id",
    "tournament_id",
    "shape_id",
    "game_type",
    "game_prio",
    "opponent_lastaccess_date",
    "handicap",
] as const;

/**
 * Splits a feed line on commas. Strings are wrapped in single quotes, inside
 * which a backslash escapes the next character.
 */
export function splitStatusLine(line: string): string[] {
    const ret: string[] = [];
    let field = "";
    let quoted = false;

    for (let i = 0; i < line.length; ++i) {
        const ch = line[i];
        if (quoted) {
            if (ch === "\\" && i + 1 < line.length) {
                field += line[++i];
            } else if (ch === "'") {
                quoted = false;
            } else {
                field += ch;
            }
        } else if (ch === "'") {
            quoted = true;
        } else if (ch === ",") {
            ret.push(field.trim());
            field = "";
        } else {
            field += ch;
        }
    }
    ret.push(field.trim());
    return ret;
}

/**
 * Reads the games out of a quick-status feed (version 2). Lines that don't
 * describe a game (headers, comments, messages, ...) are skipped.
 */
export function parseQuickStatus(text: string): StatusGame[] {
    const ret: StatusGame[] = [];
    const lines = text.split(/\r?\n/);

    lines.forEach((line, idx) => {
        if (!line.startsWith("G")) {
            return;
        }

        const fields = splitStatusLine(line);
        if (fields[0] !== "G") {
            return;
        }

        const row: { [field: string]: string | undefined } = {};
        GAME_FIELDS.forEach((name, i) => {
            row[name] = fields[i + 1];
        });

        const parsed = StatusGameSchema.safeParse(row);
        if (!parsed.success) {
            const issues = parsed.error.issues
                .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                .join(", ");
            throw new RemoteStoreError(
                "malformed_status",
                `Malformed game on status line ${idx + 1}: ${issues}`,
            );
        }
        ret.push(parsed.data);
    });

    return ret;
}
