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

export type FusekiErrorMessageId =
    | SGFErrorMessageId
    | RecordErrorMessageId
    | GtpErrorMessageId
    | RemoteErrorMessageId;

export type SGFErrorMessageId = "malformed_sgf";

export type RecordErrorMessageId =
    | "missing_board_size"
    | "invalid_board_size"
    | "board_size_redeclared"
    | "coordinate_out_of_range"
    | "stone_already_placed_here"
    | "invalid_point";

export type GtpErrorMessageId = "command_failed" | "response_timeout" | "engine_closed";

export type RemoteErrorMessageId = "login_failed" | "http_error" | "malformed_status";

export class FusekiError extends Error {
    constructor(message?: string) {
        super(message); // 'Error' breaks prototype chain here
        Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
    }
}

export class SGFParseError extends FusekiError {
    readonly message_id: SGFErrorMessageId = "malformed_sgf";
    line: number;
    position: number;

    constructor(reason: string, line: number, position: number) {
        super(`Malformed SGF on line ${line}: ${reason}`);

        this.line = line;
        this.position = position;
    }
}

/**
 * Raised while replaying a record onto the board. `event_index` is the
 * position of the offending property in the flattened property list, or -1
 * when the problem is not tied to a single property.
 */
export class GameRecordError extends FusekiError {
    message_id: RecordErrorMessageId;
    event_index: number;
    property: string;

    constructor(
        message_id: RecordErrorMessageId,
        event_index: number,
        property: string,
        detail?: string,
    ) {
        super(
            `Game record error at property ${event_index} (${property}): ${message_id}` +
                (detail ? ` - ${detail}` : ""),
        );

        this.message_id = message_id;
        this.event_index = event_index;
        this.property = property;
    }
}

export class GtpError extends FusekiError {
    message_id: GtpErrorMessageId;
    command: string;

    constructor(message_id: GtpErrorMessageId, command: string, message: string) {
        super(message);

        this.message_id = message_id;
        this.command = command;
    }
}

/** The engine answered a command with a `?` response */
export class GtpCommandError extends GtpError {
    response: string;

    constructor(command: string, response: string) {
        super("command_failed", command, `GTP command '${command}' failed: ${response}`);
        this.response = response;
    }
}

export class GtpTimeoutError extends GtpError {
    constructor(command: string, timeout: number) {
        super(
            "response_timeout",
            command,
            `GTP command '${command}' got no response within ${timeout}ms`,
        );
    }
}

export class GtpClosedError extends GtpError {
    constructor(command: string) {
        super("engine_closed", command, `GTP engine closed before '${command}' was answered`);
    }
}

export class RemoteStoreError extends FusekiError {
    message_id: RemoteErrorMessageId;
    url?: string;

    constructor(message_id: RemoteErrorMessageId, message: string, url?: string) {
        super(message);

        this.message_id = message_id;
        this.url = url;
    }
}
