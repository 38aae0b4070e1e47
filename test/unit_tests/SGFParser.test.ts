/*
 * Copyright (C) Online-Go.com
 */

import { SGFParseError, flattenProperties, getSGFProperties, parseSGF } from "engine";
import { thrownBy } from "./test_utils";

describe("parseSGF", () => {
    test("sequence nodes are chained and variations hang off the last node", () => {
        const roots = parseSGF("(;FF[4]SZ[9];B[aa];W[bb](;B[cc])(;B[dd];W[ee]))");

        expect(roots).toHaveLength(1);
        const root = roots[0];
        expect(root.properties).toEqual([
            { ident: "FF", values: ["4"] },
            { ident: "SZ", values: ["9"] },
        ]);

        const b = root.children[0];
        expect(b.properties).toEqual([{ ident: "B", values: ["aa"] }]);
        const w = b.children[0];
        expect(w.properties).toEqual([{ ident: "W", values: ["bb"] }]);

        expect(w.children).toHaveLength(2);
        expect(w.children[0].properties).toEqual([{ ident: "B", values: ["cc"] }]);
        expect(w.children[0].children).toEqual([]);
        expect(w.children[1].properties).toEqual([{ ident: "B", values: ["dd"] }]);
        expect(w.children[1].children[0].properties).toEqual([{ ident: "W", values: ["ee"] }]);
    });

    test("collections hold one root per game tree", () => {
        const roots = parseSGF("(;SZ[9];B[aa])\n(;SZ[13];W[bb])\n");
        expect(roots).toHaveLength(2);
        expect(roots[1].properties).toEqual([{ ident: "SZ", values: ["13"] }]);
    });

    test("multiple values, whitespace between them", () => {
        const [root] = parseSGF("( ; AB[aa][bb] [cc] )");
        expect(root.properties).toEqual([{ ident: "AB", values: ["aa", "bb", "cc"] }]);
    });

    test("empty values", () => {
        const [root] = parseSGF("(;B[])");
        expect(root.properties).toEqual([{ ident: "B", values: [""] }]);
    });

    test("escaped characters", () => {
        const [root] = parseSGF("(;C[a \\] b\\\\c])");
        expect(root.properties[0].values).toEqual(["a ] b\\c"]);
    });

    test("soft line breaks are removed, hard ones kept", () => {
        const [root] = parseSGF("(;C[line\\\none]GC[two\nlines])");
        expect(root.properties[0].values).toEqual(["lineone"]);
        expect(root.properties[1].values).toEqual(["two\nlines"]);
    });

    test("byte order mark", () => {
        expect(parseSGF("\uFEFF(;SZ[9])")).toHaveLength(1);
    });

    test.each([
        ["", "Expecting a GameTree"],
        ["   ", "Expecting a GameTree"],
        ["(B[aa])", "Expecting Sequence"],
        ["(;B[aa]", "Expecting ')' to end GameTree"],
        ["(;B[aa)", "Expecting ']' to close a PropValue"],
        ["(;SZ)", "Expecting '[' to start a value of SZ"],
        ["(;C[abc\\", "Expecting ']' to close a PropValue"],
        ["x(;SZ[9])", "Expecting '(' to start a GameTree"],
    ])("rejects %j", (sgf, reason) => {
        expect(() => parseSGF(sgf)).toThrow(SGFParseError);
        expect(() => parseSGF(sgf)).toThrow(reason);
    });

    test("errors report the line", () => {
        const err = thrownBy(() => parseSGF("(;SZ[9]\n;B[aa]\n;W[bb]"));
        expect(err).toBeInstanceOf(SGFParseError);
        if (err instanceof SGFParseError) {
            expect(err.line).toBe(3);
            expect(err.message_id).toBe("malformed_sgf");
            expect(err.message).toBe(
                "Malformed SGF on line 3: Expecting ')' to end GameTree, found end of input",
            );
        }
    });
});

describe("flattenProperties", () => {
    test("pre-order, variations appended in document order", () => {
        const props = flattenProperties(
            parseSGF("(;FF[4]SZ[9];B[aa];W[bb](;B[cc])(;B[dd];W[ee]))"),
        );
        expect(props.map((p) => `${p.ident}[${p.values.join("][")}]`)).toEqual([
            "FF[4]",
            "SZ[9]",
            "B[aa]",
            "W[bb]",
            "B[cc]",
            "B[dd]",
            "W[ee]",
        ]);
    });

    test("nested variations", () => {
        const props = getSGFProperties("(;SZ[5](;B[aa](;W[bb])(;W[cc]))(;B[dd]))");
        expect(props.map((p) => p.values[0])).toEqual(["5", "aa", "bb", "cc", "dd"]);
    });

    test("every tree of a collection", () => {
        const props = getSGFProperties("(;SZ[9];B[aa])(;SZ[13];W[bb])");
        expect(props.map((p) => p.ident)).toEqual(["SZ", "B", "SZ", "W"]);
    });

    test("nodes without properties", () => {
        expect(getSGFProperties("(;;;)")).toEqual([]);
    });
});
