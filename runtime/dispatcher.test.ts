import { test, describe } from "node:test";
import assert from "node:assert";
import { parse } from "../dsl/parser.ts";
import type { CallElement } from "../dsl/types.ts";
import { FunctionDispatcher, fail, succeed } from "./dispatcher.ts";
import { ResolutionError } from "./errors.ts";
import { SessionState } from "./session.ts";

const HEADER = [
  "# Topic: Demo",
  "# Description: A demo script",
  "# Author: Tester",
  "# Version: 1.0",
  "",
].join("\n");

const main = parse(
  HEADER + '$global_vars: { user_name: "" }\n@start\nHi',
  "main.bdl",
  true,
);
const side = parse(HEADER + "@start\nHi", "side.bdl", false);

const call = (name: string, ...bindings: string[]): CallElement => ({
  type: "Call",
  name,
  bindings,
  line: 6,
  column: 1,
});

const fallback = { message: "Oops", destination: "main.bdl:start" };

describe("FunctionDispatcher", () => {
  test("Binds results in order and fills missing ones with empty", () => {
    const dispatcher = new FunctionDispatcher({
      pair: () => ["first", 2],
      single: () => succeed("only"),
    });
    const session = new SessionState(main);

    const outcome = dispatcher.dispatch(call("pair", "a", "b", "c"), session, undefined, fallback);
    assert.deepStrictEqual(outcome, { status: "ok", values: ["first", 2] });
    assert.strictEqual(session.get("a"), "first");
    assert.strictEqual(session.get("b"), 2);
    assert.strictEqual(session.local.has("c"), true);
    assert.strictEqual(session.get("c"), null);

    dispatcher.dispatch(call("single"), session, undefined, fallback);
    dispatcher.dispatch(call("pair", "x"), session, undefined, fallback);
    assert.strictEqual(session.get("x"), "first");
  });

  test("Binds the fallback message and destination on failure", () => {
    const dispatcher = new FunctionDispatcher({
      broken: () => fail("service unavailable"),
      silent: () => fail(),
    });
    const session = new SessionState(main);

    const outcome = dispatcher.dispatch(
      call("broken", "message", "next", "extra"),
      session,
      undefined,
      fallback,
    );

    assert.deepStrictEqual(outcome, {
      status: "failed",
      reason: "service unavailable",
    });
    assert.strictEqual(session.get("message"), "Oops");
    assert.strictEqual(session.get("next"), "main.bdl:start");
    assert.strictEqual(session.local.has("extra"), false);

    assert.deepStrictEqual(
      dispatcher.dispatch(call("silent"), session, undefined, fallback),
      { status: "failed", reason: "no reason given" },
    );
  });

  test("Treats a thrown error as a failed call", () => {
    const dispatcher = new FunctionDispatcher({
      explode: () => {
        throw new Error("boom");
      },
    });
    const session = new SessionState(main);

    assert.deepStrictEqual(
      dispatcher.dispatch(call("explode", "message"), session, undefined, fallback),
      { status: "failed", reason: "boom" },
    );
    assert.strictEqual(session.get("message"), "Oops");
  });

  test("Rejects unregistered functions", () => {
    const dispatcher = new FunctionDispatcher();
    const session = new SessionState(main);

    assert.throws(
      () => dispatcher.dispatch(call("missing"), session, undefined, fallback),
      (error: unknown) =>
        error instanceof ResolutionError &&
        error.kind === "UnknownFunction" &&
        error.file === "main.bdl" &&
        error.message === "Function 'missing' is not registered in node 'start'",
    );
  });

  test("Passes the submitted line and session accessors to the function", () => {
    const seen: string[] = [];
    const dispatcher = new FunctionDispatcher({
      echo: (context) => {
        seen.push(`${context.currentFile}:${context.currentNode}:${context.input}`);
        return [context.input ?? ""];
      },
      promote: (context) => [context.setGlobal("user_name", "Alex")],
    });
    const session = new SessionState(main);

    dispatcher.dispatch(call("echo", "said"), session, "hello", fallback);
    dispatcher.dispatch(call("promote", "ok"), session, undefined, fallback);
    assert.deepStrictEqual(seen, ["main.bdl:start:hello"]);
    assert.strictEqual(session.get("said"), "hello");
    assert.strictEqual(session.get("ok"), true);
    assert.strictEqual(session.global.get("user_name"), "Alex");

    session.enter(side, "start");
    dispatcher.dispatch(call("promote", "ok"), session, undefined, fallback);
    assert.strictEqual(session.get("ok"), false);
    assert.strictEqual(session.global.get("user_name"), "Alex");
  });

  test("Registers and unregisters functions", () => {
    const dispatcher = new FunctionDispatcher({ a: () => [] });
    dispatcher.register("b", () => []);

    assert.deepStrictEqual(dispatcher.names(), ["a", "b"]);
    assert.strictEqual(dispatcher.unregister("a"), true);
    assert.strictEqual(dispatcher.unregister("a"), false);
    assert.strictEqual(dispatcher.has("a"), false);
    assert.strictEqual(dispatcher.has("b"), true);
  });
});
