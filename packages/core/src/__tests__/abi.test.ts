import { assert, describe, test } from "@loom-ui/testkit";
import {
  ALIGN_CENTER,
  ALL,
  HORIZONTAL,
  LoomError,
  VERTICAL,
  describeThrown,
  isLoomError,
  toAxis,
} from "../abi.js";

describe("toolkit constants", () => {
  test("composite flag bits", () => {
    assert.equal(ALL, 0xf0);
    assert.equal(ALIGN_CENTER, 0x900);
  });
});

describe("toAxis", () => {
  test("accepts both signs of both axes", () => {
    assert.equal(toAxis(4, "t"), HORIZONTAL);
    assert.equal(toAxis(-4, "t"), HORIZONTAL);
    assert.equal(toAxis(8, "t"), VERTICAL);
    assert.equal(toAxis(-8, "t"), VERTICAL);
  });

  test("rejects other magnitudes with LOOM_INVALID_PROPS", () => {
    assert.throws(
      () => toAxis(5, "panel"),
      (err: unknown) =>
        err instanceof LoomError &&
        err.code === "LOOM_INVALID_PROPS" &&
        err.message === "panel: orientation must be ±HORIZONTAL (4) or ±VERTICAL (8), got 5",
    );
  });
});

describe("LoomError", () => {
  test("carries code, name and cause", () => {
    const cause = new Error("boom");
    const err = new LoomError("LOOM_TOOLKIT_ERROR", "wrapped", { cause });
    assert.equal(err.name, "LoomError");
    assert.equal(err.code, "LOOM_TOOLKIT_ERROR");
    assert.equal(err.message, "wrapped");
    assert.equal(err.cause, cause);
  });

  test("message defaults to the code", () => {
    assert.equal(new LoomError("LOOM_INVALID_PLAN").message, "LOOM_INVALID_PLAN");
  });

  test("isLoomError filters by code", () => {
    const err = new LoomError("LOOM_INVALID_STATE");
    assert.equal(isLoomError(err), true);
    assert.equal(isLoomError(err, "LOOM_INVALID_STATE"), true);
    assert.equal(isLoomError(err, "LOOM_INVALID_PLAN"), false);
    assert.equal(isLoomError(new Error("x")), false);
  });

  test("describeThrown renders errors and plain values", () => {
    assert.equal(describeThrown(new TypeError("bad")), "TypeError: bad");
    assert.equal(describeThrown(42), "42");
  });
});
