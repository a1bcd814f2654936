import { assert, describe, test } from "@loom-ui/testkit";
import { HORIZONTAL, VERTICAL, isLoomError } from "../../abi.js";
import { passEvent } from "../../runtime/eventLink.js";
import { createTestContext } from "../../testing/context.js";
import { button, textLabel } from "../basic.js";
import { comp } from "../composition.js";
import { grid, panel } from "../containers.js";
import { par, seq } from "../types.js";

describe("panel", () => {
  test("box panel builds its plan forward inside itself", () => {
    const t = createTestContext();
    try {
      comp(panel(HORIZONTAL, seq(button("a"), button("b"))), t.ctx);
      assert.equal(
        t.toolkit.outline(t.frame),
        [
          'frame#1 "test" 320x240 [box vertical]',
          "  panel#2 [box horizontal]",
          '    button#5 "a"',
          "    panel#3 [box horizontal]",
          '      button#4 "b"',
        ].join("\n"),
      );
    } finally {
      t.dispose();
    }
  });

  test("negative orientation reverses placement", () => {
    const t = createTestContext();
    try {
      comp(panel(-8, seq(button("a"), button("b"))), t.ctx);
      assert.equal(
        t.toolkit.outline(t.frame),
        [
          'frame#1 "test" 320x240 [box vertical]',
          "  panel#2 [box vertical]",
          '    button#3 "b"',
          '    button#4 "a"',
        ].join("\n"),
      );
    } finally {
      t.dispose();
    }
  });

  test("sizer-less panel only fits itself when children are added", () => {
    const t = createTestContext();
    try {
      comp(panel(button("x")), t.ctx);
      const [p] = t.toolkit.snapshot(t.frame).children;
      assert.equal(p?.sizer, null);
      assert.equal(p?.fitCount, 1);
      assert.deepEqual(p?.flags, { proportion: 1, flag: 0, border: 0 });
      assert.deepEqual(
        p?.children.map((c) => c.flags),
        [null],
      );
    } finally {
      t.dispose();
    }
  });

  test("inherited sizer flags apply to the panel and its children", () => {
    const t = createTestContext({
      sizerFlags: [
        ["proportion", 0],
        ["border", 3],
      ],
    });
    try {
      comp(panel(VERTICAL, button("in")), t.ctx);
      const [p] = t.toolkit.snapshot(t.frame).children;
      const expected = { proportion: 0, flag: 0, border: 3 };
      assert.deepEqual(p?.flags, expected);
      assert.deepEqual(p?.children[0]?.flags, expected);
    } finally {
      t.dispose();
    }
  });

  test("the panel's link is its plan's link", () => {
    const t = createTestContext();
    try {
      const link = comp(panel(VERTICAL, textLabel("%s")), t.ctx);
      passEvent("z", link);
      assert.deepEqual(t.toolkit.texts(), ["z"]);
    } finally {
      t.dispose();
    }
  });
});

describe("grid", () => {
  test("creates a grid sizer with the given column count", () => {
    const t = createTestContext();
    try {
      comp(grid(2, par(button("a"), button("b"), button("c"))), t.ctx);
      assert.equal(
        t.toolkit.outline(t.frame),
        [
          'frame#1 "test" 320x240 [box vertical]',
          "  panel#2 [grid 2 cols]",
          '    button#3 "a"',
          '    button#4 "b"',
          '    button#5 "c"',
        ].join("\n"),
      );
    } finally {
      t.dispose();
    }
  });

  test("rejects a column count that is not a positive integer", () => {
    for (const columns of [0, -2, 1.5]) {
      assert.throws(
        () => grid(columns, button("x")),
        (err: unknown) =>
          isLoomError(err, "LOOM_INVALID_PROPS") &&
          err.message === `grid: columns must be a positive integer, got ${String(columns)}`,
      );
    }
  });

  test("grid children are placed forward regardless of the parent", () => {
    const t = createTestContext({ orientation: -4 });
    try {
      comp(grid(1, par(button("first"), button("second"))), t.ctx);
      const [g] = t.toolkit.snapshot(t.frame).children;
      assert.deepEqual(
        g?.children.map((c) => c.label),
        ["first", "second"],
      );
    } finally {
      t.dispose();
    }
  });
});
