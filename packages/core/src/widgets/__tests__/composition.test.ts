import { assert, createRecorder, describe, test } from "@loom-ui/testkit";
import { ALIGN_CENTER_VERTICAL, ALL, HORIZONTAL, VERTICAL, isLoomError } from "../../abi.js";
import { resolveSizerFlags } from "../../runtime/context.js";
import { callbackLink, passEvent, queueLink } from "../../runtime/eventLink.js";
import { Mailbox } from "../../runtime/mailbox.js";
import { createTestContext } from "../../testing/context.js";
import { button, textLabel } from "../basic.js";
import { SEQUENTIAL_WRAPPER_FLAGS, addSelf, comp, composerFor, rcomp } from "../composition.js";
import { panel } from "../containers.js";
import { map } from "../links.js";
import { par, seq, single } from "../types.js";

describe("comp - sequential", () => {
  test("first item goes straight into the parent, the rest into wrappers", () => {
    const t = createTestContext();
    try {
      comp(seq(button("a"), button("b"), button("c")), t.ctx);
      assert.equal(
        t.toolkit.outline(t.frame),
        [
          'frame#1 "test" 320x240 [box vertical]',
          '  button#6 "a"',
          "  panel#4 [box horizontal]",
          '    button#5 "b"',
          "  panel#2 [box horizontal]",
          '    button#3 "c"',
        ].join("\n"),
      );
    } finally {
      t.dispose();
    }
  });

  test("wrappers are attached with the sequential wrapper flags", () => {
    const t = createTestContext();
    try {
      comp(seq(button("a"), button("b")), t.ctx);
      const [, wrapper] = t.toolkit.snapshot(t.frame).children;
      assert.deepEqual(wrapper?.flags, {
        proportion: 1,
        flag: ALL | ALIGN_CENTER_VERTICAL,
        border: 0,
      });
      assert.deepEqual(resolveSizerFlags(SEQUENTIAL_WRAPPER_FLAGS), wrapper?.flags);
    } finally {
      t.dispose();
    }
  });

  test("wrappers left empty are destroyed", () => {
    const t = createTestContext();
    try {
      comp(
        seq(
          button("go"),
          map(() => "mapped"),
          textLabel("%s"),
        ),
        t.ctx,
      );
      assert.equal(t.toolkit.isAlive({ ref: 4, kind: "panel" }), false);
      assert.equal(
        t.toolkit.outline(t.frame),
        [
          'frame#1 "test" 320x240 [box vertical]',
          '  button#5 "go"',
          "  panel#2 [box horizontal]",
          "    staticText#3",
        ].join("\n"),
      );
    } finally {
      t.dispose();
    }
  });

  test("events flow from the first item to the last", () => {
    const t = createTestContext();
    try {
      comp(seq(button("go"), map(() => "mapped"), textLabel("%s")), t.ctx);
      t.toolkit.click("go");
      assert.deepEqual(t.toolkit.texts(), ["mapped"]);
    } finally {
      t.dispose();
    }
  });

  test("only the last item sends to the context's link", () => {
    const out = createRecorder<unknown>();
    const t = createTestContext({ eventLink: callbackLink(out.push) });
    try {
      comp(seq(button("first"), button("last")), t.ctx);
      t.toolkit.click("first");
      assert.equal(out.values.length, 0);
      t.toolkit.click("last");
      assert.equal(out.values.length, 1);
    } finally {
      t.dispose();
    }
  });

  test("a one-item sequence builds the item without a wrapper", () => {
    const t = createTestContext();
    try {
      comp(seq(button("solo")), t.ctx);
      assert.equal(
        t.toolkit.outline(t.frame),
        ['frame#1 "test" 320x240 [box vertical]', '  button#2 "solo"'].join("\n"),
      );
    } finally {
      t.dispose();
    }
  });

  test("an empty sequence is rejected", () => {
    const t = createTestContext();
    try {
      for (const build of [comp, rcomp]) {
        assert.throws(
          () => build(seq(), t.ctx),
          (err: unknown) =>
            isLoomError(err, "LOOM_INVALID_PLAN") &&
            err.message === "sequential plan must contain at least one item",
        );
      }
    } finally {
      t.dispose();
    }
  });
});

describe("rcomp - sequential", () => {
  test("builds items last to first directly in the parent", () => {
    const t = createTestContext();
    try {
      rcomp(seq(button("a"), button("b")), t.ctx);
      assert.equal(
        t.toolkit.outline(t.frame),
        ['frame#1 "test" 320x240 [box vertical]', '  button#2 "b"', '  button#3 "a"'].join("\n"),
      );
    } finally {
      t.dispose();
    }
  });

  test("routing is unchanged by the reversed placement", () => {
    const t = createTestContext();
    try {
      rcomp(seq(button("go"), map(() => "r"), textLabel("%s")), t.ctx);
      t.toolkit.click("go");
      assert.deepEqual(t.toolkit.texts(), ["r"]);
    } finally {
      t.dispose();
    }
  });
});

describe("parallel", () => {
  test("every item receives each event", () => {
    const t = createTestContext();
    try {
      const link = comp(par(textLabel("%s"), textLabel("x: %s")), t.ctx);
      passEvent("hi", link);
      assert.deepEqual(t.toolkit.texts(), ["hi", "x: hi"]);
    } finally {
      t.dispose();
    }
  });

  test("each payload reaches queue and callback children exactly once", () => {
    const t = createTestContext();
    try {
      const mailbox = new Mailbox<unknown>();
      const out = createRecorder<unknown>();
      const link = comp(
        par(
          () => queueLink(mailbox),
          () => callbackLink(out.push),
        ),
        t.ctx,
      );
      passEvent("p", link);
      assert.equal(mailbox.size, 1);
      assert.deepEqual(out.values, ["p"]);
    } finally {
      t.dispose();
    }
  });

  test("rcomp creates parallel items in reverse order", () => {
    const t = createTestContext();
    try {
      const link = rcomp(par(textLabel("one %s"), textLabel("two %s")), t.ctx);
      passEvent(1, link);
      assert.deepEqual(t.toolkit.texts(), ["two 1", "one 1"]);
    } finally {
      t.dispose();
    }
  });
});

describe("single and helpers", () => {
  test("single-element plans build the same tree under comp and rcomp", () => {
    const outlines = [comp, rcomp].map((build) => {
      const t = createTestContext();
      try {
        build(single(panel(VERTICAL, button("x"))), t.ctx);
        build(seq(textLabel("%s", "y")), t.ctx);
        return t.toolkit.outline(t.frame);
      } finally {
        t.dispose();
      }
    });
    assert.equal(outlines[0], outlines[1]);
  });

  test("single wraps a plan without adding widgets", () => {
    const t = createTestContext();
    try {
      comp(single(single(button("x"))), t.ctx);
      assert.deepEqual(
        t.toolkit.findAll("button").map((b) => t.toolkit.labelOf(b)),
        ["x"],
      );
      assert.equal(t.toolkit.findAll("panel").length, 0);
    } finally {
      t.dispose();
    }
  });

  test("addSelf fits the parent even without a sizer", () => {
    const t = createTestContext();
    try {
      const bare = t.toolkit.createPanel(t.frame);
      const child = t.toolkit.createButton(bare, 1, "c");
      addSelf(t.toolkit, bare, child);
      const snap = t.toolkit.snapshot(bare);
      assert.equal(snap.fitCount, 1);
      assert.equal(snap.sizer, null);
    } finally {
      t.dispose();
    }
  });

  test("composerFor picks rcomp for negative orientations", () => {
    assert.equal(composerFor(HORIZONTAL), comp);
    assert.equal(composerFor(VERTICAL), comp);
    assert.equal(composerFor(-HORIZONTAL), rcomp);
    assert.equal(composerFor(-VERTICAL), rcomp);
  });
});
