import { assert, createRecorder, describe, settle, test } from "@loom-ui/testkit";
import { LoomError } from "../../abi.js";
import { createWindowScope } from "../context.js";
import { NO_LINK, callbackLink, passEvent } from "../eventLink.js";
import { silentLogger } from "../logger.js";
import { StateActor } from "../stateActor.js";

function makeScope() {
  const failures: Error[] = [];
  const controller = createWindowScope({
    logger: silentLogger,
    onFailure: (err) => failures.push(err),
  });
  return { ...controller, failures };
}

describe("StateActor", () => {
  test("folds messages in arrival order and forwards every new state", async () => {
    const { scope, abort } = makeScope();
    const out = createRecorder<string>();
    const actor = new StateActor<string>({
      scope,
      step: (msg, state) => `${state}${String(msg)}`,
      initial: "S",
      outbound: callbackLink((v) => out.push(String(v))),
    });

    passEvent("1", actor.link);
    passEvent("2", actor.link);
    passEvent("3", actor.link);
    await settle();

    assert.deepEqual(out.values, ["S1", "S12", "S123"]);
    assert.equal(actor.snapshot, "S123");
    abort();
    await actor.done;
    assert.equal(actor.status, "stopped");
  });

  test("aborting the scope stops the actor and drops later messages", async () => {
    const { scope, abort } = makeScope();
    const out = createRecorder<unknown>();
    const actor = new StateActor<number>({
      scope,
      step: (_msg, n) => n + 1,
      initial: 0,
      outbound: callbackLink(out.push),
    });
    abort();
    await actor.done;
    passEvent("late", actor.link);
    await settle();
    assert.equal(actor.status, "stopped");
    assert.deepEqual(out.values, []);
  });

  test("an actor on an already-aborted scope never runs", async () => {
    const { scope, abort } = makeScope();
    abort();
    const actor = new StateActor<number>({
      scope,
      step: (_m, n) => n,
      initial: 0,
      outbound: NO_LINK,
    });
    await actor.done;
    assert.equal(actor.status, "stopped");
  });

  test("a throwing step fails the scope with LOOM_ACTOR_FAILED", async () => {
    const { scope, failures, abort } = makeScope();
    const actor = new StateActor<number>({
      scope,
      step: () => {
        throw new Error("bad step");
      },
      initial: 0,
      outbound: NO_LINK,
    });
    passEvent("x", actor.link);
    await actor.done;

    assert.equal(actor.status, "failed");
    assert.equal(failures.length, 1);
    const [failure] = failures;
    assert.ok(failure instanceof LoomError);
    assert.equal(failure.code, "LOOM_ACTOR_FAILED");
    assert.equal(failure.message, "mapState actor threw: Error: bad step");
    abort();
  });
});
