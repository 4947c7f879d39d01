import { InvalidPriorityError, ListenerNotFoundError } from "@fanout/errors";
import { describe, expect, it } from "vitest";
import { PRIORITY } from "../constants.js";
import { BaseEvent } from "../event.js";
import { Topic } from "../topic.js";
import type { Event, Listener } from "../types.js";
import { abortingListener, failingListener, recordingListener } from "./helpers.js";

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

describe("Topic: ordering", () => {
  it("invokes listeners in descending priority order", () => {
    const topic = new Topic("order.*");
    const calls: string[] = [];
    topic.add("low", recordingListener(calls, "low"), PRIORITY.LOW);
    topic.add("highest", recordingListener(calls, "highest"), PRIORITY.HIGHEST);
    topic.add("normal", recordingListener(calls, "normal"), PRIORITY.NORMAL);
    topic.add("lowest", recordingListener(calls, "lowest"), PRIORITY.LOWEST);
    topic.add("high", recordingListener(calls, "high"), PRIORITY.HIGH);

    topic.trigger(new BaseEvent("order.created", undefined));

    expect(calls).toEqual(["highest", "high", "normal", "low", "lowest"]);
  });

  it("runs equal priorities in registration order", () => {
    const topic = new Topic("t");
    const calls: string[] = [];
    for (const label of ["a", "b", "c", "d"]) {
      topic.add(label, recordingListener(calls, label), PRIORITY.NORMAL);
    }
    topic.add("first", recordingListener(calls, "first"), PRIORITY.HIGH);

    topic.trigger(new BaseEvent("t", undefined));

    expect(calls).toEqual(["first", "a", "b", "c", "d"]);
  });

  it("listenerIds() reports invocation order", () => {
    const topic = new Topic("t");
    topic.add("x", () => {}, 10);
    topic.add("y", () => {}, 90);
    topic.add("z", () => {}, 10);

    expect(topic.listenerIds()).toEqual(["y", "x", "z"]);
  });
});

// ---------------------------------------------------------------------------
// Priority clamping
// ---------------------------------------------------------------------------

describe("Topic: priority clamping", () => {
  it("clamps out-of-range priorities to the nearest bound", () => {
    const topic = new Topic("t");
    const calls: string[] = [];
    topic.add("above", recordingListener(calls, "above"), 500);
    topic.add("highest", recordingListener(calls, "highest"), PRIORITY.HIGHEST);
    topic.add("below", recordingListener(calls, "below"), -20);
    topic.add("lowest", recordingListener(calls, "lowest"), PRIORITY.LOWEST);

    topic.trigger(new BaseEvent("t", undefined));

    // Clamped values tie with the bounds and keep registration order
    expect(calls).toEqual(["above", "highest", "below", "lowest"]);
  });

  it("clamps infinities", () => {
    const topic = new Topic("t");
    const calls: string[] = [];
    topic.add("neg", recordingListener(calls, "neg"), Number.NEGATIVE_INFINITY);
    topic.add("pos", recordingListener(calls, "pos"), Number.POSITIVE_INFINITY);

    topic.trigger(new BaseEvent("t", undefined));

    expect(calls).toEqual(["pos", "neg"]);
  });

  it("rejects NaN", () => {
    const topic = new Topic("t");
    expect(() => topic.add("nan", () => {}, Number.NaN)).toThrow(InvalidPriorityError);
    expect(topic.listenerCount).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Removal
// ---------------------------------------------------------------------------

describe("Topic: removal", () => {
  it("remove() drops the listener", () => {
    const topic = new Topic("t");
    const calls: string[] = [];
    topic.add("a", recordingListener(calls, "a"), PRIORITY.NORMAL);
    topic.add("b", recordingListener(calls, "b"), PRIORITY.NORMAL);

    topic.remove("a");
    topic.trigger(new BaseEvent("t", undefined));

    expect(calls).toEqual(["b"]);
    expect(topic.hasListener("a")).toBe(false);
    expect(topic.listenerCount).toBe(1);
  });

  it("remove() of an unknown ID throws ListenerNotFoundError", () => {
    const topic = new Topic("user.*");

    expect(() => topic.remove("missing")).toThrow(ListenerNotFoundError);
    try {
      topic.remove("missing");
    } catch (error) {
      expect(error).toBeInstanceOf(ListenerNotFoundError);
      if (error instanceof ListenerNotFoundError) {
        expect(error.listenerId).toBe("missing");
        expect(error.topicName).toBe("user.*");
        expect(error.code).toBe("EMITTER_LISTENER_NOT_FOUND");
      }
    }
  });

  it("removing twice throws on the second call", () => {
    const topic = new Topic("t");
    topic.add("a", () => {}, PRIORITY.NORMAL);
    topic.remove("a");

    expect(() => topic.remove("a")).toThrow(ListenerNotFoundError);
  });

  it("a duplicate ID replaces the earlier registration", () => {
    const topic = new Topic("t");
    const calls: string[] = [];
    topic.add("dup", recordingListener(calls, "old"), PRIORITY.NORMAL);
    topic.add("dup", recordingListener(calls, "new"), PRIORITY.NORMAL);

    topic.trigger(new BaseEvent("t", undefined));

    expect(calls).toEqual(["new"]);
    expect(topic.listenerCount).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Trigger
// ---------------------------------------------------------------------------

describe("Topic: trigger", () => {
  it("collects returned errors in invocation order", () => {
    const topic = new Topic("t");
    const calls: string[] = [];
    topic.add("ok", recordingListener(calls, "ok"), PRIORITY.HIGH);
    topic.add("e1", failingListener(calls, "e1"), PRIORITY.NORMAL);
    topic.add("e2", failingListener(calls, "e2"), PRIORITY.LOW);

    const errors = topic.trigger(new BaseEvent("t", undefined));

    expect(errors.map((e) => e.message)).toEqual(["e1", "e2"]);
    expect(calls).toEqual(["ok", "e1", "e2"]);
  });

  it("ignores null and undefined results", () => {
    const topic = new Topic("t");
    topic.add("null", () => null, PRIORITY.NORMAL);
    topic.add("undef", () => undefined, PRIORITY.NORMAL);

    expect(topic.trigger(new BaseEvent("t", undefined))).toEqual([]);
  });

  it("stops after the listener that aborts", () => {
    const topic = new Topic("t");
    const calls: string[] = [];
    topic.add("first", recordingListener(calls, "first"), PRIORITY.HIGH);
    topic.add("abort", abortingListener(calls, "abort"), PRIORITY.NORMAL);
    topic.add("never", recordingListener(calls, "never"), PRIORITY.LOW);

    topic.trigger(new BaseEvent("t", undefined));

    expect(calls).toEqual(["first", "abort"]);
  });

  it("runs the first listener even when the event arrives aborted", () => {
    const topic = new Topic("t");
    const calls: string[] = [];
    topic.add("a", recordingListener(calls, "a"), PRIORITY.HIGH);
    topic.add("b", recordingListener(calls, "b"), PRIORITY.LOW);
    const event = new BaseEvent("t", undefined);
    event.abort();

    topic.trigger(event);

    expect(calls).toEqual(["a"]);
  });

  it("shares payload mutations between listeners", () => {
    const topic = new Topic("t");
    const seen: unknown[] = [];
    topic.add(
      "writer",
      (event: Event) => {
        event.payload = "changed";
      },
      PRIORITY.HIGH,
    );
    topic.add(
      "reader",
      (event: Event) => {
        seen.push(event.payload);
      },
      PRIORITY.LOW,
    );

    topic.trigger(new BaseEvent("t", "original"));

    expect(seen).toEqual(["changed"]);
  });

  it("propagates thrown values", () => {
    const topic = new Topic("t");
    topic.add(
      "boom",
      () => {
        throw new Error("boom");
      },
      PRIORITY.NORMAL,
    );

    expect(() => topic.trigger(new BaseEvent("t", undefined))).toThrow("boom");
  });
});

// ---------------------------------------------------------------------------
// Mutation during trigger
// ---------------------------------------------------------------------------

describe("Topic: mutation during trigger", () => {
  it("a listener removed by an earlier listener is not invoked", () => {
    const topic = new Topic("t");
    const calls: string[] = [];
    const remover: Listener = () => {
      calls.push("remover");
      topic.remove("victim");
    };
    topic.add("remover", remover, PRIORITY.HIGH);
    topic.add("victim", recordingListener(calls, "victim"), PRIORITY.LOW);

    topic.trigger(new BaseEvent("t", undefined));

    expect(calls).toEqual(["remover"]);
  });

  it("a listener added during trigger runs from the next trigger on", () => {
    const topic = new Topic("t");
    const calls: string[] = [];
    let added = false;
    topic.add(
      "adder",
      () => {
        calls.push("adder");
        if (!added) {
          added = true;
          topic.add("late", recordingListener(calls, "late"), PRIORITY.LOWEST);
        }
      },
      PRIORITY.HIGH,
    );

    topic.trigger(new BaseEvent("t", undefined));
    topic.trigger(new BaseEvent("t", undefined));

    expect(calls).toEqual(["adder", "adder", "late"]);
  });

  it("a listener can remove itself", () => {
    const topic = new Topic("t");
    const calls: string[] = [];
    topic.add(
      "self",
      () => {
        calls.push("self");
        topic.remove("self");
      },
      PRIORITY.NORMAL,
    );

    topic.trigger(new BaseEvent("t", undefined));
    topic.trigger(new BaseEvent("t", undefined));

    expect(calls).toEqual(["self"]);
  });
});
