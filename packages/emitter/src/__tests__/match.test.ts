import { describe, expect, it } from "vitest";
import { isValidTopicName, matchTopicPattern } from "../match.js";

describe("matchTopicPattern: literal patterns", () => {
  it("matches the identical topic", () => {
    expect(matchTopicPattern("user.created", "user.created")).toBe(true);
  });

  it("rejects a different topic", () => {
    expect(matchTopicPattern("user.created", "user.deleted")).toBe(false);
    expect(matchTopicPattern("user", "users")).toBe(false);
  });

  it("rejects prefixes and extensions", () => {
    expect(matchTopicPattern("user.created", "user")).toBe(false);
    expect(matchTopicPattern("user", "user.created")).toBe(false);
  });

  it("matches two empty strings", () => {
    expect(matchTopicPattern("", "")).toBe(true);
  });
});

describe("matchTopicPattern: single wildcard", () => {
  it("* alone matches a single segment", () => {
    expect(matchTopicPattern("*", "a")).toBe(true);
  });

  it("* alone matches the empty topic", () => {
    expect(matchTopicPattern("*", "")).toBe(true);
  });

  it("* alone does not match multiple segments", () => {
    expect(matchTopicPattern("*", "a.b")).toBe(false);
  });

  it("a.* matches exactly one child segment", () => {
    expect(matchTopicPattern("a.*", "a")).toBe(false);
    expect(matchTopicPattern("a.*", "a.b")).toBe(true);
    expect(matchTopicPattern("a.*", "a.b.c")).toBe(false);
  });

  it("* in the middle consumes one segment", () => {
    expect(matchTopicPattern("order.*.shipped", "order.42.shipped")).toBe(true);
    expect(matchTopicPattern("order.*.shipped", "order.42.7.shipped")).toBe(false);
  });

  it("* matches an empty segment between consecutive dots", () => {
    expect(matchTopicPattern("a.*.b", "a..b")).toBe(true);
  });
});

describe("matchTopicPattern: multi wildcard", () => {
  it("** alone matches every topic", () => {
    for (const topic of ["", "a", "a.b", "a.b.c", "..", "x..y"]) {
      expect(matchTopicPattern("**", topic)).toBe(true);
    }
  });

  it("trailing ** matches one or more children", () => {
    expect(matchTopicPattern("a.**", "a.b")).toBe(true);
    expect(matchTopicPattern("a.**", "a.b.c")).toBe(true);
  });

  it("trailing ** does not match the bare single-segment prefix", () => {
    expect(matchTopicPattern("a.**", "a")).toBe(false);
    expect(matchTopicPattern("event.**", "event")).toBe(false);
  });

  it("trailing ** matches a bare multi-segment prefix", () => {
    expect(matchTopicPattern("a.b.**", "a.b")).toBe(true);
  });

  it("leading ** backtracks over any number of segments", () => {
    expect(matchTopicPattern("**.x.y", "p.q.x.y")).toBe(true);
    expect(matchTopicPattern("**.x.y", "x.y")).toBe(true);
    expect(matchTopicPattern("**.x.y", "p.q.x.z")).toBe(false);
  });

  it("inner ** matches zero segments", () => {
    expect(matchTopicPattern("a.**.z", "a.z")).toBe(true);
    expect(matchTopicPattern("a.**.z", "a.b.c.z")).toBe(true);
    expect(matchTopicPattern("a.**.z", "a.b.c")).toBe(false);
  });

  it("**.error requires at least two segments", () => {
    expect(matchTopicPattern("**.error", "db.conn.error")).toBe(true);
    expect(matchTopicPattern("**.error", "timeout.error")).toBe(true);
    expect(matchTopicPattern("**.error", "errors")).toBe(false);
  });

  it("remaining ** segments match an exhausted topic", () => {
    expect(matchTopicPattern("a.**.**", "a.b")).toBe(true);
  });

  it("mixed wildcards", () => {
    expect(matchTopicPattern("*.**.end", "start.end")).toBe(true);
    expect(matchTopicPattern("*.**.end", "start.mid.end")).toBe(true);
    expect(matchTopicPattern("*.**.end", "end")).toBe(false);
  });
});

describe("matchTopicPattern: totality", () => {
  it("never throws on unusual input", () => {
    const inputs = ["", ".", "..", "*", "**", "*.*", "**.**", "a..", "..a", "?", "["];
    for (const pattern of inputs) {
      for (const topic of inputs) {
        expect(() => matchTopicPattern(pattern, topic)).not.toThrow();
      }
    }
  });

  it("is deterministic", () => {
    expect(matchTopicPattern("a.**.c", "a.b.c")).toBe(matchTopicPattern("a.**.c", "a.b.c"));
  });
});

describe("isValidTopicName", () => {
  it("accepts literal and wildcard patterns", () => {
    expect(isValidTopicName("user.created")).toBe(true);
    expect(isValidTopicName("*")).toBe(true);
    expect(isValidTopicName("order.**")).toBe(true);
  });

  it("rejects the empty string", () => {
    expect(isValidTopicName("")).toBe(false);
  });

  it("rejects reserved glob characters", () => {
    expect(isValidTopicName("user.?")).toBe(false);
    expect(isValidTopicName("user.[ab]")).toBe(false);
  });
});
