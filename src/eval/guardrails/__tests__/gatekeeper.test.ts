import { describe, it, expect } from "vitest";
import { countPlaceholders, unevaluatedScore, validateAnswer, type GatekeeperOptions } from "../gatekeeper.js";

const opts: GatekeeperOptions = { minLength: 20, placeholderRepeatLimit: 3 };

function check(text: string, options: GatekeeperOptions = opts) {
  return validateAnswer({ id: "a1", text }, options);
}

describe("validateAnswer", () => {
  it("accepts a substantive answer", () => {
    expect(check("I profiled the hot path and cut p99 latency by a third.")).toEqual({ accepted: true, reason: null });
  });

  it("rejects an empty or whitespace-only answer", () => {
    expect(check("")).toEqual({ accepted: false, code: "empty", reason: "answer is empty" });
    expect(check("   \n\t ")).toEqual({ accepted: false, code: "empty", reason: "answer is empty" });
  });

  it("rejects an answer shorter than the minimum length", () => {
    expect(check("ok")).toEqual({ accepted: false, code: "too_short", reason: "answer has 2 characters, minimum is 20" });
  });

  it("measures length after trimming", () => {
    expect(check("  short answer   ")).toMatchObject({ code: "too_short", reason: "answer has 12 characters, minimum is 20" });
  });

  it("counts code points, not UTF-16 units, toward the minimum length", () => {
    expect(check("🚀🚀🚀🚀🚀 ship it", { minLength: 14, placeholderRepeatLimit: 3 })).toEqual({
      accepted: false,
      code: "too_short",
      reason: "answer has 13 characters, minimum is 14",
    });
  });

  it("scores an answer about software testing", () => {
    expect(
      check("Every test must pass before merge; a test that fails blocks the release, and we test rollback too."),
    ).toEqual({ accepted: true, reason: null });
  });

  it("rejects repeated placeholder phrases", () => {
    expect(check("idk idk idk idk idk idk")).toEqual({
      accepted: false,
      code: "placeholder",
      reason: "answer is placeholder text (6 placeholder phrases)",
    });
  });

  it("rejects an answer made only of placeholder phrases", () => {
    expect(check("I don't know, no answer.")).toEqual({
      accepted: false,
      code: "placeholder",
      reason: "answer is placeholder text (2 placeholder phrases)",
    });
  });

  it("lets an incidental placeholder word through", () => {
    expect(check("I refactored the payment module and wrote a test for every edge case.").accepted).toBe(true);
  });

  it("rejects a single word repeated over and over", () => {
    expect(check("ok ok ok ok ok ok ok ok")).toEqual({
      accepted: false,
      code: "repetitive",
      reason: "a single word makes up 100% of the answer",
    });
  });

  it("allows a dominant word up to 60% of the tokens", () => {
    const short: GatekeeperOptions = { minLength: 5, placeholderRepeatLimit: 3 };
    expect(check("yes yes yes no no", short).accepted).toBe(true);
    expect(check("yes yes yes yes no", short)).toEqual({
      accepted: false,
      code: "repetitive",
      reason: "a single word makes up 80% of the answer",
    });
  });

  it("does not apply the repetition rule to fewer than five tokens", () => {
    expect(check("hello hello", { minLength: 5, placeholderRepeatLimit: 3 }).accepted).toBe(true);
  });
});

describe("countPlaceholders", () => {
  it("matches whole phrases only, case-insensitively", () => {
    expect(countPlaceholders("N/A")).toBe(1);
    expect(countPlaceholders("Testing is important")).toBe(0);
    expect(countPlaceholders("the contest was close")).toBe(0);
    expect(countPlaceholders("TBD ... idk")).toBe(3);
    expect(countPlaceholders("skip the test if it does not pass")).toBe(0);
  });
});

describe("unevaluatedScore", () => {
  it("builds the sentinel result for a rejected answer", () => {
    const final = unevaluatedScore(
      { id: "a9", text: "ok" },
      { accepted: false, code: "too_short", reason: "answer has 2 characters, minimum is 20" },
      "intent_alignment",
    );

    expect(final).toMatchObject({
      answer_id: "a9",
      template_id: "intent_alignment",
      value: null,
      mean_raw: null,
      std_dev: null,
      consistency: null,
      unevaluated: true,
      degraded: false,
      requested_calls: 0,
      successful_calls: 0,
      raw_scores: [],
      reason: "unevaluated — insufficient content: answer has 2 characters, minimum is 20",
    });
    expect(Object.isFrozen(final)).toBe(true);
  });
});
