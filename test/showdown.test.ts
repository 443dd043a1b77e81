import test from "node:test";
import assert from "node:assert/strict";
import {
  describeEvaluation,
  evaluateAndCompare,
  HandError,
  showdown,
} from "../src/engine/Showdown.js";

test("showdown:four of a kind beats a full house", () => {
  assert.equal(evaluateAndCompare("AAAA3", "AAQQQ"), "FirstWins");
  assert.equal(evaluateAndCompare("AAQQQ", "AAAA3"), "SecondWins");
});

test("showdown:wildcard five aces beat five kings", () => {
  assert.equal(evaluateAndCompare("AAAA*", "KKKKK"), "FirstWins");
});

test("showdown:straight beats high card", () => {
  assert.equal(evaluateAndCompare("23456", "23457"), "FirstWins");
});

test("showdown:same straight in different suits ties", () => {
  assert.equal(evaluateAndCompare("AsKdQhJcTs", "AhKsQdJsTc"), "Tie");
  assert.equal(evaluateAndCompare("AKQJT", "tjqka"), "Tie");
});

test("showdown:kickers and wildcards", () => {
  const cases: Array<[string, string, string]> = [
    ["AAKKK", "23456", "FirstWins"],
    ["KA225", "33A47", "SecondWins"],
    ["AA225", "44465", "SecondWins"],
    ["TT4A2", "TTA89", "SecondWins"],
    ["A345*", "254*6", "SecondWins"],
    ["QQ2AT", "QQT2J", "FirstWins"],
    ["2h7h9hJh*", "AsKdQhJcTs", "FirstWins"],
  ];
  for (const [a, b, expected] of cases) {
    assert.equal(evaluateAndCompare(a, b), expected, `${a} vs ${b}`);
  }
});

test("showdown:returns both evaluations", () => {
  const r = showdown("AAAA3", "AAQQQ");
  assert.equal(r.outcome, "FirstWins");
  assert.deepEqual(r.first, { handType: "FourOfAKind", rank: [14, 3], wildcardAs: null });
  assert.deepEqual(r.second, { handType: "FullHouse", rank: [12, 14], wildcardAs: null });
  assert.equal(describeEvaluation(r.first), "Four of a Kind (A, 3)");
  assert.equal(describeEvaluation(r.second), "Full House (Q, A)");
});

test("showdown:labels", () => {
  assert.equal(describeEvaluation(showdown("tjqk*", "a2345").first), "Straight (A)");
  assert.equal(describeEvaluation(showdown("tjqk*", "a2345").second), "Straight (5)");
  assert.equal(describeEvaluation(showdown("2h7h9hJhTh", "53929").first), "Flush (J, T, 9, 7, 2)");
});

test("showdown:validation errors propagate unchanged", () => {
  assert.throws(
    () => evaluateAndCompare("AAAA", "KKKKK"),
    (e: unknown) => e instanceof HandError && e.code === "InvalidCardCount" && e.input === "AAAA",
  );
  assert.throws(
    () => evaluateAndCompare("AAAA3", "**KKK"),
    (e: unknown) => e instanceof HandError && e.code === "MultipleWildcards" && e.input === "**KKK",
  );
});
