import { Evaluation, HandType, Outcome, Rank, ShowdownResult } from "../model/types.js";
import { compareEvaluations, evaluateHand, toOutcome } from "./Evaluator.js";
import { parseHand } from "./HandParser.js";

export { parseHand, HAND_SIZE, WILDCARD } from "./HandParser.js";
export { classify, compareEvaluations, evaluateHand, toOutcome } from "./Evaluator.js";
export { HandError, isHandError, type HandErrorCode } from "./HandError.js";

const HAND_TYPE_LABELS: Record<HandType, string> = {
  HighCard: "High Card",
  Pair: "Pair",
  TwoPair: "Two Pair",
  ThreeOfAKind: "Three of a Kind",
  Straight: "Straight",
  Flush: "Flush",
  FullHouse: "Full House",
  FourOfAKind: "Four of a Kind",
  StraightFlush: "Straight Flush",
  FiveOfAKind: "Five of a Kind",
};

const FACES: Partial<Record<Rank, string>> = { 10: "T", 11: "J", 12: "Q", 13: "K", 14: "A" };

export const rankSymbol = (r: Rank): string => FACES[r] ?? String(r);

/** 例: "Four of a Kind (A, 3)" */
export function describeEvaluation(e: Evaluation): string {
  return `${HAND_TYPE_LABELS[e.handType]} (${e.rank.map(rankSymbol).join(", ")})`;
}

/** 2つの手札を評価して両方の評価と勝敗を返す。検証エラーはそのまま投げる */
export function showdown(handA: string, handB: string): ShowdownResult {
  const first = evaluateHand(parseHand(handA));
  const second = evaluateHand(parseHand(handB));
  return { outcome: toOutcome(compareEvaluations(first, second)), first, second };
}

export function evaluateAndCompare(handA: string, handB: string): Outcome {
  return showdown(handA, handB).outcome;
}
