import {
  Card,
  Evaluation,
  HAND_TYPES,
  Hand,
  HandType,
  Outcome,
  PlayingCard,
  RANKS,
  Rank,
} from "../model/types.js";
import { HAND_SIZE } from "./HandParser.js";

const ACE: Rank = 14;
const WHEEL_HIGH: Rank = 5; // A-2-3-4-5 の最高位

const isPlayingCard = (c: Card): c is PlayingCard => !c.wild;

const handTypeOrder = (t: HandType): number => HAND_TYPES.indexOf(t);

/** ランク → 枚数。枚数の多い順、同数ならランクの高い順に並べる */
function groups(cards: readonly PlayingCard[]): Array<[Rank, number]> {
  const cnt = new Map<Rank, number>();
  for (const c of cards) cnt.set(c.rank, (cnt.get(c.rank) ?? 0) + 1);
  return [...cnt.entries()].sort((a, b) => b[1] - a[1] || b[0] - a[0]);
}

function isFlush(cards: readonly PlayingCard[]): boolean {
  const first = cards[0].suit;
  return first !== null && cards.every(c => c.suit === first);
}

/** ストレートならその最高位（A-2-3-4-5 は 5）、でなければ null */
function straightHigh(cards: readonly PlayingCard[]): Rank | null {
  const ranks = [...new Set(cards.map(c => c.rank))].sort((a, b) => b - a);
  if (ranks.length !== HAND_SIZE) return null;
  if (ranks[0] - ranks[HAND_SIZE - 1] === HAND_SIZE - 1) return ranks[0];
  if (ranks[0] === ACE && ranks[1] === WHEEL_HIGH) return WHEEL_HIGH;
  return null;
}

/** ワイルドを含まない5枚を役とタイブレークキーに分類する */
export function classify(cards: readonly PlayingCard[]): Evaluation {
  const g = groups(cards);
  const shape = g.map(([, n]) => n).join("");
  const kinds = g.map(([r]) => r);
  const flush = isFlush(cards);
  const high = straightHigh(cards);
  const made = (handType: HandType, rank: readonly Rank[]): Evaluation =>
    ({ handType, rank, wildcardAs: null });

  // デッキ整合を見ないので「ペア付きフラッシュ」もあり得る。上位の役から順に判定する
  if (shape === "5") return made("FiveOfAKind", kinds);
  if (high !== null && flush) return made("StraightFlush", [high]);
  if (shape === "41") return made("FourOfAKind", kinds);
  if (shape === "32") return made("FullHouse", kinds);
  if (flush) return made("Flush", cards.map(c => c.rank).sort((a, b) => b - a));
  if (high !== null) return made("Straight", [high]);
  if (shape === "311") return made("ThreeOfAKind", kinds);
  if (shape === "221") return made("TwoPair", kinds);
  if (shape === "2111") return made("Pair", kinds);
  return made("HighCard", kinds);
}

/**
 * 手札の最強の評価を返す。
 * ワイルドがあれば13ランクすべてを当てはめて最大のものを採る。
 * ワイルドのスートは他のカードの1枚目に合わせる（フラッシュを潰さないため）。
 */
export function evaluateHand(hand: Hand): Evaluation {
  const fixed = hand.cards.filter(isPlayingCard);
  if (!hand.hasWildcard) return classify(fixed);

  const suit = fixed.length > 0 ? fixed[0].suit : null;
  const candidates = RANKS.map((rank): Evaluation => ({
    ...classify([...fixed, { wild: false, rank, suit }]),
    wildcardAs: rank,
  }));
  return candidates.reduce((best, e) => (compareEvaluations(e, best) > 0 ? e : best));
}

/** a が強ければ +1、同等 0、弱ければ -1 */
export function compareEvaluations(a: Evaluation, b: Evaluation): number {
  const byType = handTypeOrder(a.handType) - handTypeOrder(b.handType);
  if (byType !== 0) return Math.sign(byType);

  const n = Math.max(a.rank.length, b.rank.length);
  for (let i = 0; i < n; i++) {
    const da = a.rank[i] ?? 0, db = b.rank[i] ?? 0;
    if (da > db) return +1;
    if (da < db) return -1;
  }
  return 0;
}

export function toOutcome(order: number): Outcome {
  if (order > 0) return "FirstWins";
  if (order < 0) return "SecondWins";
  return "Tie";
}
