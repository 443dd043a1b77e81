// === カード ==========================================================

// ランクは数値で持つ（J=11, Q=12, K=13, A=14）
export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;

export const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];

export type Suit = "h" | "d" | "c" | "s";

// 具体的なカード。ランクのみ表記（"AAAA3" など）では suit は null
export interface PlayingCard {
  wild: false;
  rank: Rank;
  suit: Suit | null;
}

export interface WildCard {
  wild: true;
}

export type Card = PlayingCard | WildCard;

// "AsKs..."（スート付き） or "AKQJT"（ランクのみ）
export type Notation = "suited" | "rank-only";

export type FiveOf<T> = readonly [T, T, T, T, T];

export interface Hand {
  source: string;
  notation: Notation;
  cards: FiveOf<Card>;
  hasWildcard: boolean;
}

// === 役 ==============================================================

// 弱い順。並び順そのものが強さの定義
export const HAND_TYPES = [
  "HighCard",
  "Pair",
  "TwoPair",
  "ThreeOfAKind",
  "Straight",
  "Flush",
  "FullHouse",
  "FourOfAKind",
  "StraightFlush",
  "FiveOfAKind",
] as const;

export type HandType = (typeof HAND_TYPES)[number];

export interface Evaluation {
  handType: HandType;
  /** タイブレーク用キー（上位から順に比較） */
  rank: readonly Rank[];
  /** ワイルドカードが化けたランク（ワイルドなしなら null） */
  wildcardAs: Rank | null;
}

export type Outcome = "FirstWins" | "SecondWins" | "Tie";

export interface ShowdownResult {
  outcome: Outcome;
  first: Evaluation;
  second: Evaluation;
}
