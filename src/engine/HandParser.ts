import { Card, FiveOf, Hand, Notation, Rank, Suit } from "../model/types.js";
import { HandError } from "./HandError.js";

export const HAND_SIZE = 5;
export const WILDCARD = "*";

// 10 は "10" と "T" の両方を受け付ける
const RANK_SYMBOLS: Readonly<Record<string, Rank | undefined>> = {
  "2": 2, "3": 3, "4": 4, "5": 5, "6": 6, "7": 7, "8": 8, "9": 9,
  T: 10, J: 11, Q: 12, K: 13, A: 14,
};

const SUIT_SYMBOLS: Readonly<Record<string, Suit | undefined>> = {
  H: "h", D: "d", C: "c", S: "s",
  "♥": "h", "♦": "d", "♣": "c", "♠": "s",
};

const DELIMITER = /[\s,]/;
const VARIATION_SELECTOR = /\uFE0F/g; // "♠️" の絵文字表示指定

// 大文字小文字を区別しないのは ASCII の英字だけ（"ſ" → "S" などを拾わない）
const fold = (ch: string): string => (/^[a-z]$/.test(ch) ? ch.toUpperCase() : ch);
const rankOf = (ch: string): Rank | undefined => RANK_SYMBOLS[fold(ch)];
const suitOf = (ch: string): Suit | undefined => SUIT_SYMBOLS[fold(ch)];

interface ScanState {
  cards: Card[];
  notation: Notation | null;
  wildcards: number;
}

function readRank(chars: string[], i: number): { rank: Rank; next: number } | null {
  if (chars[i] === "1" && chars[i + 1] === "0") return { rank: 10, next: i + 2 };
  const rank = rankOf(chars[i]);
  return rank === undefined ? null : { rank, next: i + 1 };
}

/** 次のカードの先頭になり得る文字か（= 直前のカードのスートではない） */
function startsCard(ch: string): boolean {
  return ch === WILDCARD || ch === "1" || rankOf(ch) !== undefined;
}

/** text を先頭から読んで st.cards に積む。読んだ枚数を返す */
function scan(text: string, input: string, st: ScanState): number {
  const chars = Array.from(text);
  const before = st.cards.length;

  let i = 0;
  while (i < chars.length) {
    const ch = chars[i];

    if (ch === WILDCARD) {
      st.wildcards++;
      if (st.wildcards > 1) {
        throw new HandError("MultipleWildcards", input, `expected at most one wildcard, hand: ${input}`);
      }
      st.cards.push({ wild: true });
      i++;
      continue;
    }

    const read = readRank(chars, i);
    if (!read) {
      throw new HandError("InvalidRankSymbol", input, `invalid rank symbol '${ch}', hand: ${input}`);
    }
    i = read.next;

    let suit: Suit | null = null;
    if (i < chars.length && !startsCard(chars[i])) {
      const found = suitOf(chars[i]);
      if (found === undefined) {
        throw new HandError("InvalidSuitSymbol", input, `invalid suit symbol '${chars[i]}', hand: ${input}`);
      }
      suit = found;
      i++;
    }

    const cardNotation: Notation = suit === null ? "rank-only" : "suited";
    if (st.notation !== null && st.notation !== cardNotation) {
      throw new HandError("InvalidSuitSymbol", input, `cannot mix suited and rank-only cards, hand: ${input}`);
    }
    st.notation = cardNotation;
    st.cards.push({ wild: false, rank: read.rank, suit });
  }

  return st.cards.length - before;
}

function isFive(cards: Card[]): cards is [Card, Card, Card, Card, Card] {
  return cards.length === HAND_SIZE;
}

/**
 * 手札文字列をパースして検証する。
 * "AsKsQsJsTs" のように続けて書くか、"As Ks Qs Js Ts" / "As,Ks,..." のように区切る。
 * 区切る場合は1トークン = カード1枚でなければならない。
 * スート付き表記とランクのみ表記（"AAAA3"）は1手の中で混在させられない。
 * デッキとの整合（同じカードが2枚ある等）は見ない。
 */
export function parseHand(input: string): Hand {
  const text = input.replace(VARIATION_SELECTOR, "").trim();
  const st: ScanState = { cards: [], notation: null, wildcards: 0 };

  if (DELIMITER.test(text)) {
    for (const token of text.split(/\s*,\s*|\s+/)) {
      const read = scan(token, input, st);
      if (read !== 1) {
        throw new HandError(
          "InvalidCardCount",
          input,
          `token '${token}' is not a single card, hand: ${input}`,
        );
      }
    }
  } else {
    scan(text, input, st);
  }

  const { cards } = st;
  if (!isFive(cards)) {
    throw new HandError(
      "InvalidCardCount",
      input,
      `expected ${HAND_SIZE} cards, got ${cards.length}, hand: ${input}`,
    );
  }

  const hand: FiveOf<Card> = cards;
  return {
    source: input,
    notation: st.notation ?? "rank-only",
    cards: hand,
    hasWildcard: st.wildcards === 1,
  };
}
