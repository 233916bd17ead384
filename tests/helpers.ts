import { Card, Rank, Shoe, Suit, createCard } from "../core";

const SUIT_CODES: Record<string, Suit> = { H: "hearts", D: "diamonds", C: "clubs", S: "spades" };
const RANK_CODES: Record<string, Rank> = { A: 1, J: 11, Q: 12, K: 13 };

function isRank(value: number): value is Rank {
  return Number.isInteger(value) && value >= 1 && value <= 13;
}

/** `c("10S")`, `c("AH")`, `c("QD")`. */
export function c(code: string): Card {
  const suit = SUIT_CODES[code.slice(-1)];
  const label = code.slice(0, -1);
  const rank = RANK_CODES[label] ?? Number(label);
  if (suit === undefined || !isRank(rank)) {
    throw new Error(`bad card code ${code}`);
  }
  return createCard(rank, suit);
}

export function cards(...codes: string[]): Card[] {
  return codes.map(c);
}

/** Deals `codes` in the order given: player, dealer, player, dealer, then draws. */
export function stacked(...codes: string[]): Shoe {
  return Shoe.fromCards(cards(...codes).reverse());
}

/** Like `stacked`, with a full pack underneath so the shoe stays above the reshuffle threshold. */
export function stackedWithReserve(...codes: string[]): Shoe {
  return Shoe.fromCards([...Shoe.build(1).cards(), ...cards(...codes).reverse()]);
}
