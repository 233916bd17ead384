import { Card, Rank, Suit } from "./types";

export const SUITS: readonly Suit[] = ["hearts", "diamonds", "clubs", "spades"];

export const RANKS: readonly Rank[] = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13];

const SUIT_SYMBOLS: Record<Suit, string> = {
  hearts: "♥",
  diamonds: "♦",
  clubs: "♣",
  spades: "♠",
};

const FACE_LABELS: Partial<Record<Rank, string>> = {
  1: "A",
  11: "J",
  12: "Q",
  13: "K",
};

export function createCard(rank: Rank, suit: Suit): Card {
  return Object.freeze({ rank, suit });
}

export function cardValue(card: Card): number {
  if (card.rank === 1) return 11;
  if (card.rank >= 11) return 10;
  return card.rank;
}

export function isAce(card: Card): boolean {
  return card.rank === 1;
}

export function cardName(card: Card): string {
  const label = FACE_LABELS[card.rank] ?? String(card.rank);
  return `${label}${SUIT_SYMBOLS[card.suit]}`;
}
