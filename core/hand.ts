import { cardName, cardValue, isAce } from "./card";
import { Card, Hand } from "./types";

export interface HandTotal {
  total: number;
  soft: boolean;
}

export function createHand(): Hand {
  return {
    cards: [],
    doubled: false,
    split: false,
    firstActionPending: true,
    active: true,
  };
}

export function addCard(hand: Hand, card: Card): void {
  hand.cards.push(card);
}

/**
 * Aces start at 11 and drop to 1, one at a time, while the hand is over 21.
 * `soft` is set when an Ace is still counted high.
 */
export function handTotal(hand: Hand): HandTotal {
  let total = 0;
  let aces = 0;
  for (const card of hand.cards) {
    total += cardValue(card);
    if (isAce(card)) aces += 1;
  }
  while (total > 21 && aces > 0) {
    total -= 10;
    aces -= 1;
  }
  return { total, soft: aces > 0 && total <= 21 };
}

export function bestTotal(hand: Hand): number {
  return handTotal(hand).total;
}

export function isSoft(hand: Hand): boolean {
  return handTotal(hand).soft;
}

export function isBust(hand: Hand): boolean {
  return bestTotal(hand) > 21;
}

export function isBlackjack(hand: Hand): boolean {
  return hand.cards.length === 2 && bestTotal(hand) === 21;
}

export function isPair(hand: Hand): boolean {
  return hand.cards.length === 2 && hand.cards[0].rank === hand.cards[1].rank;
}

export function describeHand(hand: Hand): string {
  return hand.cards.map(cardName).join(", ");
}
