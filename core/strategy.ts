import { cardValue } from "./card";
import { bestTotal, handTotal, isPair } from "./hand";
import { Action, Card, Hand, Strategy } from "./types";

interface TotalRule {
  totals: number[];
  dealer: (d: number) => boolean;
  action: Action;
}

const between = (lo: number, hi: number) => (d: number) => d >= lo && d <= hi;
const always = () => true;

const softDoubles: TotalRule[] = [
  { totals: [19], dealer: (d) => d === 6, action: "D" },
  { totals: [18], dealer: (d) => d <= 6, action: "D" },
  { totals: [17], dealer: between(3, 6), action: "D" },
  { totals: [16, 15], dealer: between(4, 6), action: "D" },
  { totals: [14, 13], dealer: between(5, 6), action: "D" },
];

const pairSplits: TotalRule[] = [
  { totals: [18], dealer: (d) => d < 7 || d >= 10, action: "P" },
  { totals: [16], dealer: always, action: "P" },
  { totals: [14], dealer: (d) => d <= 7, action: "P" },
  { totals: [12], dealer: between(3, 7), action: "P" },
  { totals: [6, 4], dealer: between(4, 7), action: "P" },
];

const hardOpenings: TotalRule[] = [
  { totals: [16], dealer: between(9, 11), action: "R" },
  { totals: [15], dealer: (d) => d === 10, action: "R" },
  { totals: [11], dealer: always, action: "D" },
  { totals: [10], dealer: (d) => d < 10, action: "D" },
  { totals: [9], dealer: between(3, 6), action: "D" },
];

function match(rules: TotalRule[], total: number, dealer: number): Action | undefined {
  const rule = rules.find((r) => r.totals.includes(total) && r.dealer(dealer));
  return rule?.action;
}

/**
 * Rule-table basic strategy. The opening decision may double, split or
 * surrender; later decisions only hit or stand.
 */
export class BasicStrategy implements Strategy {
  readonly name = "basic";

  firstAction(hand: Hand, dealerUp: Card): Action {
    const dealer = cardValue(dealerUp);
    const { total, soft } = handTotal(hand);
    const pair = isPair(hand);

    if (soft) {
      if (pair && hand.cards[0].rank === 1) return "P";
      const action = match(softDoubles, total, dealer);
      if (action) return action;
    }
    if (pair) {
      const action = match(pairSplits, total, dealer);
      if (action) return action;
    }
    if (!soft) {
      const action = match(hardOpenings, total, dealer);
      if (action) return action;
    }
    return "S";
  }

  subsequentAction(hand: Hand, dealerUp: Card): Action {
    const dealer = cardValue(dealerUp);
    const { total, soft } = handTotal(hand);

    if (soft) {
      if (total <= 17) return "H";
      if (total === 18 && dealer >= 9) return "H";
    }
    if (!soft && total <= 11) return "H";
    if (total === 12 && (dealer < 4 || dealer > 6)) return "H";
    if (total >= 13 && total <= 16 && dealer >= 7) return "H";
    return "S";
  }
}

/** Plays the player's hand the way the dealer plays: draw to 17, never double, split or surrender. */
export class DealerMimicStrategy implements Strategy {
  readonly name = "mimic-dealer";

  firstAction(): Action {
    return "S";
  }

  subsequentAction(hand: Hand): Action {
    return bestTotal(hand) < 17 ? "H" : "S";
  }
}
