import { addCard, createHand, isBlackjack, isBust, bestTotal } from "./hand";
import { payout } from "./payout";
import { CardSource, GameResult, Hand, RoundEvent, RoundResult, Strategy } from "./types";

const DEALER_STANDS_ON = 17;

function naturalResult(player: Hand, dealer: Hand): GameResult | undefined {
  const playerBlackjack = isBlackjack(player);
  const dealerBlackjack = isBlackjack(dealer);
  if (playerBlackjack && dealerBlackjack) return "push";
  if (dealerBlackjack) return "dealerWin";
  if (playerBlackjack) return "playerBlackjack";
  return undefined;
}

function compareTotals(player: Hand, dealer: Hand): GameResult {
  const playerTotal = bestTotal(player);
  const dealerTotal = bestTotal(dealer);
  if (playerTotal > dealerTotal) {
    return player.doubled ? "doubledWin" : "playerWin";
  }
  if (playerTotal < dealerTotal) {
    return player.doubled ? "doubledLose" : "dealerWin";
  }
  return "push";
}

/**
 * Plays one round to completion against `source`. The player hand is driven
 * by `strategy`; the dealer draws to 17 and stands on any 17.
 */
export function playRound(source: CardSource, strategy: Strategy, bet: number): RoundResult {
  const events: RoundEvent[] = [];
  const playerHand = createHand();
  const dealerHand = createHand();

  const dealTo = (hand: Hand, target: "player" | "dealer") => {
    const card = source.dealOne();
    addCard(hand, card);
    events.push({ type: "deal", target, card });
    return card;
  };

  const finish = (result: GameResult): RoundResult => {
    playerHand.active = false;
    const delta = payout(result, bet);
    events.push({ type: "result", result, payout: delta });
    return { result, playerHand, dealerHand, payout: delta, events };
  };

  // initial deal
  dealTo(playerHand, "player");
  dealTo(dealerHand, "dealer");
  dealTo(playerHand, "player");
  dealTo(dealerHand, "dealer");

  const dealerUp = dealerHand.cards[0];

  const natural = naturalResult(playerHand, dealerHand);
  if (natural) {
    return finish(natural);
  }

  const opening = strategy.firstAction(playerHand, dealerUp);
  playerHand.firstActionPending = false;
  events.push({ type: "action", action: opening, phase: "first" });

  switch (opening) {
    case "D":
      dealTo(playerHand, "player");
      playerHand.doubled = true;
      playerHand.active = false;
      if (isBust(playerHand)) {
        return finish("doubledLose");
      }
      break;
    case "R":
      return finish("surrender");
    case "P":
      // One hand per round: a split recommendation is played as a stand.
      events.push({ type: "splitUnsupported" });
      playerHand.active = false;
      break;
    default:
      break;
  }

  while (playerHand.active) {
    const action = strategy.subsequentAction(playerHand, dealerUp);
    events.push({ type: "action", action, phase: "subsequent" });
    if (action === "H") {
      dealTo(playerHand, "player");
      if (isBust(playerHand)) {
        return finish("dealerWin");
      }
      continue;
    }
    playerHand.active = false;
  }

  while (bestTotal(dealerHand) < DEALER_STANDS_ON) {
    dealTo(dealerHand, "dealer");
    if (isBust(dealerHand)) {
      return finish("playerWin");
    }
  }

  return finish(compareTotals(playerHand, dealerHand));
}
