export type Suit = "hearts" | "diamonds" | "clubs" | "spades";

export type Rank = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13;

export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

export interface Hand {
  cards: Card[];
  doubled: boolean;
  split: boolean; // reserved: splitting is not played
  firstActionPending: boolean;
  active: boolean;
}

export type Action = "H" | "S" | "D" | "P" | "R";

export type GameResult =
  | "playerWin"
  | "dealerWin"
  | "push"
  | "playerBlackjack"
  | "surrender"
  | "doubledWin"
  | "doubledLose";

export interface Strategy {
  readonly name: string;
  firstAction(hand: Hand, dealerUp: Card): Action;
  subsequentAction(hand: Hand, dealerUp: Card): Action;
}

export interface CardSource {
  dealOne(): Card;
}

export type RoundEvent =
  | { type: "shuffle" }
  | { type: "deal"; target: "player" | "dealer"; card: Card }
  | { type: "action"; action: Action; phase: "first" | "subsequent" }
  | { type: "splitUnsupported" }
  | { type: "result"; result: GameResult; payout: number };

export interface RoundResult {
  result: GameResult;
  playerHand: Hand;
  dealerHand: Hand;
  payout: number;
  events: RoundEvent[];
}

export interface TableConfig {
  bet: number;
  initialBankroll: number;
  logFile: string;
  seed?: number;
  logLevel: string;
}

export interface SessionSnapshot {
  lastResult: GameResult | null;
  bankroll: number;
  betAmount: number;
  gamesPlayed: number;
  wins: number;
  losses: number;
  pushes: number;
}

export interface BatchSummary {
  played: number;
  stoppedForFunds: boolean;
  net: number;
  evPerRound: number;
  stdevPerRound: number;
}
