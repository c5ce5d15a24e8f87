export type Suit = 'S' | 'H' | 'D' | 'C';
export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14; // 11=J, 12=Q, 13=K, 14=A

export interface Card {
  readonly id: string;
  readonly r: Rank;
  readonly s: Suit;
}

// Ascending strength; index in HAND_CATEGORIES is the tie-break rank
export type HandCategory =
  | 'high-card'
  | 'pair'
  | 'two-pair'
  | 'three-of-a-kind'
  | 'straight'
  | 'flush'
  | 'full-house'
  | 'four-of-a-kind'
  | 'straight-flush'
  | 'royal-flush'
  | 'five-of-a-kind'
  | 'flush-house'
  | 'flush-five';

export interface HandResult {
  category: HandCategory;
  multiplier: number;
  ranks: Rank[]; // every played rank, highest first
}

export type StatusEffectKind = 'stun' | 'heal' | 'damage-buff' | 'shield' | 'damage-reduction' | 'poison';

export interface StatusEffect {
  kind: StatusEffectKind;
  magnitude: number; // heal/shield/poison: hit points; damage-buff/damage-reduction: percent
  remaining: number; // turns; 0 = instantaneous
  source: string;
}

export type Side = 'player' | 'enemy';
export type Role = 'attacker' | 'defender';

export interface Combatant {
  side: Side;
  name: string;
  health: number;
  maxHealth: number;
  defense: number;
  effects: StatusEffect[];
  turn: number;
}

export type CompanionModifier =
  | { type: 'probability'; factor: number }
  | { type: 'damage-ramp'; increment: number }
  | { type: 'discard-echo'; discardCount: number }
  | { type: 'flat-per-card'; amount: number }
  | { type: 'card-count-multiplier' }
  | { type: 'category-multiplier'; categories: HandCategory[]; factor: number }
  | { type: 'single-use-multiplier'; factor: number }
  | { type: 'extra-draw'; count: number };

export interface Companion {
  id: string;
  name: string;
  description: string;
  modifier: CompanionModifier;
}

export type TarotKey = 'sun' | 'moon' | 'tower';

export interface TarotCard {
  key: TarotKey;
  name: string;
  description: string;
}

export type Instruction =
  | { type: 'damage'; target: Role; amount: number; source: 'hand' | 'flush-five' }
  | { type: 'heal'; target: Role; amount: number }
  | { type: 'apply-effect'; target: Role; effect: StatusEffect }
  | { type: 'hand-mutation'; target: Role; mutation: { kind: 'add-card'; card: Card } }
  | { type: 'activate-items'; target: Role }
  | { type: 'discard-limit'; target: Role; delta: number }
  | { type: 'consume-companion'; companionId: string };

export type EnemyMove =
  | { type: 'attack'; damage: number }
  | { type: 'guard'; shield: number }
  | { type: 'afflict'; kind: StatusEffectKind; magnitude: number; duration: number };

export interface EnemyDefinition {
  name: string;
  maxHealth: number;
  defense: number;
  moves: EnemyMove[];
}

export type TurnPhase = 'player-turn-start' | 'player-action' | 'enemy-turn-start' | 'enemy-action' | 'combat-end';
export type CombatOutcome = 'none' | 'player-victory' | 'player-defeat';

export interface PlayerDeck {
  drawPile: Card[];
  hand: Card[];
  discardPile: Card[];
  lastDiscard: Card[] | null;
  discardsLeft: number;
  maxDiscards: number;
}

export type CombatEvent =
  | { type: 'turn-started'; side: Side; turn: number }
  | { type: 'poison-ticked'; side: Side; amount: number; health: number }
  | { type: 'effect-expired'; side: Side; effect: StatusEffect }
  | { type: 'stun-consumed'; side: Side }
  | { type: 'cards-drawn'; cards: Card[] }
  | { type: 'deck-reshuffled'; count: number }
  | { type: 'deck-exhausted'; missing: number }
  | { type: 'cards-discarded'; cards: Card[]; discardsLeft: number }
  | { type: 'hand-played'; cards: Card[]; category: HandCategory; multiplier: number }
  | { type: 'damage-dealt'; target: Side; incoming: number; absorbed: number; reduced: number; dealt: number; health: number }
  | { type: 'healed'; side: Side; amount: number; health: number }
  | { type: 'effect-applied'; side: Side; effect: StatusEffect }
  | { type: 'hand-mutated'; card: Card }
  | { type: 'item-activated'; item: TarotCard }
  | { type: 'discard-limit-changed'; maxDiscards: number }
  | { type: 'companion-consumed'; companionId: string }
  | { type: 'enemy-moved'; move: EnemyMove }
  | { type: 'turn-passed'; side: Side }
  | { type: 'combat-ended'; outcome: Exclude<CombatOutcome, 'none'> };
