import type {
  Card,
  CombatEvent,
  CombatOutcome,
  Combatant,
  Companion,
  EnemyDefinition,
  EnemyMove,
  Instruction,
  PlayerDeck,
  Side,
  TarotCard,
  TarotKey,
  TurnPhase
} from './types';
import { makeDeck, shuffle, drawCards, findDuplicateCards, findCard, formatCard } from './deck';
import { classify, MAX_HAND_SIZE } from './evaluation';
import { resolveAbility } from './abilities';
import { extraDraws } from './companions';
import { activateTarot } from './tarot';
import { scriptedMove } from './enemies';
import {
  applyEffect,
  boostOutgoing,
  consumeStun,
  createEffect,
  heal,
  takeDamage,
  tickEffects
} from './effects';
import { resolveRules, type CombatRules, type RuleOverrides } from './config';
import { createRandomSource, type RandomSource } from './random';
import { ok, fail, type Result } from './errors';
import logger from '../logger';

export interface CombatConfig {
  enemy: EnemyDefinition;
  playerName?: string;
  playerMaxHealth?: number;
  deck?: Card[];
  shuffleDeck?: boolean;
  companions?: Companion[];
  items?: TarotCard[];
  rng?: RandomSource;
  seed?: string;
  rules?: RuleOverrides;
}

export interface CombatSession {
  player: Combatant;
  enemy: Combatant;
  enemyDefinition: EnemyDefinition;
  companions: Companion[];
  items: TarotCard[];
  deck: PlayerDeck;
  phase: TurnPhase;
  outcome: CombatOutcome;
  pendingBonus: number; // flat damage waiting for the player's next hand
  echoes: number;
  rules: CombatRules;
  rng: RandomSource;
  events: CombatEvent[];
}

export type TurnResult = Result<CombatEvent[]>;

export const DEFAULT_PLAYER_HEALTH = 100;

function makeCombatant(side: Side, name: string, maxHealth: number, defense: number): Combatant {
  return { side, name, health: maxHealth, maxHealth, defense, effects: [], turn: 0 };
}

// Rules that end up as effect magnitudes
const EFFECT_RULES = ['straightBuffPercent', 'flushShield', 'fullHouseReductionPercent', 'selfPoisonRatio'] as const;

function checkRules(rules: CombatRules): Result<null> {
  const negative = EFFECT_RULES.find(key => rules[key] < 0);
  if (negative) {
    return fail('NegativeMagnitudeEffect', `Rule ${negative} is ${rules[negative]}`);
  }
  return ok(null);
}

function checkMove(move: EnemyMove): Result<null> {
  switch (move.type) {
    case 'attack':
      return move.damage < 0
        ? fail('NegativeMagnitudeEffect', `Attack damage ${move.damage} is negative`)
        : ok(null);
    case 'guard':
      return move.shield < 0
        ? fail('NegativeMagnitudeEffect', `Guard shield ${move.shield} is negative`)
        : ok(null);
    case 'afflict':
      return move.magnitude < 0 || move.duration < 0
        ? fail('NegativeMagnitudeEffect', `${move.kind} affliction has magnitude ${move.magnitude} for ${move.duration} turns`)
        : ok(null);
  }
}

export function createCombatSession(config: CombatConfig): Result<CombatSession> {
  const rules = resolveRules(config.rules);
  const rng = config.rng ?? createRandomSource(config.seed);
  const cards = config.deck ?? makeDeck();

  const duplicates = findDuplicateCards(cards);
  if (duplicates.length > 0) {
    return fail('InvalidDeck', `Deck contains duplicate cards: ${duplicates.map(formatCard).join(' ')}`);
  }
  const rulesChecked = checkRules(rules);
  if (!rulesChecked.ok) return rulesChecked;
  for (const move of config.enemy.moves) {
    const moveChecked = checkMove(move);
    if (!moveChecked.ok) return moveChecked;
  }

  const session: CombatSession = {
    player: makeCombatant('player', config.playerName ?? 'Player', config.playerMaxHealth ?? DEFAULT_PLAYER_HEALTH, 0),
    enemy: makeCombatant('enemy', config.enemy.name, config.enemy.maxHealth, config.enemy.defense),
    enemyDefinition: config.enemy,
    companions: [...(config.companions ?? [])],
    items: [...(config.items ?? [])],
    deck: {
      drawPile: config.shuffleDeck === false ? [...cards] : shuffle(cards, rng),
      hand: [],
      discardPile: [],
      lastDiscard: null,
      discardsLeft: rules.discardsPerTurn,
      maxDiscards: rules.discardsPerTurn
    },
    phase: 'player-turn-start',
    outcome: 'none',
    pendingBonus: 0,
    echoes: 0,
    rules,
    rng,
    events: []
  };

  logger.debug('Combat session created', { enemy: config.enemy.name, companions: session.companions.map(c => c.id) });
  return ok(session);
}

export function isTerminal(session: CombatSession): boolean {
  return session.phase === 'combat-end';
}

function emit(session: CombatSession, event: CombatEvent): void {
  session.events.push(event);
}

function eventsSince(session: CombatSession, mark: number): TurnResult {
  return ok(session.events.slice(mark));
}

function rejectUnlessPhase(session: CombatSession, phase: TurnPhase, action: string): TurnResult | null {
  if (session.phase === phase) return null;
  const reason = isTerminal(session)
    ? `Cannot ${action}: combat is over (${session.outcome})`
    : `Cannot ${action} during ${session.phase}`;
  logger.warn('Rejected combat action', { action, phase: session.phase });
  return fail('IllegalStateTransition', reason);
}

function endCombat(session: CombatSession, outcome: Exclude<CombatOutcome, 'none'>): void {
  session.outcome = outcome;
  session.phase = 'combat-end';
  emit(session, { type: 'combat-ended', outcome });
  logger.info('Combat ended', { outcome, enemy: session.enemy.name, playerTurns: session.player.turn });
}

// Ends combat if either side is down; the enemy falling first wins ties
function checkOutcome(session: CombatSession): boolean {
  if (session.enemy.health <= 0) {
    endCombat(session, 'player-victory');
    return true;
  }
  if (session.player.health <= 0) {
    endCombat(session, 'player-defeat');
    return true;
  }
  return false;
}

function runTick(session: CombatSession, combatant: Combatant): void {
  const report = tickEffects(combatant);
  if (report.poison > 0) {
    emit(session, { type: 'poison-ticked', side: combatant.side, amount: report.poison, health: combatant.health });
  }
  for (const effect of report.expired) {
    emit(session, { type: 'effect-expired', side: combatant.side, effect });
  }
}

function drawIntoHand(session: CombatSession, count: number): void {
  const { deck, rules } = session;
  if (count <= 0) return;

  if (deck.drawPile.length < count && rules.reshuffleDiscards && deck.discardPile.length > 0) {
    deck.drawPile = [...deck.drawPile, ...shuffle(deck.discardPile, session.rng)];
    emit(session, { type: 'deck-reshuffled', count: deck.discardPile.length });
    deck.discardPile = [];
  }

  const result = drawCards(deck.drawPile, count);
  if (!result.ok) {
    logger.warn('Draw failed', { error: result.error, missing: count });
    emit(session, { type: 'deck-exhausted', missing: count });
    return;
  }

  deck.drawPile = result.value.remaining;
  deck.hand.push(...result.value.drawn);
  emit(session, { type: 'cards-drawn', cards: result.value.drawn });
  if (result.value.drawn.length < count) {
    emit(session, { type: 'deck-exhausted', missing: count - result.value.drawn.length });
  }
}

function refillHand(session: CombatSession): void {
  const target = session.rules.handSize + extraDraws(session.companions);
  drawIntoHand(session, target - session.deck.hand.length);
}

// Every selected card must be a distinct card from the hand
function checkSelection(hand: Card[], cards: Card[]): Result<null> {
  const seen = new Set<number>();
  for (const card of cards) {
    const idx = findCard(hand, card);
    if (idx < 0 || seen.has(idx)) {
      return fail('CardNotInHand', `${formatCard(card)} is not in hand`);
    }
    seen.add(idx);
  }
  return ok(null);
}

function removeFromHand(deck: PlayerDeck, cards: Card[]): Card[] {
  const removed: Card[] = [];
  for (const card of cards) {
    const idx = findCard(deck.hand, card);
    if (idx >= 0) removed.push(...deck.hand.splice(idx, 1));
  }
  return removed;
}

export function beginPlayerTurn(session: CombatSession): TurnResult {
  const rejected = rejectUnlessPhase(session, 'player-turn-start', 'begin the player turn');
  if (rejected) return rejected;
  const mark = session.events.length;
  const { player } = session;

  runTick(session, player);
  if (checkOutcome(session)) return eventsSince(session, mark);

  player.turn += 1;
  emit(session, { type: 'turn-started', side: 'player', turn: player.turn });

  // A stunned player skips the whole action phase
  if (consumeStun(player)) {
    emit(session, { type: 'stun-consumed', side: 'player' });
    session.phase = 'enemy-turn-start';
    logger.debug('Player turn skipped by stun', { turn: player.turn });
    return eventsSince(session, mark);
  }

  session.deck.discardsLeft = session.deck.maxDiscards;
  refillHand(session);

  session.phase = 'player-action';
  logger.debug('Player turn started', { turn: player.turn, hand: session.deck.hand.map(formatCard) });
  return eventsSince(session, mark);
}

// Starts the player turn first when the caller skipped it. A turn that ends
// before the action phase (stun, poison defeat) is returned as is.
function enterPlayerAction(session: CombatSession): TurnResult | null {
  if (session.phase !== 'player-turn-start') return null;
  const started = beginPlayerTurn(session);
  if (!started.ok || session.phase !== 'player-action') return started;
  return null;
}

function applyInstructions(session: CombatSession, actor: Combatant, opponent: Combatant, instructions: Instruction[]): void {
  const pick = (role: 'attacker' | 'defender') => (role === 'attacker' ? actor : opponent);

  for (const instruction of instructions) {
    switch (instruction.type) {
      case 'damage': {
        const target = pick(instruction.target);
        const amount = instruction.source === 'hand'
          ? boostOutgoing(actor, instruction.amount).amount
          : instruction.amount;
        const report = takeDamage(target, amount);
        emit(session, { type: 'damage-dealt', target: target.side, ...report, health: target.health });
        break;
      }
      case 'heal': {
        const target = pick(instruction.target);
        const amount = heal(target, instruction.amount);
        emit(session, { type: 'healed', side: target.side, amount, health: target.health });
        break;
      }
      case 'apply-effect': {
        const target = pick(instruction.target);
        const applied = applyEffect(target, instruction.effect);
        if (applied.stored) {
          emit(session, { type: 'effect-applied', side: target.side, effect: instruction.effect });
        } else {
          emit(session, { type: 'healed', side: target.side, amount: applied.healed, health: target.health });
        }
        break;
      }
      case 'hand-mutation': {
        if (pick(instruction.target).side !== 'player') break;
        session.echoes += 1;
        const source = instruction.mutation.card;
        const copy: Card = { id: `${source.id}~${session.echoes}`, r: source.r, s: source.s };
        session.deck.hand.push(copy);
        emit(session, { type: 'hand-mutated', card: copy });
        break;
      }
      case 'activate-items': {
        const owner = pick(instruction.target);
        if (owner.side !== 'player') break;
        const items = session.items;
        session.items = [];
        items.forEach(item => useTarot(session, item));
        break;
      }
      case 'discard-limit': {
        if (pick(instruction.target).side !== 'player') break;
        session.deck.maxDiscards += instruction.delta;
        session.deck.discardsLeft += instruction.delta;
        emit(session, { type: 'discard-limit-changed', maxDiscards: session.deck.maxDiscards });
        break;
      }
      case 'consume-companion': {
        const idx = session.companions.findIndex(c => c.id === instruction.companionId);
        if (idx >= 0) {
          session.companions.splice(idx, 1);
          emit(session, { type: 'companion-consumed', companionId: instruction.companionId });
        }
        break;
      }
    }
  }
}

function useTarot(session: CombatSession, item: TarotCard): void {
  const outcome = activateTarot(item, session.player);
  session.pendingBonus += outcome.bonusDamage;
  emit(session, { type: 'item-activated', item });
  if (outcome.healed > 0) {
    emit(session, { type: 'healed', side: 'player', amount: outcome.healed, health: session.player.health });
  }
}

/**
 * Plays 1..5 cards from the player's hand as this turn's action.
 *
 * Called before the turn has begun, this begins it first. If a stun skips
 * that turn, the skipped turn's events come back and the cards are not played.
 */
export function submitPlayerAction(session: CombatSession, cards: Card[]): TurnResult {
  const mark = session.events.length;
  const entered = enterPlayerAction(session);
  if (entered) return entered;
  const rejected = rejectUnlessPhase(session, 'player-action', 'play a hand');
  if (rejected) return rejected;

  const classified = classify(cards, { rules: session.rules });
  if (!classified.ok) return classified;
  const selection = checkSelection(session.deck.hand, cards);
  if (!selection.ok) return selection;

  const { player, enemy, deck } = session;
  const instructions = resolveAbility(classified.value, player, enemy, session.companions, session.rng, {
    rules: session.rules,
    lastDiscard: deck.lastDiscard,
    bonusDamage: session.pendingBonus
  });
  session.pendingBonus = 0;
  deck.lastDiscard = null;

  const played = removeFromHand(deck, cards);
  deck.discardPile.push(...played);
  emit(session, {
    type: 'hand-played',
    cards: played,
    category: classified.value.category,
    multiplier: classified.value.multiplier
  });
  logger.debug('Hand resolved', { category: classified.value.category, instructions: instructions.length });

  applyInstructions(session, player, enemy, instructions);
  if (!checkOutcome(session)) {
    session.phase = 'enemy-turn-start';
  }
  return eventsSince(session, mark);
}

// Discards count against a per-turn limit and draw replacements straight away
export function discardCards(session: CombatSession, cards: Card[]): TurnResult {
  const mark = session.events.length;
  const entered = enterPlayerAction(session);
  if (entered) return entered;
  const rejected = rejectUnlessPhase(session, 'player-action', 'discard');
  if (rejected) return rejected;

  const { deck } = session;
  if (cards.length === 0 || cards.length > MAX_HAND_SIZE) {
    return fail('InvalidHandSize', `Discard 1-${MAX_HAND_SIZE} cards, got ${cards.length}`);
  }
  if (deck.discardsLeft <= 0) {
    return fail('DiscardLimitReached', 'No discards left this turn');
  }
  const selection = checkSelection(deck.hand, cards);
  if (!selection.ok) return selection;

  const discarded = removeFromHand(deck, cards);
  deck.discardPile.push(...discarded);
  deck.lastDiscard = discarded;
  deck.discardsLeft -= 1;
  emit(session, { type: 'cards-discarded', cards: discarded, discardsLeft: deck.discardsLeft });

  drawIntoHand(session, discarded.length);
  return eventsSince(session, mark);
}

export function useItem(session: CombatSession, key: TarotKey): TurnResult {
  const mark = session.events.length;
  const entered = enterPlayerAction(session);
  if (entered) return entered;
  const rejected = rejectUnlessPhase(session, 'player-action', 'use an item');
  if (rejected) return rejected;

  const idx = session.items.findIndex(item => item.key === key);
  if (idx < 0) {
    return fail('UnknownItem', `No ${key} card in the inventory`);
  }
  const [item] = session.items.splice(idx, 1);
  useTarot(session, item);
  return eventsSince(session, mark);
}

export function passTurn(session: CombatSession): TurnResult {
  const mark = session.events.length;
  const entered = enterPlayerAction(session);
  if (entered) return entered;
  const rejected = rejectUnlessPhase(session, 'player-action', 'pass');
  if (rejected) return rejected;

  emit(session, { type: 'turn-passed', side: 'player' });
  session.phase = 'enemy-turn-start';
  return eventsSince(session, mark);
}

function performEnemyMove(session: CombatSession, move: EnemyMove): void {
  const { player, enemy, rules } = session;
  emit(session, { type: 'enemy-moved', move });

  switch (move.type) {
    case 'attack': {
      const report = takeDamage(player, boostOutgoing(enemy, move.damage).amount);
      emit(session, { type: 'damage-dealt', target: 'player', ...report, health: player.health });
      break;
    }
    case 'guard': {
      const effect = createEffect('shield', move.shield, rules.durations.shield, enemy.name);
      applyEffect(enemy, effect);
      emit(session, { type: 'effect-applied', side: 'enemy', effect });
      break;
    }
    case 'afflict': {
      const effect = createEffect(move.kind, move.magnitude, move.duration, enemy.name);
      const applied = applyEffect(player, effect);
      if (applied.stored) {
        emit(session, { type: 'effect-applied', side: 'player', effect });
      } else {
        emit(session, { type: 'healed', side: 'player', amount: applied.healed, health: player.health });
      }
      break;
    }
  }
}

/**
 * Runs the enemy's whole turn: tick, stun check, then its move. The move is
 * taken from the enemy's script unless the caller supplies one.
 */
export function advanceEnemyTurn(session: CombatSession, move?: EnemyMove): TurnResult {
  const rejected = rejectUnlessPhase(session, 'enemy-turn-start', 'advance the enemy turn');
  if (rejected) return rejected;
  if (move) {
    const moveChecked = checkMove(move);
    if (!moveChecked.ok) return moveChecked;
  }
  const mark = session.events.length;
  const { enemy } = session;

  runTick(session, enemy);
  if (checkOutcome(session)) return eventsSince(session, mark);

  enemy.turn += 1;
  emit(session, { type: 'turn-started', side: 'enemy', turn: enemy.turn });
  session.phase = 'enemy-action';

  if (consumeStun(enemy)) {
    emit(session, { type: 'stun-consumed', side: 'enemy' });
    session.phase = 'player-turn-start';
    return eventsSince(session, mark);
  }

  const next = move ?? scriptedMove(session.enemyDefinition, enemy.turn);
  if (next) {
    performEnemyMove(session, next);
  }

  if (!checkOutcome(session)) {
    session.phase = 'player-turn-start';
  }
  return eventsSince(session, mark);
}
