import { describe, test, expect } from 'vitest';
import {
  createCombatSession,
  beginPlayerTurn,
  submitPlayerAction,
  discardCards,
  useItem,
  passTurn,
  advanceEnemyTurn,
  type CombatConfig,
  type CombatSession
} from './combat';
import { COMPANION_CATALOG } from './companions';
import { TAROT_CATALOG } from './tarot';
import { createEffect } from './effects';
import { sequenceSource } from './random';
import type { Result } from './errors';
import { hand } from './testHelpers';
import type { Card, EnemyDefinition } from './types';

const goblin: EnemyDefinition = { name: 'Goblin', maxHealth: 50, defense: 0, moves: [{ type: 'attack', damage: 10 }] };
const golem: EnemyDefinition = { name: 'Golem', maxHealth: 500, defense: 0, moves: [{ type: 'attack', damage: 5 }] };

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

function startSession(deck: Card[], config: Partial<CombatConfig> = {}): CombatSession {
  return unwrap(createCombatSession({
    enemy: goblin,
    deck,
    shuffleDeck: false,
    rng: sequenceSource([0.99]),
    rules: { handSize: 5 },
    ...config
  }));
}

function errorKind<T>(result: Result<T>): string | null {
  return result.ok ? null : result.error.kind;
}

describe('createCombatSession', () => {
  test('starts both sides at full health before the first turn', () => {
    const session = startSession(hand('2C', '3C'));
    expect(session.phase).toBe('player-turn-start');
    expect(session.outcome).toBe('none');
    expect(session.player.health).toBe(100);
    expect(session.enemy).toMatchObject({ name: 'Goblin', health: 50, turn: 0 });
  });

  test('rejects a deck holding the same card twice', () => {
    const result = createCombatSession({ enemy: goblin, deck: hand('2C', '3C', '2C') });
    expect(errorKind(result)).toBe('InvalidDeck');
  });

  test('rejects an enemy script with a negative shield', () => {
    const result = createCombatSession({ enemy: { ...goblin, moves: [{ type: 'guard', shield: -5 }] } });
    expect(errorKind(result)).toBe('NegativeMagnitudeEffect');
  });

  test('rejects an affliction with a negative duration', () => {
    const result = createCombatSession({
      enemy: { ...goblin, moves: [{ type: 'afflict', kind: 'poison', magnitude: 3, duration: -1 }] }
    });
    expect(errorKind(result)).toBe('NegativeMagnitudeEffect');
  });

  test('rejects rules that would build negative effects', () => {
    const result = createCombatSession({ enemy: goblin, rules: { flushShield: -1 } });
    expect(errorKind(result)).toBe('NegativeMagnitudeEffect');
  });

  test('deals the same opening hand for the same seed', () => {
    const a = unwrap(createCombatSession({ enemy: goblin, seed: 'test-seed' }));
    const b = unwrap(createCombatSession({ enemy: goblin, seed: 'test-seed' }));
    unwrap(beginPlayerTurn(a));
    unwrap(beginPlayerTurn(b));
    expect(a.deck.hand.length).toBe(8);
    expect(a.deck.hand.map(c => c.id)).toEqual(b.deck.hand.map(c => c.id));
  });
});

describe('submitPlayerAction', () => {
  test('a full house kills a 50 HP enemy and leaves the player damage reduction', () => {
    const session = startSession(hand('2C', '2D', '7S', '7H', '7D', '9S'));
    const events = unwrap(submitPlayerAction(session, hand('2C', '2D', '7S', '7H', '7D')));

    expect(events).toEqual([
      { type: 'turn-started', side: 'player', turn: 1 },
      { type: 'cards-drawn', cards: hand('2C', '2D', '7S', '7H', '7D') },
      { type: 'hand-played', cards: hand('2C', '2D', '7S', '7H', '7D'), category: 'full-house', multiplier: 7 },
      { type: 'damage-dealt', target: 'enemy', incoming: 175, absorbed: 0, reduced: 0, dealt: 50, health: 0 },
      {
        type: 'effect-applied',
        side: 'player',
        effect: { kind: 'damage-reduction', magnitude: 30, remaining: 3, source: 'full-house' }
      },
      { type: 'combat-ended', outcome: 'player-victory' }
    ]);
    expect(session.outcome).toBe('player-victory');
    expect(session.phase).toBe('combat-end');
    expect(session.player.effects).toEqual([
      { kind: 'damage-reduction', magnitude: 30, remaining: 3, source: 'full-house' }
    ]);
  });

  test('every action is refused once combat is over', () => {
    const session = startSession(hand('2C', '2D', '7S', '7H', '7D', '9S'));
    unwrap(submitPlayerAction(session, hand('2C', '2D', '7S', '7H', '7D')));

    expect(errorKind(submitPlayerAction(session, hand('9S')))).toBe('IllegalStateTransition');
    expect(errorKind(discardCards(session, hand('9S')))).toBe('IllegalStateTransition');
    expect(errorKind(passTurn(session))).toBe('IllegalStateTransition');
    expect(errorKind(advanceEnemyTurn(session))).toBe('IllegalStateTransition');
    expect(session.events.filter(e => e.type === 'combat-ended').length).toBe(1);
  });

  test('rejects hands of the wrong size', () => {
    const session = startSession(hand('2C', '3D', '5S', '7H', '9D', 'JC'), { rules: { handSize: 6 } });
    expect(errorKind(submitPlayerAction(session, []))).toBe('InvalidHandSize');
    expect(errorKind(submitPlayerAction(session, hand('2C', '3D', '5S', '7H', '9D', 'JC')))).toBe('InvalidHandSize');
    expect(session.phase).toBe('player-action');
    expect(session.deck.hand.length).toBe(6);
  });

  test('rejects cards that are not in hand', () => {
    const session = startSession(hand('2C', '3D', '5S', '7H', '9D', 'AS'));
    expect(errorKind(submitPlayerAction(session, hand('AS')))).toBe('CardNotInHand');
    expect(errorKind(submitPlayerAction(session, hand('2C', '2C')))).toBe('CardNotInHand');
    expect(session.enemy.health).toBe(50);
  });

  test('a stunned player loses the turn before drawing', () => {
    const session = startSession(hand('8S', '8H', '3C', '4D', '6C'));
    session.player.effects.push(createEffect('stun', 0, 1, 'test'));

    const events = unwrap(submitPlayerAction(session, hand('8S', '8H')));
    expect(events).toEqual([
      { type: 'turn-started', side: 'player', turn: 1 },
      { type: 'stun-consumed', side: 'player' }
    ]);
    expect(session.phase).toBe('enemy-turn-start');
    expect(session.deck.hand).toEqual([]);
    expect(session.deck.drawPile.length).toBe(5);
    expect(session.enemy.health).toBe(50);
    expect(session.player.effects).toEqual([]);
  });

  test('enemy defense lowers each hit', () => {
    const session = startSession(hand('8S', '8H', '3C', '4D', '6C'), { enemy: { ...goblin, defense: 2 } });
    const events = unwrap(submitPlayerAction(session, hand('8S', '8H')));
    expect(events).toContainEqual({ type: 'damage-dealt', target: 'enemy', incoming: 32, absorbed: 0, reduced: 2, dealt: 30, health: 20 });
  });

  test('a straight buffs the next hand', () => {
    const session = startSession(hand('3S', '4H', '5D', '6C', '7S', '9S', '2D', '2H', 'KC', 'QC'), { enemy: golem });
    unwrap(submitPlayerAction(session, hand('3S', '4H', '5D', '6C', '7S')));
    expect(session.enemy.health).toBe(375); // 25 * 5

    unwrap(advanceEnemyTurn(session));
    unwrap(submitPlayerAction(session, hand('9S')));
    expect(session.enemy.health).toBe(364); // 9 * 1.3 = 11
    expect(session.player.effects).toEqual([]);
  });

  test('four of a kind fires every carried tarot card', () => {
    const session = startSession(hand('10S', '10H', '10D', '10C', '2S'), {
      enemy: golem,
      items: [TAROT_CATALOG.moon, TAROT_CATALOG.sun]
    });
    session.player.health = 80;

    const events = unwrap(submitPlayerAction(session, hand('10S', '10H', '10D', '10C')));
    expect(events.slice(3)).toEqual([
      { type: 'damage-dealt', target: 'enemy', incoming: 320, absorbed: 0, reduced: 0, dealt: 320, health: 180 },
      { type: 'item-activated', item: TAROT_CATALOG.moon },
      { type: 'healed', side: 'player', amount: 10, health: 90 },
      { type: 'item-activated', item: TAROT_CATALOG.sun }
    ]);
    expect(session.items).toEqual([]);
    expect(session.pendingBonus).toBe(5);
  });

  test('a straight flush grants one more discard', () => {
    const session = startSession(hand('6D', '7D', '8D', '9D', '10D'), { enemy: golem });
    unwrap(submitPlayerAction(session, hand('6D', '7D', '8D', '9D', '10D')));
    expect(session.deck.maxDiscards).toBe(5);
    expect(session.deck.discardsLeft).toBe(5);
  });

  test('single-use companions leave the roster after firing', () => {
    const session = startSession(hand('9S', '2D', '3D', '4H', '6C'), { companions: [COMPANION_CATALOG.business_card] });
    const events = unwrap(submitPlayerAction(session, hand('9S')));
    expect(events).toContainEqual({ type: 'companion-consumed', companionId: 'business_card' });
    expect(session.companions).toEqual([]);
    expect(session.enemy.health).toBe(23); // 9 * 3
  });

  test('played cards move to the discard pile', () => {
    const session = startSession(hand('8S', '8H', '3C', '4D', '6C'));
    unwrap(submitPlayerAction(session, hand('8S', '8H')));
    expect(session.deck.discardPile).toEqual(hand('8S', '8H'));
    expect(session.deck.hand).toEqual(hand('3C', '4D', '6C'));
  });
});

describe('discardCards', () => {
  test('replaces discarded cards from the draw pile', () => {
    const session = startSession(hand('2S', '3S', '4S', '5S', '7H', '9C', 'JD'));
    const events = unwrap(discardCards(session, hand('7H')));

    expect(events.slice(2)).toEqual([
      { type: 'cards-discarded', cards: hand('7H'), discardsLeft: 3 },
      { type: 'cards-drawn', cards: hand('9C') }
    ]);
    expect(session.deck.hand).toEqual(hand('2S', '3S', '4S', '5S', '9C'));
    expect(session.deck.lastDiscard).toEqual(hand('7H'));
  });

  test('enforces the per-turn discard limit', () => {
    const session = startSession(hand('2S', '3S', '4S', '5S', '7H', '9C', 'JD'), { rules: { handSize: 5, discardsPerTurn: 1 } });
    unwrap(discardCards(session, hand('7H')));
    expect(errorKind(discardCards(session, hand('9C')))).toBe('DiscardLimitReached');
  });

  test('echo mage returns a lone discard on the next attack', () => {
    const session = startSession(hand('2S', '3S', '4S', '5S', '7H', '9C', 'JD'), {
      companions: [COMPANION_CATALOG.echo_mage]
    });
    unwrap(discardCards(session, hand('7H')));
    const events = unwrap(submitPlayerAction(session, hand('9C')));

    expect(events).toContainEqual({ type: 'hand-mutated', card: { id: '7H~1', r: 7, s: 'H' } });
    expect(session.deck.hand.map(c => c.id)).toEqual(['2S', '3S', '4S', '5S', '7H~1']);
    expect(session.deck.lastDiscard).toBeNull();
  });
});

describe('drawing', () => {
  test('reshuffles the discard pile when the draw pile runs short', () => {
    const session = startSession(hand('2S', '3H', '4D'), { rules: { handSize: 2 } });
    unwrap(submitPlayerAction(session, hand('2S', '3H')));
    unwrap(advanceEnemyTurn(session));

    const events = unwrap(beginPlayerTurn(session));
    expect(events).toEqual([
      { type: 'turn-started', side: 'player', turn: 2 },
      { type: 'deck-reshuffled', count: 2 },
      { type: 'cards-drawn', cards: hand('4D', '2S') }
    ]);
    expect(session.deck.drawPile).toEqual(hand('3H'));
  });

  test('reports a short draw when nothing is left to reshuffle', () => {
    const session = startSession(hand('2S', '3H'), { rules: { handSize: 3, reshuffleDiscards: false } });
    const events = unwrap(beginPlayerTurn(session));
    expect(events.slice(1)).toEqual([
      { type: 'cards-drawn', cards: hand('2S', '3H') },
      { type: 'deck-exhausted', missing: 1 }
    ]);
  });

  test('draw companions enlarge the hand', () => {
    const session = startSession(hand('2S', '3H', '4D', '5C', '6S', '8H', '9D'), { companions: [COMPANION_CATALOG.fool] });
    unwrap(beginPlayerTurn(session));
    expect(session.deck.hand.length).toBe(6);
  });
});

describe('useItem', () => {
  test('the sun adds five damage to the next hand', () => {
    const session = startSession(hand('9S', '2D', '3D', '4H', '6C'), { items: [TAROT_CATALOG.sun] });
    unwrap(useItem(session, 'sun'));
    expect(session.items).toEqual([]);

    unwrap(submitPlayerAction(session, hand('9S')));
    expect(session.enemy.health).toBe(36); // 9 + 5
    expect(session.pendingBonus).toBe(0);
  });

  test('refuses items the player does not carry', () => {
    const session = startSession(hand('9S', '2D', '3D', '4H', '6C'), { items: [TAROT_CATALOG.sun] });
    expect(errorKind(useItem(session, 'moon'))).toBe('UnknownItem');
  });
});

describe('enemy turn', () => {
  test('runs the scripted attack and hands the turn back', () => {
    const session = startSession(hand('8S', '8H', '3C', '4D', '6C', '9S', '10S'));
    unwrap(submitPlayerAction(session, hand('8S', '8H')));
    expect(session.enemy.health).toBe(18);

    expect(unwrap(advanceEnemyTurn(session))).toEqual([
      { type: 'turn-started', side: 'enemy', turn: 1 },
      { type: 'enemy-moved', move: { type: 'attack', damage: 10 } },
      { type: 'damage-dealt', target: 'player', incoming: 10, absorbed: 0, reduced: 0, dealt: 10, health: 90 }
    ]);
    expect(session.phase).toBe('player-turn-start');

    unwrap(beginPlayerTurn(session));
    expect(session.player.turn).toBe(2);
    expect(session.deck.hand).toEqual(hand('3C', '4D', '6C', '9S', '10S'));
  });

  test('cannot run during the player turn', () => {
    const session = startSession(hand('8S', '8H', '3C', '4D', '6C'));
    unwrap(beginPlayerTurn(session));
    expect(errorKind(advanceEnemyTurn(session))).toBe('IllegalStateTransition');
  });

  test('poison from three of a kind ticks at each side turn start', () => {
    const session = startSession(hand('5S', '5H', '5D', '2C', '9C', 'KH', 'QH', 'JH'), { enemy: { ...golem, maxHealth: 200 } });
    unwrap(submitPlayerAction(session, hand('5S', '5H', '5D')));
    expect(session.enemy.health).toBe(140);

    const enemyTurn = unwrap(advanceEnemyTurn(session));
    expect(enemyTurn[0]).toEqual({ type: 'poison-ticked', side: 'enemy', amount: 6, health: 134 });
    expect(session.player.health).toBe(95);

    const playerTurn = unwrap(beginPlayerTurn(session));
    expect(playerTurn[0]).toEqual({ type: 'poison-ticked', side: 'player', amount: 3, health: 92 });
    expect(session.player.effects).toEqual([
      { kind: 'poison', magnitude: 3, remaining: 2, source: 'three-of-a-kind' }
    ]);
  });

  test('a stunned enemy skips its move', () => {
    const session = startSession(hand('KS', '2H', '3D', '4C', '6S'), { rng: sequenceSource([0.1]) });
    unwrap(submitPlayerAction(session, hand('KS')));
    expect(session.enemy.effects).toEqual([{ kind: 'stun', magnitude: 0, remaining: 1, source: 'high-card' }]);

    expect(unwrap(advanceEnemyTurn(session))).toEqual([
      { type: 'turn-started', side: 'enemy', turn: 1 },
      { type: 'stun-consumed', side: 'enemy' }
    ]);
    expect(session.player.health).toBe(100);
    expect(session.phase).toBe('player-turn-start');
  });

  test('takes a supplied move over the script', () => {
    const session = startSession(hand('2S', '3H', '4D', '5C', '7S'));
    unwrap(passTurn(session));
    unwrap(advanceEnemyTurn(session, { type: 'guard', shield: 12 }));
    expect(session.enemy.effects).toEqual([{ kind: 'shield', magnitude: 12, remaining: 3, source: 'Goblin' }]);

    unwrap(passTurn(session));
    unwrap(advanceEnemyTurn(session, { type: 'afflict', kind: 'poison', magnitude: 4, duration: 2 }));
    expect(session.player.effects).toEqual([{ kind: 'poison', magnitude: 4, remaining: 2, source: 'Goblin' }]);
  });

  test('an instant affliction reports the heal', () => {
    const session = startSession(hand('2S', '3H', '4D', '5C', '7S'));
    unwrap(passTurn(session));
    session.player.health = 60;

    expect(unwrap(advanceEnemyTurn(session, { type: 'afflict', kind: 'heal', magnitude: 15, duration: 0 }))).toEqual([
      { type: 'turn-started', side: 'enemy', turn: 1 },
      { type: 'enemy-moved', move: { type: 'afflict', kind: 'heal', magnitude: 15, duration: 0 } },
      { type: 'healed', side: 'player', amount: 15, health: 75 }
    ]);
    expect(session.player.effects).toEqual([]);
  });

  test('refuses a supplied move with a negative magnitude before the turn runs', () => {
    const session = startSession(hand('2S', '3H', '4D', '5C', '7S'));
    unwrap(passTurn(session));

    const result = advanceEnemyTurn(session, { type: 'guard', shield: -5 });
    expect(errorKind(result)).toBe('NegativeMagnitudeEffect');
    expect(session.phase).toBe('enemy-turn-start');
    expect(session.enemy.turn).toBe(0);

    unwrap(advanceEnemyTurn(session));
    expect(session.phase).toBe('player-turn-start');
  });

  test('poison that empties the enemy at its turn start wins the fight', () => {
    const session = startSession(hand('2S', '3H', '4D', '5C', '7S'));
    unwrap(passTurn(session));
    session.enemy.health = 4;
    session.enemy.effects.push(createEffect('poison', 6, 3, 'test'));

    expect(unwrap(advanceEnemyTurn(session))).toEqual([
      { type: 'poison-ticked', side: 'enemy', amount: 4, health: 0 },
      { type: 'combat-ended', outcome: 'player-victory' }
    ]);
    expect(session.outcome).toBe('player-victory');
  });

  test('an enemy hit that empties the player loses the fight', () => {
    const session = startSession(hand('2S', '3H', '4D', '5C', '7S'));
    unwrap(passTurn(session));
    session.player.health = 5;
    unwrap(advanceEnemyTurn(session));
    expect(session.outcome).toBe('player-defeat');
    expect(session.phase).toBe('combat-end');
  });
});

describe('beginPlayerTurn', () => {
  test('poison can defeat the player before they act', () => {
    const session = startSession(hand('2S', '3H', '4D', '5C', '7S'));
    session.player.health = 2;
    session.player.effects.push(createEffect('poison', 5, 3, 'test'));

    expect(unwrap(beginPlayerTurn(session))).toEqual([
      { type: 'poison-ticked', side: 'player', amount: 2, health: 0 },
      { type: 'combat-ended', outcome: 'player-defeat' }
    ]);
    expect(session.player.turn).toBe(0);
    expect(errorKind(submitPlayerAction(session, hand('2S')))).toBe('IllegalStateTransition');
  });

  test('a stun ends the turn before the action phase', () => {
    const session = startSession(hand('2S', '3H', '4D', '5C', '7S'));
    session.player.effects.push(createEffect('stun', 0, 1, 'test'));

    expect(unwrap(beginPlayerTurn(session))).toEqual([
      { type: 'turn-started', side: 'player', turn: 1 },
      { type: 'stun-consumed', side: 'player' }
    ]);
    expect(session.phase).toBe('enemy-turn-start');
  });

  test('a stunned player cannot use items or discard', () => {
    const session = startSession(hand('2S', '3H', '4D', '5C', '7S'), { items: [TAROT_CATALOG.moon] });
    session.player.health = 50;
    session.player.effects.push(createEffect('stun', 0, 1, 'test'));
    unwrap(beginPlayerTurn(session));

    expect(errorKind(useItem(session, 'moon'))).toBe('IllegalStateTransition');
    expect(errorKind(discardCards(session, hand('2S')))).toBe('IllegalStateTransition');
    expect(session.player.health).toBe(50);
    expect(session.items).toEqual([TAROT_CATALOG.moon]);
  });

  test('passing into a stunned turn spends the stun', () => {
    const session = startSession(hand('2S', '3H', '4D', '5C', '7S'));
    session.player.effects.push(createEffect('stun', 0, 1, 'test'));
    const events = unwrap(passTurn(session));
    expect(events[events.length - 1]).toEqual({ type: 'stun-consumed', side: 'player' });
    expect(session.player.effects).toEqual([]);
    expect(session.phase).toBe('enemy-turn-start');
  });
});
