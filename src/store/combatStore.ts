import { createStore } from 'zustand/vanilla';
import type { Card, CombatEvent, EnemyMove, HandResult, TarotKey } from '../engine/types';
import {
  createCombatSession,
  beginPlayerTurn,
  submitPlayerAction,
  discardCards,
  useItem as activateItem,
  passTurn,
  advanceEnemyTurn,
  type CombatConfig,
  type CombatSession,
  type TurnResult
} from '../engine/combat';
import { classify, CATEGORY_NAMES } from '../engine/evaluation';
import { formatCard } from '../engine/deck';
import type { CombatError } from '../engine/errors';
import logger from '../logger';

export interface TelemetryEvent {
  type: CombatEvent['type'];
  timestamp: number;
  data: CombatEvent;
}

export interface CombatStore {
  // Combat state
  session: CombatSession | null;

  // UI state
  selectedCards: Card[];
  turnLog: string[];
  lastError: CombatError | null;
  autoEnemyTurn: boolean;

  // Telemetry
  events: TelemetryEvent[];

  // Actions
  newCombat: (config: CombatConfig) => boolean;
  selectCard: (card: Card) => void;
  deselectCard: (card: Card) => void;
  clearSelection: () => void;
  playSelected: () => boolean;
  discardSelected: () => boolean;
  useItem: (key: TarotKey) => boolean;
  pass: () => boolean;
  runEnemyTurn: (move?: EnemyMove) => boolean;
  addLog: (message: string) => void;

  // Selectors
  getHandPreview: () => HandResult | null;
}

function cardList(cards: Card[]): string {
  return cards.map(formatCard).join(' ');
}

function describeMove(move: EnemyMove): string {
  switch (move.type) {
    case 'attack':
      return `attacks for ${move.damage}`;
    case 'guard':
      return `raises a ${move.shield} HP shield`;
    case 'afflict':
      return `casts ${move.kind} (${move.magnitude})`;
  }
}

// One turn-log line per event; null for events not worth showing
export function describeEvent(session: CombatSession, event: CombatEvent): string | null {
  const nameOf = (side: 'player' | 'enemy') => session[side].name;

  switch (event.type) {
    case 'turn-started':
      return `${nameOf(event.side)} turn ${event.turn}`;
    case 'poison-ticked':
      return `${nameOf(event.side)} takes ${event.amount} poison damage (${event.health} HP left)`;
    case 'effect-expired':
      return `${nameOf(event.side)}'s ${event.effect.kind} wore off`;
    case 'stun-consumed':
      return `${nameOf(event.side)} is stunned and loses the turn`;
    case 'cards-drawn':
      return event.cards.length > 0 ? `Drew ${cardList(event.cards)}` : null;
    case 'deck-reshuffled':
      return `Shuffled ${event.count} discards back into the deck`;
    case 'deck-exhausted':
      return `Deck is empty, ${event.missing} card(s) short`;
    case 'cards-discarded':
      return `Discarded ${cardList(event.cards)} (${event.discardsLeft} left)`;
    case 'hand-played':
      return `Played ${CATEGORY_NAMES[event.category]}: ${cardList(event.cards)} (x${event.multiplier})`;
    case 'damage-dealt':
      return `${nameOf(event.target)} takes ${event.dealt} damage (${event.health} HP left)`;
    case 'healed':
      return event.amount > 0 ? `${nameOf(event.side)} heals ${event.amount} HP` : null;
    case 'effect-applied':
      return `${nameOf(event.side)} gains ${event.effect.kind} (${event.effect.magnitude})`;
    case 'hand-mutated':
      return `${formatCard(event.card)} echoes back into hand`;
    case 'item-activated':
      return `${event.item.name} activated`;
    case 'discard-limit-changed':
      return `Discards per turn raised to ${event.maxDiscards}`;
    case 'companion-consumed':
      return `${event.companionId} is spent`;
    case 'enemy-moved':
      return `${session.enemy.name} ${describeMove(event.move)}`;
    case 'turn-passed':
      return `${nameOf(event.side)} passed`;
    case 'combat-ended':
      return event.outcome === 'player-victory'
        ? `Victory! ${session.enemy.name} is defeated`
        : `Defeat! ${session.player.name} has fallen`;
  }
}

export interface CombatStoreOptions {
  autoEnemyTurn?: boolean;
}

export function createCombatStore(options: CombatStoreOptions = {}) {
  return createStore<CombatStore>()((set, get) => {
    // Records the outcome of one session operation
    const commit = (result: TurnResult): boolean => {
      const { session } = get();
      if (!session) return false;

      if (!result.ok) {
        set({ lastError: result.error });
        get().addLog(result.error.message);
        return false;
      }

      const timestamp = Date.now();
      const lines = result.value
        .map(event => describeEvent(session, event))
        .filter((line): line is string => line !== null);
      set(state => ({
        session,
        lastError: null,
        turnLog: [...state.turnLog, ...lines],
        events: [...state.events, ...result.value.map(data => ({ type: data.type, timestamp, data }))]
      }));
      return true;
    };

    // Keeps the loop moving until the player has a hand to act on
    const settle = (): void => {
      const { session, autoEnemyTurn } = get();
      if (!session) return;
      for (;;) {
        if (session.phase === 'player-turn-start') {
          if (!commit(beginPlayerTurn(session))) return;
        } else if (autoEnemyTurn && session.phase === 'enemy-turn-start') {
          if (!commit(advanceEnemyTurn(session))) return;
        } else {
          return;
        }
      }
    };

    const withSession = (action: string, run: (session: CombatSession) => TurnResult): boolean => {
      const { session } = get();
      if (!session) {
        logger.warn('No combat in progress', { action });
        return false;
      }
      const done = commit(run(session));
      if (done) settle();
      return done;
    };

    return {
      session: null,
      selectedCards: [],
      turnLog: [],
      lastError: null,
      autoEnemyTurn: options.autoEnemyTurn ?? true,
      events: [],

      newCombat: (config) => {
        const created = createCombatSession(config);
        if (!created.ok) {
          set({ lastError: created.error });
          return false;
        }
        set({
          session: created.value,
          selectedCards: [],
          turnLog: [`Combat started against ${created.value.enemy.name}`],
          lastError: null,
          events: []
        });
        settle();
        return true;
      },

      selectCard: (card) => {
        const { selectedCards } = get();
        if (!selectedCards.find(c => c.id === card.id)) {
          set({ selectedCards: [...selectedCards, card] });
        }
      },

      deselectCard: (card) => {
        const { selectedCards } = get();
        set({ selectedCards: selectedCards.filter(c => c.id !== card.id) });
      },

      clearSelection: () => {
        set({ selectedCards: [] });
      },

      playSelected: () => {
        const { selectedCards } = get();
        const played = withSession('play', session => submitPlayerAction(session, selectedCards));
        if (played) set({ selectedCards: [] });
        return played;
      },

      discardSelected: () => {
        const { selectedCards } = get();
        const discarded = withSession('discard', session => discardCards(session, selectedCards));
        if (discarded) set({ selectedCards: [] });
        return discarded;
      },

      useItem: (key) => withSession('use item', session => activateItem(session, key)),

      pass: () => {
        const passed = withSession('pass', passTurn);
        if (passed) set({ selectedCards: [] });
        return passed;
      },

      runEnemyTurn: (move) => withSession('enemy turn', session => advanceEnemyTurn(session, move)),

      addLog: (message) => {
        set(state => ({ turnLog: [...state.turnLog, message] }));
      },

      getHandPreview: () => {
        const { session, selectedCards } = get();
        if (!session) return null;
        const result = classify(selectedCards, { rules: session.rules });
        return result.ok ? result.value : null;
      }
    };
  });
}

export type CombatStoreApi = ReturnType<typeof createCombatStore>;
