export type * from './engine/types';
export { CombatError, ok, fail, type CombatErrorKind, type Result } from './engine/errors';
export { createRandomSource, sequenceSource, type RandomSource } from './engine/random';
export { DEFAULT_RULES, resolveRules, type CombatRules, type RuleOverrides } from './engine/config';
export {
  SUITS,
  RANKS,
  makeCard,
  makeDeck,
  shuffle,
  sortCards,
  cardsEqual,
  findCard,
  formatCard,
  findDuplicateCards,
  drawCards,
  type DrawResult
} from './engine/deck';
export {
  HAND_CATEGORIES,
  CATEGORY_NAMES,
  MIN_HAND_SIZE,
  MAX_HAND_SIZE,
  compareCategories,
  getHandCategory,
  classify,
  type ClassifyOptions
} from './engine/evaluation';
export { handMultiplier, finalMultiplier, baseDamage } from './engine/scoring';
export {
  EFFECT_LIFETIMES,
  createEffect,
  applyEffect,
  tickEffects,
  consumeStun,
  takeDamage,
  boostOutgoing,
  heal,
  hasEffect,
  totalMagnitude,
  type EffectLifetime,
  type DamageReport,
  type TickReport
} from './engine/effects';
export {
  COMPANION_CATALOG,
  getCompanion,
  probabilityFactor,
  damageRamp,
  extraDraws,
  echoCard,
  applyDamageModifiers
} from './engine/companions';
export { TAROT_CATALOG, activateTarot, type TarotOutcome } from './engine/tarot';
export { resolveAbility, describeAbility, type ResolveOptions } from './engine/abilities';
export { ENEMY_TEMPLATES, createEnemyDefinition, scriptedMove } from './engine/enemies';
export {
  createCombatSession,
  beginPlayerTurn,
  submitPlayerAction,
  discardCards,
  useItem,
  passTurn,
  advanceEnemyTurn,
  isTerminal,
  DEFAULT_PLAYER_HEALTH,
  type CombatConfig,
  type CombatSession,
  type TurnResult
} from './engine/combat';
export {
  createCombatStore,
  describeEvent,
  type CombatStore,
  type CombatStoreApi,
  type CombatStoreOptions,
  type TelemetryEvent
} from './store/combatStore';
export { default as logger } from './logger';
