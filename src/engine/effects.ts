import type { Combatant, StatusEffect, StatusEffectKind } from './types';
import { CombatError } from './errors';
import { applyPercent } from './scoring';

/**
 * How an effect kind leaves the combatant:
 * - instant: resolved on application, never stored
 * - ticking: loses one turn of duration on every tick of its holder, removed at 0
 * - until-consumed: ignored by ticks, removed by the action that uses it up
 *   (stun by the next action attempt, damage buff by the next outgoing hit)
 */
export type EffectLifetime = 'instant' | 'ticking' | 'until-consumed';

export const EFFECT_LIFETIMES: Record<StatusEffectKind, EffectLifetime> = {
  'stun': 'until-consumed',
  'heal': 'instant',
  'damage-buff': 'until-consumed',
  'shield': 'ticking',
  'damage-reduction': 'ticking',
  'poison': 'ticking'
};

export function createEffect(kind: StatusEffectKind, magnitude: number, remaining: number, source = ''): StatusEffect {
  if (magnitude < 0) {
    throw new CombatError('NegativeMagnitudeEffect', `${kind} effect from "${source}" has magnitude ${magnitude}`);
  }
  return { kind, magnitude, remaining: Math.max(0, remaining), source };
}

export function totalMagnitude(combatant: Combatant, kind: StatusEffectKind): number {
  return combatant.effects
    .filter(e => e.kind === kind)
    .reduce((sum, e) => sum + e.magnitude, 0);
}

export function hasEffect(combatant: Combatant, kind: StatusEffectKind): boolean {
  return combatant.effects.some(e => e.kind === kind);
}

export function heal(combatant: Combatant, amount: number): number {
  const before = combatant.health;
  combatant.health = Math.min(combatant.maxHealth, combatant.health + Math.max(0, amount));
  return combatant.health - before;
}

// Unmitigated health loss
export function loseHealth(combatant: Combatant, amount: number): number {
  const before = combatant.health;
  combatant.health = Math.max(0, combatant.health - Math.max(0, amount));
  return before - combatant.health;
}

export interface EffectApplication {
  stored: boolean;
  healed: number;
}

// Every kind stacks by adding a new instance
export function applyEffect(combatant: Combatant, effect: StatusEffect): EffectApplication {
  if (effect.magnitude < 0) {
    throw new CombatError('NegativeMagnitudeEffect', `${effect.kind} effect has magnitude ${effect.magnitude}`);
  }
  if (EFFECT_LIFETIMES[effect.kind] === 'instant') {
    return { stored: false, healed: effect.kind === 'heal' ? heal(combatant, effect.magnitude) : 0 };
  }
  combatant.effects.push({ ...effect });
  return { stored: true, healed: 0 };
}

export interface TickReport {
  poison: number;
  expired: StatusEffect[];
}

// Runs once at the start of the holder's own turn
export function tickEffects(combatant: Combatant): TickReport {
  // Poison ignores shield and damage reduction
  const poison = loseHealth(combatant, totalMagnitude(combatant, 'poison'));

  const expired: StatusEffect[] = [];
  const kept: StatusEffect[] = [];
  for (const effect of combatant.effects) {
    if (EFFECT_LIFETIMES[effect.kind] !== 'ticking') {
      kept.push(effect);
      continue;
    }
    effect.remaining -= 1;
    if (effect.remaining <= 0) {
      expired.push(effect);
    } else {
      kept.push(effect);
    }
  }
  combatant.effects = kept;

  return { poison, expired };
}

// Removes at most one stun; a second call in the same attempt finds nothing left
export function consumeStun(combatant: Combatant): boolean {
  const idx = combatant.effects.findIndex(e => e.kind === 'stun' && e.remaining >= 0);
  if (idx < 0) return false;
  combatant.effects.splice(idx, 1);
  return true;
}

export interface OutgoingDamage {
  amount: number;
  consumed: StatusEffect[];
}

// Spends every damage buff on one hit; buffs compound
export function boostOutgoing(combatant: Combatant, amount: number): OutgoingDamage {
  const consumed = combatant.effects.filter(e => e.kind === 'damage-buff');
  if (consumed.length === 0) {
    return { amount, consumed };
  }
  combatant.effects = combatant.effects.filter(e => e.kind !== 'damage-buff');
  const boosted = consumed.reduce((total, buff) => applyPercent(total, buff.magnitude), amount);
  return { amount: boosted, consumed };
}

export interface DamageReport {
  incoming: number;
  absorbed: number;
  reduced: number;
  dealt: number;
}

/**
 * Mitigates and applies a hit: shields absorb first (in application order,
 * depleted shields are removed), then the summed damage reduction percentage
 * (capped at 100) discounts the rest, then flat defense.
 */
export function takeDamage(combatant: Combatant, amount: number): DamageReport {
  const incoming = Math.max(0, Math.floor(amount));
  let left = incoming;

  let absorbed = 0;
  for (const shield of combatant.effects) {
    if (shield.kind !== 'shield' || left === 0) continue;
    const take = Math.min(shield.magnitude, left);
    shield.magnitude = Math.max(0, shield.magnitude - take);
    absorbed += take;
    left -= take;
  }
  combatant.effects = combatant.effects.filter(e => e.kind !== 'shield' || e.magnitude > 0);

  const reductionPct = Math.min(100, totalMagnitude(combatant, 'damage-reduction'));
  const afterReduction = Math.floor(left * (100 - reductionPct) / 100);
  const afterDefense = Math.max(0, afterReduction - combatant.defense);

  const dealt = loseHealth(combatant, afterDefense);
  return { incoming, absorbed, reduced: left - afterDefense, dealt };
}
