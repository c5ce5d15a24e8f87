import type { EnemyDefinition, EnemyMove } from './types';

interface EnemyTemplate {
  hp: number;
  attack: number;
  defense: number;
}

export const ENEMY_TEMPLATES: Record<string, EnemyTemplate> = {
  Goblin: { hp: 50, attack: 10, defense: 0 },
  Orc: { hp: 80, attack: 12, defense: 2 },
  Skeleton: { hp: 40, attack: 8, defense: 1 },
  Bandit: { hp: 60, attack: 15, defense: 0 },
  Troll: { hp: 120, attack: 18, defense: 4 },
  Dragonling: { hp: 150, attack: 25, defense: 5 }
};

export function createEnemyDefinition(name: string): EnemyDefinition | null {
  const template = ENEMY_TEMPLATES[name];
  if (!template) return null;
  return {
    name,
    maxHealth: template.hp,
    defense: template.defense,
    moves: [{ type: 'attack', damage: template.attack }]
  };
}

// Scripted moves cycle by the enemy's turn counter (1-based)
export function scriptedMove(definition: EnemyDefinition, turn: number): EnemyMove | null {
  if (definition.moves.length === 0) return null;
  return definition.moves[(Math.max(1, turn) - 1) % definition.moves.length];
}
