import type { EffectChange } from './status-effect.js';

export type GridPosition = {
  x: number;
  y: number;
};

export type CombatAction = { priority: number } & (
  | { type: 'ATTACK'; targetId: string }
  | { type: 'DEFEND' }
  | { type: 'USE_ABILITY'; abilityId: string; targetId: string }
  | { type: 'MOVE'; destination: GridPosition }
  | { type: 'WAIT' }
  | { type: 'FLEE' }
);

export const ACTION_OUTCOME = [
  'HIT',
  'MISS',
  'SELF_HIT',
  'DEFENDED',
  'ABILITY_USED',
  'MOVED',
  'WAITED',
  'FLED',
  'FLEE_FAILED',
] as const;
export type ActionOutcome = (typeof ACTION_OUTCOME)[number];

export type ActionResult = {
  outcome: ActionOutcome;
  targetId?: string;
  damage?: number;
  healed?: number;
  effects: EffectChange[];
  defeatedIds: string[];
};
