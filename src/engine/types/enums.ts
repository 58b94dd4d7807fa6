// 전투 코어 공통 열거형 (배열 순서가 곧 정렬/순회 순서)

export const STATUS_EFFECT_KIND = [
  'POISON',
  'PARALYSIS',
  'BLINDNESS',
  'CONFUSION',
  'HASTE',
  'SLOW',
  'REGENERATION',
  'STRENGTH',
  'WEAKNESS',
  'PROTECTION',
] as const;
export type StatusEffectKind = (typeof STATUS_EFFECT_KIND)[number];

export const STACKING_MODE = ['DURATION', 'INTENSITY'] as const;
export type StackingMode = (typeof STACKING_MODE)[number];

export const COMBAT_PHASE = [
  'EXPLORATION',
  'COMBAT_INIT',
  'COMBAT_ACTIVE',
  'COMBAT_RESOLUTION',
  'COMBAT_EXIT',
] as const;
export type CombatPhase = (typeof COMBAT_PHASE)[number];

export const COMBAT_SIDE = ['PLAYER', 'ENEMY'] as const;
export type CombatSide = (typeof COMBAT_SIDE)[number];

export const COMBAT_ACTION_TYPE = [
  'ATTACK',
  'DEFEND',
  'USE_ABILITY',
  'MOVE',
  'WAIT',
  'FLEE',
] as const;
export type CombatActionType = (typeof COMBAT_ACTION_TYPE)[number];

export const AI_BEHAVIOR = [
  'AGGRESSIVE',
  'DEFENSIVE',
  'SUPPORT',
  'SPELLCASTER',
  'COWARDLY',
] as const;
export type AiBehavior = (typeof AI_BEHAVIOR)[number];

export const ABILITY_TARGET = ['ENEMY', 'ALLY', 'SELF'] as const;
export type AbilityTarget = (typeof ABILITY_TARGET)[number];

export const COMBAT_OUTCOME = ['ONGOING', 'VICTORY', 'DEFEAT', 'FLED'] as const;
export type CombatOutcome = (typeof COMBAT_OUTCOME)[number];

export const EFFECT_CHANGE_OP = ['APPLIED', 'STACKED', 'TICKED', 'REMOVED'] as const;
export type EffectChangeOp = (typeof EFFECT_CHANGE_OP)[number];
