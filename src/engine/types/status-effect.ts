import type {
  EffectChangeOp,
  StackingMode,
  StatusEffectKind,
} from './enums.js';

/** 턴마다 적용되는 수치 효과 */
export type EffectMagnitude =
  | { type: 'DAMAGE_OVER_TIME'; perIntensity: number; ignoresProtection: boolean }
  | { type: 'HEAL_OVER_TIME'; perIntensity: number }
  | { type: 'INCAPACITATE' }
  | { type: 'ACCURACY_PENALTY'; missChance: number }
  | { type: 'MISDIRECTION'; selfHitChance: number }
  | { type: 'COOLDOWN_HASTE'; extraTicks: number }
  | { type: 'SKIP_CHANCE'; chance: number }
  | { type: 'DAMAGE_MULTIPLIER'; perIntensity: number }
  | { type: 'DAMAGE_REDUCTION'; perIntensity: number };

/** 밸런스 테이블 한 줄 (cap 제외) */
export type StatusEffectBalance = {
  stacking: StackingMode;
  baseDuration: number;
  baseIntensity: number;
  magnitude: EffectMagnitude;
};

export type StatusEffectPolicy = StatusEffectBalance & {
  kind: StatusEffectKind;
  maxDuration: number;
  maxIntensity: number;
};

export type StatusEffectInstance = {
  kind: StatusEffectKind;
  duration: number;
  intensity: number;
  newlyApplied: boolean;
};

export type EffectChange = {
  kind: StatusEffectKind;
  op: EffectChangeOp;
  duration?: number;
  intensity?: number;
  amount?: number;
};
