// 전투 밸런스 설정: .env 기본값 + 런타임 변경 지원

import { Injectable, Logger } from '@nestjs/common';
import { join } from 'path';
import { InvalidInputError } from '../../common/errors/game-errors.js';
import type { StatusEffectKind } from '../types/enums.js';
import type { StatusEffectBalance } from '../types/status-effect.js';

export type StatusBalanceTable = Record<StatusEffectKind, StatusEffectBalance>;

export interface CombatConfig {
  /** 도주 성공 확률 (0~1) */
  fleeChance: number;
  /** duration cap = baseDuration × 배수 */
  durationCapMultiplier: number;
  /** intensity cap = baseIntensity × 배수 */
  intensityCapMultiplier: number;
  /** 스택 배율 U(min, max) */
  stackRollMin: number;
  stackRollMax: number;
  /** DEFEND 시 자신에게 거는 PROTECTION + 재사용 대기 턴 */
  defend: { duration: number; intensity: number; cooldown: number };
  defaultSeed: string;
  contentDir: string;
  statusEffects: StatusBalanceTable;
}

export type CombatConfigPatch = Partial<
  Pick<CombatConfig, 'fleeChance' | 'defaultSeed'>
>;

export const DEFAULT_STATUS_BALANCE: StatusBalanceTable = {
  POISON: {
    stacking: 'INTENSITY',
    baseDuration: 3,
    baseIntensity: 1.0,
    magnitude: { type: 'DAMAGE_OVER_TIME', perIntensity: 5, ignoresProtection: true },
  },
  PARALYSIS: {
    stacking: 'DURATION',
    baseDuration: 1,
    baseIntensity: 1.0,
    magnitude: { type: 'INCAPACITATE' },
  },
  BLINDNESS: {
    stacking: 'DURATION',
    baseDuration: 2,
    baseIntensity: 1.0,
    magnitude: { type: 'ACCURACY_PENALTY', missChance: 0.5 },
  },
  CONFUSION: {
    stacking: 'DURATION',
    baseDuration: 2,
    baseIntensity: 1.0,
    magnitude: { type: 'MISDIRECTION', selfHitChance: 0.5 },
  },
  HASTE: {
    stacking: 'DURATION',
    baseDuration: 3,
    baseIntensity: 1.0,
    magnitude: { type: 'COOLDOWN_HASTE', extraTicks: 1 },
  },
  SLOW: {
    stacking: 'DURATION',
    baseDuration: 3,
    baseIntensity: 1.0,
    magnitude: { type: 'SKIP_CHANCE', chance: 0.5 },
  },
  REGENERATION: {
    stacking: 'INTENSITY',
    baseDuration: 3,
    baseIntensity: 1.0,
    magnitude: { type: 'HEAL_OVER_TIME', perIntensity: 3 },
  },
  STRENGTH: {
    stacking: 'INTENSITY',
    baseDuration: 2,
    baseIntensity: 1.0,
    magnitude: { type: 'DAMAGE_MULTIPLIER', perIntensity: 0.1 },
  },
  WEAKNESS: {
    stacking: 'INTENSITY',
    baseDuration: 2,
    baseIntensity: 1.0,
    magnitude: { type: 'DAMAGE_MULTIPLIER', perIntensity: -0.1 },
  },
  PROTECTION: {
    stacking: 'INTENSITY',
    baseDuration: 2,
    baseIntensity: 1.0,
    magnitude: { type: 'DAMAGE_REDUCTION', perIntensity: 0.1 },
  },
};

function readProbability(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = parseFloat(raw);
  return Number.isFinite(value) && value >= 0 && value <= 1 ? value : fallback;
}

@Injectable()
export class CombatConfigService {
  private readonly logger = new Logger(CombatConfigService.name);
  private config: CombatConfig;

  constructor() {
    this.config = {
      fleeChance: readProbability(process.env.COMBAT_FLEE_CHANCE, 0.5),
      durationCapMultiplier: 2,
      intensityCapMultiplier: 3,
      stackRollMin: 0.5,
      stackRollMax: 1.0,
      defend: { duration: 2, intensity: 2.0, cooldown: 3 },
      defaultSeed: process.env.COMBAT_DEFAULT_SEED ?? 'turnfall',
      contentDir:
        process.env.COMBAT_CONTENT_DIR ?? join(process.cwd(), 'content', 'combat_v1'),
      statusEffects: DEFAULT_STATUS_BALANCE,
    };
  }

  get(): CombatConfig {
    return this.config;
  }

  /** 런타임 설정 변경: 다음 행동 판정부터 반영 */
  update(patch: CombatConfigPatch): CombatConfig {
    if (patch.fleeChance !== undefined && (patch.fleeChance < 0 || patch.fleeChance > 1)) {
      throw new InvalidInputError('fleeChance must be within [0, 1]', {
        fleeChance: patch.fleeChance,
      });
    }
    this.config = { ...this.config, ...patch };
    this.logger.log(`Combat config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }
}
