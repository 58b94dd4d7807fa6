// 전투 승리 보상 계산

import { Injectable } from '@nestjs/common';
import { Rng } from '../rng/rng.service.js';
import type { RewardResult } from '../types/engine-event.js';

export interface EnemyReward {
  experience: number;
  goldMin: number;
  goldMax: number;
}

export interface RewardInput {
  /** 전투 RNG 와 분리된 보상 RNG 시드 */
  seed: string;
  defeated: EnemyReward[];
}

@Injectable()
export class RewardsService {
  /**
   * 경험치는 처치한 적 값의 합, 골드는 적마다 개별 롤.
   * 같은 seed 와 같은 처치 목록이면 결과도 같다
   */
  calculateCombatRewards(input: RewardInput): RewardResult {
    const rng = new Rng(input.seed + '_reward', 0);
    let experience = 0;
    let gold = 0;

    for (const enemy of input.defeated) {
      experience += enemy.experience;
      const max = Math.max(enemy.goldMin, enemy.goldMax);
      gold += rng.range(enemy.goldMin, max);
    }
    return { experience, gold };
  }
}
