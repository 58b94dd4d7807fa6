// 상태이상 레지스트리: kind → 정책 (스택 방식, 기본 지속/강도, cap, 턴 효과)

import { Injectable } from '@nestjs/common';
import { ContractViolationError } from '../../common/errors/game-errors.js';
import { CombatConfigService } from '../config/combat-config.service.js';
import { STATUS_EFFECT_KIND, type StatusEffectKind } from '../types/enums.js';
import type { StatusEffectPolicy } from '../types/status-effect.js';

export function isStatusEffectKind(value: string): value is StatusEffectKind {
  return STATUS_EFFECT_KIND.some((kind) => kind === value);
}

@Injectable()
export class StatusService {
  private readonly policies: ReadonlyMap<StatusEffectKind, StatusEffectPolicy>;
  readonly stackRoll: { min: number; max: number };

  constructor(configService: CombatConfigService) {
    const config = configService.get();
    const policies = new Map<StatusEffectKind, StatusEffectPolicy>();
    for (const kind of STATUS_EFFECT_KIND) {
      const balance = config.statusEffects[kind];
      policies.set(
        kind,
        Object.freeze({
          ...balance,
          kind,
          maxDuration: balance.baseDuration * config.durationCapMultiplier,
          maxIntensity: balance.baseIntensity * config.intensityCapMultiplier,
        }),
      );
    }
    this.policies = policies;
    this.stackRoll = Object.freeze({
      min: config.stackRollMin,
      max: config.stackRollMax,
    });
  }

  /** 알 수 없는 kind 는 호출 측 버그 */
  getPolicy(kind: string): StatusEffectPolicy {
    const policy = isStatusEffectKind(kind) ? this.policies.get(kind) : undefined;
    if (!policy) {
      throw new ContractViolationError(`Unknown status effect kind: ${kind}`, { kind });
    }
    return policy;
  }

  listPolicies(): StatusEffectPolicy[] {
    return STATUS_EFFECT_KIND.map((kind) => this.getPolicy(kind));
  }
}
