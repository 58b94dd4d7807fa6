import { ContractViolationError } from '../../common/errors/game-errors.js';
import { uniform, type RandomSource } from '../rng/rng.service.js';
import { STATUS_EFFECT_KIND, type StatusEffectKind } from '../types/enums.js';
import type {
  EffectChange,
  StatusEffectInstance,
  StatusEffectPolicy,
} from '../types/status-effect.js';
import type { StatusService } from './status.service.js';

/** 턴 시작 효과가 작용하는 대상 (Combatant) */
export interface EffectOwner {
  takeDamage(amount: number, ignoreProtection?: boolean): number;
  heal(amount: number): number;
  isAlive(): boolean;
}

/**
 * 전투원 1명의 활성 상태이상 저장소.
 * kind 당 인스턴스는 최대 1개이며, 재적용은 정책의 스택 방식으로 합쳐진다.
 */
export class EffectStore {
  private readonly instances = new Map<StatusEffectKind, StatusEffectInstance>();

  constructor(private readonly registry: StatusService) {}

  policy(kind: StatusEffectKind): StatusEffectPolicy {
    return this.registry.getPolicy(kind);
  }

  apply(
    kind: StatusEffectKind,
    requestedDuration: number,
    requestedIntensity: number,
    random: RandomSource,
  ): EffectChange {
    const policy = this.registry.getPolicy(kind);
    if (!Number.isInteger(requestedDuration) || requestedDuration <= 0) {
      throw new ContractViolationError('Effect duration must be a positive integer', {
        kind,
        duration: requestedDuration,
      });
    }
    if (!Number.isFinite(requestedIntensity) || requestedIntensity <= 0) {
      throw new ContractViolationError('Effect intensity must be positive', {
        kind,
        intensity: requestedIntensity,
      });
    }

    const existing = this.instances.get(kind);
    if (!existing) {
      const instance: StatusEffectInstance = {
        kind,
        duration:
          policy.stacking === 'DURATION'
            ? Math.min(requestedDuration, policy.maxDuration)
            : requestedDuration,
        intensity: Math.min(requestedIntensity, policy.maxIntensity),
        newlyApplied: true,
      };
      this.instances.set(kind, instance);
      return {
        kind,
        op: 'APPLIED',
        duration: instance.duration,
        intensity: instance.intensity,
      };
    }

    // 배율은 기존 값이 아닌 이번 적용량에 곱한다
    const roll = uniform(random, this.registry.stackRoll.min, this.registry.stackRoll.max);
    switch (policy.stacking) {
      case 'DURATION': {
        const extension = Math.ceil(requestedDuration * roll);
        existing.duration = Math.min(existing.duration + extension, policy.maxDuration);
        break;
      }
      case 'INTENSITY': {
        existing.intensity = Math.min(
          existing.intensity + requestedIntensity * roll,
          policy.maxIntensity,
        );
        // 합산 연장이 아니라 더 긴 쪽으로 재설정
        existing.duration = Math.max(existing.duration, requestedDuration);
        break;
      }
    }
    return {
      kind,
      op: 'STACKED',
      duration: existing.duration,
      intensity: existing.intensity,
    };
  }

  /** 턴 시작: DOT/HOT 처리 (kind 열거 순서) */
  tickTurnStart(owner: EffectOwner): EffectChange[] {
    const changes: EffectChange[] = [];
    for (const kind of STATUS_EFFECT_KIND) {
      const instance = this.instances.get(kind);
      if (!instance) continue;

      const { magnitude } = this.registry.getPolicy(kind);
      switch (magnitude.type) {
        case 'DAMAGE_OVER_TIME': {
          const dealt = owner.takeDamage(
            Math.floor(magnitude.perIntensity * instance.intensity),
            magnitude.ignoresProtection,
          );
          changes.push({ kind, op: 'TICKED', amount: -dealt, duration: instance.duration });
          break;
        }
        case 'HEAL_OVER_TIME': {
          if (!owner.isAlive()) break;
          const healed = owner.heal(Math.floor(magnitude.perIntensity * instance.intensity));
          changes.push({ kind, op: 'TICKED', amount: healed, duration: instance.duration });
          break;
        }
        default:
          break;
      }
      instance.newlyApplied = false;
    }
    return changes;
  }

  /** 턴 종료: 지속시간 1 감소, 0 이하인 효과 제거 */
  tickTurnEnd(): EffectChange[] {
    const removed: EffectChange[] = [];
    for (const kind of STATUS_EFFECT_KIND) {
      const instance = this.instances.get(kind);
      if (!instance) continue;
      instance.duration -= 1;
      if (instance.duration <= 0) {
        this.instances.delete(kind);
        removed.push({ kind, op: 'REMOVED' });
      }
    }
    return removed;
  }

  has(kind: StatusEffectKind): boolean {
    return this.instances.has(kind);
  }

  /** 활성 인스턴스 강도, 없으면 0 */
  intensityOf(kind: StatusEffectKind): number {
    return this.instances.get(kind)?.intensity ?? 0;
  }

  get(kind: StatusEffectKind): StatusEffectInstance | undefined {
    const instance = this.instances.get(kind);
    return instance ? { ...instance } : undefined;
  }

  /** 명시적 해제. 없는 kind 는 false 를 돌려주고 아무것도 바꾸지 않는다 */
  remove(kind: StatusEffectKind): boolean {
    this.registry.getPolicy(kind);
    return this.instances.delete(kind);
  }

  clearAll(): EffectChange[] {
    const removed = this.activeKinds().map(
      (kind): EffectChange => ({ kind, op: 'REMOVED' }),
    );
    this.instances.clear();
    return removed;
  }

  activeKinds(): StatusEffectKind[] {
    return STATUS_EFFECT_KIND.filter((kind) => this.instances.has(kind));
  }

  snapshot(): StatusEffectInstance[] {
    return this.activeKinds().flatMap((kind) => {
      const instance = this.get(kind);
      return instance ? [instance] : [];
    });
  }
}
