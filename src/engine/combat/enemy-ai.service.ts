// 적 AI: 행동 유형별 규칙으로 후보 행동을 고르고, 성향 가중치로 한 번 뒤집을 수 있다

import { Injectable } from '@nestjs/common';
import type { AbilityDefinition } from '../../content/content.types.js';
import { manhattan } from '../combatant/combatant.js';
import type { RandomSource } from '../rng/rng.service.js';
import type { CombatAction, GridPosition } from '../types/combat-action.js';
import { type AiCombatantView, type AiContext, isOccupied } from './ai-context.js';

/** 소비자용 우선순위 힌트 (엔진은 사용하지 않음) */
export const ACTION_PRIORITY = {
  EMERGENCY: 5,
  ABILITY: 4,
  ATTACK: 3,
  MOVE: 2,
  DEFEND: 1,
  WAIT: 0,
} as const;

const DEFENSIVE_HP_THRESHOLD = 0.5;
const SUPPORT_HEAL_THRESHOLD = 0.5;
const COWARDLY_RETREAT_THRESHOLD = 0.3;
/** 성향 가중치 1.0 이 뒤집기 확률 50% */
const OVERRIDE_SCALE = 0.5;

const WAIT: CombatAction = { type: 'WAIT', priority: ACTION_PRIORITY.WAIT };
const DEFEND: CombatAction = { type: 'DEFEND', priority: ACTION_PRIORITY.DEFEND };

function sign(n: number): number {
  return n > 0 ? 1 : n < 0 ? -1 : 0;
}

@Injectable()
export class EnemyAiService {
  /** 행동 유형 판단 후 성향 보정. 난수는 보정 단계에서만 소비한다 */
  decide(ctx: AiContext, random: RandomSource): CombatAction {
    return this.applyPersonality(this.chooseByBehavior(ctx), ctx, random);
  }

  /** 부수효과 없는 순수 판단 */
  chooseByBehavior(ctx: AiContext): CombatAction {
    if (!ctx.target) return WAIT;

    switch (ctx.self.profile.behavior) {
      case 'AGGRESSIVE':
        return this.aggressive(ctx, ctx.target);
      case 'DEFENSIVE':
        return this.defensive(ctx, ctx.target);
      case 'SUPPORT':
        return this.support(ctx, ctx.target);
      case 'SPELLCASTER':
        return this.spellcaster(ctx, ctx.target);
      case 'COWARDLY':
        return this.cowardly(ctx, ctx.target);
    }
  }

  applyPersonality(chosen: CombatAction, ctx: AiContext, random: RandomSource): CombatAction {
    const { aggression, caution } = ctx.self.profile;

    if (chosen.type === 'ATTACK' && caution > 0 && ctx.self.defendReady) {
      if (random.next() < caution * OVERRIDE_SCALE) return DEFEND;
      return chosen;
    }

    if ((chosen.type === 'WAIT' || chosen.type === 'DEFEND') && aggression > 0) {
      const target = ctx.target;
      if (target && this.inAttackRange(ctx, target) && random.next() < aggression * OVERRIDE_SCALE) {
        return { type: 'ATTACK', targetId: target.id, priority: ACTION_PRIORITY.ATTACK };
      }
    }
    return chosen;
  }

  /** AGGRESSIVE: 사거리 안이면 공격, 아니면 피해 능력, 그것도 없으면 접근 */
  private aggressive(ctx: AiContext, target: AiCombatantView): CombatAction {
    if (this.inAttackRange(ctx, target)) return this.attack(target);

    const damaging = this.findAbility(
      ctx,
      target,
      (a) => a.target === 'ENEMY' && a.effect.type === 'DAMAGE',
    );
    if (damaging) return this.useAbility(damaging, target);

    return this.stepToward(ctx, target);
  }

  /** DEFENSIVE: HP 절반 미만이면 방어 태세, 사거리 안이면 공격, 아니면 대기 */
  private defensive(ctx: AiContext, target: AiCombatantView): CombatAction {
    if (
      ctx.self.healthRatio < DEFENSIVE_HP_THRESHOLD &&
      !ctx.self.gates.protected &&
      ctx.self.defendReady
    ) {
      return { type: 'DEFEND', priority: ACTION_PRIORITY.EMERGENCY };
    }
    if (this.inAttackRange(ctx, target)) return this.attack(target);
    return WAIT;
  }

  /** SUPPORT: 가장 많이 다친 아군(자신 포함) 치유 우선 */
  private support(ctx: AiContext, target: AiCombatantView): CombatAction {
    const injured = [ctx.self, ...ctx.allies]
      .filter((c) => c.healthRatio < SUPPORT_HEAL_THRESHOLD)
      .sort((a, b) => a.healthRatio - b.healthRatio);

    for (const ally of injured) {
      const heal = this.findAbility(
        ctx,
        ally,
        (a) =>
          a.effect.type === 'HEAL' &&
          (a.target === 'ALLY' || (a.target === 'SELF' && ally.id === ctx.self.id)),
      );
      if (heal) return { ...this.useAbility(heal, ally), priority: ACTION_PRIORITY.EMERGENCY };
    }

    if (this.inAttackRange(ctx, target)) return this.attack(target);
    return this.stepToward(ctx, target);
  }

  /** SPELLCASTER: 상대에게 아직 없는 상태이상/피해 능력 → 붙으면 거리 벌리기 → 평타 */
  private spellcaster(ctx: AiContext, target: AiCombatantView): CombatAction {
    const spell = this.findAbility(ctx, target, (a) => {
      if (a.target !== 'ENEMY') return false;
      if (a.effect.type === 'STATUS') return !target.effects.includes(a.effect.kind);
      return a.effect.type === 'DAMAGE';
    });
    if (spell) return this.useAbility(spell, target);

    if (this.distanceTo(ctx, target) <= 1) {
      const away = this.stepAway(ctx, target);
      if (away) return away;
    }
    if (this.inAttackRange(ctx, target)) return this.attack(target);
    return this.stepToward(ctx, target);
  }

  /** COWARDLY: HP 30% 미만이면 후퇴, 사거리 안이면 공격, 아니면 방어 (쿨다운 중이면 대기) */
  private cowardly(ctx: AiContext, target: AiCombatantView): CombatAction {
    if (ctx.self.healthRatio < COWARDLY_RETREAT_THRESHOLD) {
      const away = this.stepAway(ctx, target);
      if (away) return { ...away, priority: ACTION_PRIORITY.EMERGENCY };
    }
    if (this.inAttackRange(ctx, target)) return this.attack(target);
    return ctx.self.defendReady ? DEFEND : WAIT;
  }

  private findAbility(
    ctx: AiContext,
    target: AiCombatantView,
    predicate: (ability: AbilityDefinition) => boolean,
  ): AbilityDefinition | undefined {
    const distance = manhattan(ctx.self.position, target.position);
    return ctx.self.readyAbilities.find((a) => predicate(a) && distance <= a.range);
  }

  private distanceTo(ctx: AiContext, target: AiCombatantView): number {
    return manhattan(ctx.self.position, target.position);
  }

  private inAttackRange(ctx: AiContext, target: AiCombatantView): boolean {
    return this.distanceTo(ctx, target) <= ctx.self.attackRange;
  }

  private attack(target: AiCombatantView): CombatAction {
    return { type: 'ATTACK', targetId: target.id, priority: ACTION_PRIORITY.ATTACK };
  }

  private useAbility(ability: AbilityDefinition, target: AiCombatantView): CombatAction {
    return {
      type: 'USE_ABILITY',
      abilityId: ability.abilityId,
      targetId: target.id,
      priority: ACTION_PRIORITY.ABILITY,
    };
  }

  /** 차이가 큰 축 먼저 한 칸. 막혀 있으면 대기 */
  private stepToward(ctx: AiContext, target: AiCombatantView): CombatAction {
    const { x, y } = ctx.self.position;
    const dx = target.position.x - x;
    const dy = target.position.y - y;
    const alongX: GridPosition = { x: x + sign(dx), y };
    const alongY: GridPosition = { x, y: y + sign(dy) };
    const candidates = Math.abs(dx) >= Math.abs(dy) ? [alongX, alongY] : [alongY, alongX];

    const cell = candidates.find(
      (c) => (c.x !== x || c.y !== y) && !isOccupied(ctx, c),
    );
    if (!cell) return WAIT;
    return { type: 'MOVE', destination: cell, priority: ACTION_PRIORITY.MOVE };
  }

  /** 거리가 늘어나는 칸 중 첫 번째. 없으면 null */
  private stepAway(ctx: AiContext, target: AiCombatantView): CombatAction | null {
    const { x, y } = ctx.self.position;
    const dx = x - target.position.x;
    const dy = y - target.position.y;
    const xSteps = dx === 0 ? [1, -1] : [sign(dx)];
    const ySteps = dy === 0 ? [1, -1] : [sign(dy)];
    const alongX = xSteps.map((s): GridPosition => ({ x: x + s, y }));
    const alongY = ySteps.map((s): GridPosition => ({ x, y: y + s }));
    const candidates = Math.abs(dx) >= Math.abs(dy) ? [...alongX, ...alongY] : [...alongY, ...alongX];

    const cell = candidates.find((c) => !isOccupied(ctx, c));
    if (!cell) return null;
    return { type: 'MOVE', destination: cell, priority: ACTION_PRIORITY.MOVE };
  }
}
