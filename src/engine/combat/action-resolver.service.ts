// CombatAction 검증 + 적용. 검증 단계는 상태도 RNG 도 건드리지 않는다

import { Injectable } from '@nestjs/common';
import {
  ContractViolationError,
  InvalidActionError,
} from '../../common/errors/game-errors.js';
import type { AbilityDefinition } from '../../content/content.types.js';
import { CombatConfigService } from '../config/combat-config.service.js';
import { type Combatant, DEFEND_COOLDOWN_KEY, manhattan } from '../combatant/combatant.js';
import type { RandomSource } from '../rng/rng.service.js';
import type { ActionResult, CombatAction } from '../types/combat-action.js';
import type { EffectChange } from '../types/status-effect.js';

export interface ResolveContext {
  actor: Combatant;
  /** 현재 턴 순서에 있는 전투원 전체 */
  participants: ReadonlyArray<Combatant>;
  random: RandomSource;
}

type Validated =
  | { type: 'ATTACK'; target: Combatant }
  | { type: 'ABILITY'; ability: AbilityDefinition; target: Combatant }
  | { type: 'OTHER' };

@Injectable()
export class ActionResolverService {
  constructor(private readonly configService: CombatConfigService) {}

  /** 전제조건 실패 시 InvalidActionError, 호출 계약 위반 시 ContractViolationError */
  validate(action: CombatAction, ctx: ResolveContext): void {
    this.check(action, ctx);
  }

  resolve(action: CombatAction, ctx: ResolveContext): ActionResult {
    const validated = this.check(action, ctx);
    const aliveBefore = ctx.participants.filter((c) => c.isAlive());

    const result = this.apply(action, validated, ctx);
    result.defeatedIds = aliveBefore.filter((c) => !c.isAlive()).map((c) => c.id);
    return result;
  }

  private check(action: CombatAction, ctx: ResolveContext): Validated {
    const { actor } = ctx;
    if (!ctx.participants.includes(actor)) {
      throw new ContractViolationError('Actor is not in turn order', { actorId: actor.id });
    }

    switch (action.type) {
      case 'ATTACK': {
        const target = this.findTarget(action.targetId, ctx);
        if (target === actor) {
          throw new InvalidActionError('Cannot attack yourself', { targetId: target.id });
        }
        if (!target.isAlive()) {
          throw new InvalidActionError('Target is already defeated', { targetId: target.id });
        }
        const distance = manhattan(actor.position, target.position);
        if (distance > actor.attackRange) {
          throw new InvalidActionError('Target is out of attack range', {
            targetId: target.id,
            distance,
            range: actor.attackRange,
          });
        }
        return { type: 'ATTACK', target };
      }

      case 'USE_ABILITY': {
        const ability = actor.getAbility(action.abilityId);
        if (!ability) {
          throw new InvalidActionError(`Unknown ability: ${action.abilityId}`, {
            abilityId: action.abilityId,
          });
        }
        const cooldown = actor.cooldownOf(ability.abilityId);
        if (cooldown > 0) {
          throw new InvalidActionError('Ability is on cooldown', {
            abilityId: ability.abilityId,
            cooldown,
          });
        }
        if (actor.mana < ability.manaCost) {
          throw new InvalidActionError('Not enough mana', {
            abilityId: ability.abilityId,
            mana: actor.mana,
            manaCost: ability.manaCost,
          });
        }
        const target = this.findTarget(action.targetId, ctx);
        this.checkAbilityTarget(ability, actor, target);
        return { type: 'ABILITY', ability, target };
      }

      case 'MOVE': {
        const { destination } = action;
        if (!Number.isInteger(destination.x) || !Number.isInteger(destination.y)) {
          throw new InvalidActionError('Destination must be a grid cell', { destination });
        }
        if (manhattan(actor.position, destination) !== 1) {
          throw new InvalidActionError('Destination must be an adjacent cell', {
            from: actor.position,
            destination,
          });
        }
        const blocker = ctx.participants.find(
          (c) =>
            c !== actor &&
            c.isAlive() &&
            c.position.x === destination.x &&
            c.position.y === destination.y,
        );
        if (blocker) {
          throw new InvalidActionError('Destination is occupied', {
            destination,
            occupantId: blocker.id,
          });
        }
        return { type: 'OTHER' };
      }

      case 'FLEE':
        if (!actor.isPlayer) {
          throw new InvalidActionError('Only the player can flee', { actorId: actor.id });
        }
        return { type: 'OTHER' };

      case 'DEFEND': {
        const cooldown = actor.cooldownOf(DEFEND_COOLDOWN_KEY);
        if (cooldown > 0) {
          throw new InvalidActionError('Defend is on cooldown', { cooldown });
        }
        return { type: 'OTHER' };
      }

      case 'WAIT':
        return { type: 'OTHER' };
    }
  }

  private checkAbilityTarget(
    ability: AbilityDefinition,
    actor: Combatant,
    target: Combatant,
  ): void {
    switch (ability.target) {
      case 'SELF':
        if (target !== actor) {
          throw new InvalidActionError('Ability can only target yourself', {
            abilityId: ability.abilityId,
          });
        }
        break;
      case 'ALLY':
        if (target.side !== actor.side) {
          throw new InvalidActionError('Ability must target an ally', {
            abilityId: ability.abilityId,
            targetId: target.id,
          });
        }
        break;
      case 'ENEMY':
        if (target.side === actor.side) {
          throw new InvalidActionError('Ability must target an opponent', {
            abilityId: ability.abilityId,
            targetId: target.id,
          });
        }
        break;
    }
    if (!target.isAlive()) {
      throw new InvalidActionError('Target is already defeated', { targetId: target.id });
    }
    const distance = manhattan(actor.position, target.position);
    if (distance > ability.range) {
      throw new InvalidActionError('Target is out of ability range', {
        abilityId: ability.abilityId,
        distance,
        range: ability.range,
      });
    }
  }

  private findTarget(targetId: string, ctx: ResolveContext): Combatant {
    const target = ctx.participants.find((c) => c.id === targetId);
    if (!target) {
      throw new ContractViolationError(`Target is not in turn order: ${targetId}`, {
        targetId,
      });
    }
    return target;
  }

  private apply(action: CombatAction, validated: Validated, ctx: ResolveContext): ActionResult {
    const { actor, random } = ctx;
    const config = this.configService.get();

    switch (action.type) {
      case 'ATTACK': {
        if (validated.type !== 'ATTACK') break;
        return this.applyAttack(actor, validated.target, random);
      }

      case 'USE_ABILITY': {
        if (validated.type !== 'ABILITY') break;
        return this.applyAbility(actor, validated.ability, validated.target, random);
      }

      case 'DEFEND': {
        const change = actor.effects.apply(
          'PROTECTION',
          config.defend.duration,
          config.defend.intensity,
          random,
        );
        actor.startDefendCooldown(config.defend.cooldown);
        return { outcome: 'DEFENDED', targetId: actor.id, effects: [change], defeatedIds: [] };
      }

      case 'MOVE':
        actor.moveTo(action.destination);
        return { outcome: 'MOVED', effects: [], defeatedIds: [] };

      case 'WAIT':
        return { outcome: 'WAITED', effects: [], defeatedIds: [] };

      case 'FLEE': {
        const escaped = random.next() < config.fleeChance;
        return { outcome: escaped ? 'FLED' : 'FLEE_FAILED', effects: [], defeatedIds: [] };
      }
    }
    throw new ContractViolationError('Action and validation result diverged', {
      type: action.type,
    });
  }

  /** BLINDNESS 빗나감 판정 → CONFUSION 자해 판정 → 명중 */
  private applyAttack(actor: Combatant, target: Combatant, random: RandomSource): ActionResult {
    if (actor.effects.has('BLINDNESS')) {
      const { magnitude } = actor.effects.policy('BLINDNESS');
      const missChance = magnitude.type === 'ACCURACY_PENALTY' ? magnitude.missChance : 0;
      if (random.next() < missChance) {
        return { outcome: 'MISS', targetId: target.id, effects: [], defeatedIds: [] };
      }
    }

    const outgoing = actor.effectiveDamageOutput(actor.attackPower);

    if (actor.effects.has('CONFUSION')) {
      const { magnitude } = actor.effects.policy('CONFUSION');
      const selfHitChance = magnitude.type === 'MISDIRECTION' ? magnitude.selfHitChance : 0;
      if (random.next() < selfHitChance) {
        const damage = actor.takeDamage(outgoing);
        return { outcome: 'SELF_HIT', targetId: actor.id, damage, effects: [], defeatedIds: [] };
      }
    }

    const damage = target.takeDamage(outgoing);
    return { outcome: 'HIT', targetId: target.id, damage, effects: [], defeatedIds: [] };
  }

  private applyAbility(
    actor: Combatant,
    ability: AbilityDefinition,
    target: Combatant,
    random: RandomSource,
  ): ActionResult {
    actor.spendMana(ability.manaCost);
    actor.startCooldown(ability);

    const result: ActionResult = {
      outcome: 'ABILITY_USED',
      targetId: target.id,
      effects: [],
      defeatedIds: [],
    };
    const { effect } = ability;
    switch (effect.type) {
      case 'DAMAGE':
        result.damage = target.takeDamage(effect.amount);
        break;
      case 'HEAL':
        result.healed = target.heal(effect.amount);
        break;
      case 'STATUS':
        result.effects.push(
          target.effects.apply(effect.kind, effect.duration, effect.intensity, random),
        );
        break;
      case 'CURE': {
        const removed = target.effects.remove(effect.kind);
        if (removed) {
          const change: EffectChange = { kind: effect.kind, op: 'REMOVED' };
          result.effects.push(change);
        }
        break;
      }
    }
    return result;
  }
}
