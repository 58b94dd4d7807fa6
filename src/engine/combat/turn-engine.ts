import { ContractViolationError } from '../../common/errors/game-errors.js';
import type { Combatant } from '../combatant/combatant.js';
import type { RandomSource } from '../rng/rng.service.js';
import type { EffectChange } from '../types/status-effect.js';

export interface TurnStart {
  combatant: Combatant;
  canAct: boolean;
  manaRestored: number;
  effects: EffectChange[];
}

export interface TurnEnd {
  combatant: Combatant;
  effects: EffectChange[];
  roundAdvanced: boolean;
}

/**
 * 턴 순서 + 라운드 카운터.
 * 순서는 전투 시작 시 한 번 만들어지고, 이후에는 전투불능자 제거로만 바뀐다.
 */
export class TurnEngine {
  private order: Combatant[] = [];
  private index = 0;
  private _round = 0;
  private _turn = 0;

  /** 플레이어가 항상 맨 앞, 적은 스폰 순서 */
  build(player: Combatant, enemies: ReadonlyArray<Combatant>): void {
    if (!player.isPlayer) {
      throw new ContractViolationError('First combatant must be the player', { id: player.id });
    }
    this.order = [player, ...enemies.filter((e) => e.isAlive())];
    this.index = 0;
    this._round = 1;
    this._turn = 0;
  }

  get round(): number {
    return this._round;
  }

  /** 이번 전투에서 시작된 턴 수 */
  get turn(): number {
    return this._turn;
  }

  get size(): number {
    return this.order.length;
  }

  current(): Combatant | undefined {
    return this.order[this.index];
  }

  participants(): ReadonlyArray<Combatant> {
    return [...this.order];
  }

  snapshot(): string[] {
    return this.order.map((c) => c.id);
  }

  /** 마나 회복 → 턴 시작 효과 → 행동 가능 판정 */
  startTurn(random: RandomSource): TurnStart {
    const combatant = this.requireCurrent();
    this._turn++;
    const manaRestored = combatant.regenerateMana();
    const effects = combatant.effects.tickTurnStart(combatant);
    const canAct = combatant.isAlive() && combatant.canAct(random);
    return { combatant, canAct, manaRestored, effects };
  }

  /** 현재 전투원의 턴 종료 처리 후 다음 칸으로. 0 으로 돌아오면 라운드 증가 */
  endTurn(): TurnEnd {
    const combatant = this.requireCurrent();
    const effects = combatant.effects.tickTurnEnd();
    combatant.tickCooldowns();

    this.index = (this.index + 1) % this.order.length;
    const roundAdvanced = this.index === 0;
    if (roundAdvanced) this._round++;
    return { combatant, effects, roundAdvanced };
  }

  /**
   * 전투불능자 제거. 남은 순서는 유지되고 다음 차례였던 전투원이 그대로 다음이 된다.
   * 제거로 라운드 경계를 넘었으면 true.
   */
  remove(id: string): boolean {
    const removedAt = this.order.findIndex((c) => c.id === id);
    if (removedAt === -1) {
      throw new ContractViolationError(`Combatant is not in turn order: ${id}`, { id });
    }
    this.order.splice(removedAt, 1);

    if (removedAt < this.index) {
      this.index--;
      return false;
    }
    if (this.order.length > 0 && this.index >= this.order.length) {
      this.index = 0;
      this._round++;
      return true;
    }
    return false;
  }

  has(id: string): boolean {
    return this.order.some((c) => c.id === id);
  }

  clear(): void {
    this.order = [];
    this.index = 0;
    this._round = 0;
    this._turn = 0;
  }

  private requireCurrent(): Combatant {
    const combatant = this.current();
    if (!combatant) {
      throw new ContractViolationError('Turn order is empty');
    }
    return combatant;
  }
}
