import { ContractViolationError } from '../../common/errors/game-errors.js';
import type { CombatPhase } from '../types/enums.js';

/** 허용되는 유일한 다음 단계. 건너뛰기는 없다 */
export const NEXT_PHASE: Readonly<Record<CombatPhase, CombatPhase>> = {
  EXPLORATION: 'COMBAT_INIT',
  COMBAT_INIT: 'COMBAT_ACTIVE',
  COMBAT_ACTIVE: 'COMBAT_RESOLUTION',
  COMBAT_RESOLUTION: 'COMBAT_EXIT',
  COMBAT_EXIT: 'EXPLORATION',
};

export function isInCombat(phase: CombatPhase): boolean {
  return phase !== 'EXPLORATION';
}

export class CombatPhaseMachine {
  private _phase: CombatPhase = 'EXPLORATION';

  get phase(): CombatPhase {
    return this._phase;
  }

  canTransition(to: CombatPhase): boolean {
    return NEXT_PHASE[this._phase] === to;
  }

  /** 한 단계 전이. 표에 없는 전이는 호출 측 버그 */
  transition(to: CombatPhase): { from: CombatPhase; to: CombatPhase } {
    const from = this._phase;
    if (!this.canTransition(to)) {
      throw new ContractViolationError(`Illegal phase transition: ${from} -> ${to}`, {
        from,
        to,
      });
    }
    this._phase = to;
    return { from, to };
  }
}
