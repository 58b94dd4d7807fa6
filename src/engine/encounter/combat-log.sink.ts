import { Logger } from '@nestjs/common';
import type { EngineEvent } from '../types/engine-event.js';

/** 엔진 이벤트 → 디버그 로그 한 줄. 엔진 상태에는 접근하지 않는다 */
export function formatEngineEvent(event: EngineEvent): string {
  switch (event.type) {
    case 'TURN_STARTED':
      return `[R${event.round}] ${event.combatantId} turn started${event.canAct ? '' : ' (skipped)'}`;
    case 'ACTION_RESOLVED': {
      const { result } = event;
      const target = result.targetId ? ` -> ${result.targetId}` : '';
      const damage = result.damage !== undefined ? ` dmg=${result.damage}` : '';
      const healed = result.healed !== undefined ? ` heal=${result.healed}` : '';
      const defeated = result.defeatedIds.length > 0 ? ` defeated=${result.defeatedIds.join(',')}` : '';
      return `${event.combatantId} ${event.action.type}${target}: ${result.outcome}${damage}${healed}${defeated}`;
    }
    case 'ROUND_ADVANCED':
      return `round ${event.round}`;
    case 'PHASE_CHANGED':
      return event.summary
        ? `${event.from} -> ${event.to} (${event.summary.outcome})`
        : `${event.from} -> ${event.to}`;
    case 'WAITING_FOR_PLAYER_INPUT':
      return `waiting for ${event.combatantId}`;
  }
}

export class CombatLogSink {
  private readonly logger: Logger;

  constructor(encounterId: string) {
    this.logger = new Logger(`CombatLog:${encounterId}`);
  }

  readonly receive = (event: EngineEvent): void => {
    this.logger.debug(formatEngineEvent(event));
  };
}
