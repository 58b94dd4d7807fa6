import type { CombatAction, ActionResult } from './combat-action.js';
import type { CombatOutcome, CombatPhase } from './enums.js';
import type { EffectChange } from './status-effect.js';

export type RewardResult = {
  experience: number;
  gold: number;
};

export type CombatSummary = {
  outcome: Exclude<CombatOutcome, 'ONGOING'>;
  rounds: number;
  defeatedEnemyIds: string[];
  reward: RewardResult | null;
};

export type EngineEvent =
  | {
      type: 'TURN_STARTED';
      combatantId: string;
      round: number;
      canAct: boolean;
      effects: EffectChange[];
    }
  | {
      type: 'ACTION_RESOLVED';
      combatantId: string;
      action: CombatAction;
      result: ActionResult;
    }
  | { type: 'ROUND_ADVANCED'; round: number }
  | {
      type: 'PHASE_CHANGED';
      from: CombatPhase;
      to: CombatPhase;
      summary?: CombatSummary;
    }
  | { type: 'WAITING_FOR_PLAYER_INPUT'; combatantId: string };
