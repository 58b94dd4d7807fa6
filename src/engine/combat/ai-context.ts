// AI 판단 입력: 판단 시점의 읽기 전용 스냅샷. 행동 선택은 이 값만 본다

import { ContractViolationError } from '../../common/errors/game-errors.js';
import type { AbilityDefinition, AiProfile } from '../../content/content.types.js';
import { type Combatant, type CombatGates, manhattan } from '../combatant/combatant.js';
import type { GridPosition } from '../types/combat-action.js';
import type { CombatSide, StatusEffectKind } from '../types/enums.js';

export type AiCombatantView = Readonly<{
  id: string;
  side: CombatSide;
  health: number;
  maxHealth: number;
  healthRatio: number;
  position: Readonly<GridPosition>;
  attackRange: number;
  gates: CombatGates;
  effects: ReadonlyArray<StatusEffectKind>;
}>;

export type AiSelfView = AiCombatantView &
  Readonly<{
    mana: number;
    profile: AiProfile;
    /** 쿨다운 0 + 마나 충분한 능력만 */
    readyAbilities: ReadonlyArray<AbilityDefinition>;
    defendReady: boolean;
  }>;

export type AiContext = Readonly<{
  self: AiSelfView;
  /** 가장 가까운 생존 적대 전투원 (동률이면 턴 순서 우선) */
  target: AiCombatantView | null;
  allies: ReadonlyArray<AiCombatantView>;
  opponents: ReadonlyArray<AiCombatantView>;
  round: number;
  turn: number;
}>;

export interface AiContextInput {
  actor: Combatant;
  participants: ReadonlyArray<Combatant>;
  round: number;
  turn: number;
}

function viewOf(c: Combatant): AiCombatantView {
  return Object.freeze({
    id: c.id,
    side: c.side,
    health: c.health,
    maxHealth: c.maxHealth,
    healthRatio: c.healthRatio(),
    position: Object.freeze(c.position),
    attackRange: c.attackRange,
    gates: c.gates,
    effects: Object.freeze(c.effects.activeKinds()),
  });
}

export function buildAiContext(input: AiContextInput): AiContext {
  const { actor, participants } = input;
  const profile = actor.ai;
  if (!profile) {
    throw new ContractViolationError(`Combatant has no AI profile: ${actor.id}`, {
      id: actor.id,
    });
  }
  const others = participants.filter((c) => c !== actor && c.isAlive());
  const allies = others.filter((c) => c.side === actor.side).map(viewOf);
  const opponents = others.filter((c) => c.side !== actor.side).map(viewOf);

  let target: AiCombatantView | null = null;
  for (const candidate of opponents) {
    if (
      !target ||
      manhattan(actor.position, candidate.position) < manhattan(actor.position, target.position)
    ) {
      target = candidate;
    }
  }

  const self: AiSelfView = Object.freeze({
    ...viewOf(actor),
    mana: actor.mana,
    profile: Object.freeze({ ...profile }),
    readyAbilities: Object.freeze(
      actor.listAbilities().filter((a) => actor.isAbilityReady(a.abilityId)),
    ),
    defendReady: actor.isDefendReady(),
  });

  return Object.freeze({
    self,
    target,
    allies: Object.freeze(allies),
    opponents: Object.freeze(opponents),
    round: input.round,
    turn: input.turn,
  });
}

/** 살아 있는 다른 전투원이 서 있는 칸 */
export function isOccupied(ctx: AiContext, cell: GridPosition): boolean {
  return [...ctx.allies, ...ctx.opponents].some(
    (c) => c.position.x === cell.x && c.position.y === cell.y,
  );
}
