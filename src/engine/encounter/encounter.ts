// 전투 조우 1건: 단계 상태 머신 + 턴 엔진 + 행동 적용을 소유한다.
// advance() 한 번은 단계 전이 1회 또는 턴 단계 1개만 처리한다.

import { Logger } from '@nestjs/common';
import {
  ContractViolationError,
  InvalidActionError,
} from '../../common/errors/game-errors.js';
import { buildAiContext } from '../combat/ai-context.js';
import type { ActionResolverService } from '../combat/action-resolver.service.js';
import { CombatPhaseMachine, isInCombat } from '../combat/combat-phase.js';
import type { EnemyAiService } from '../combat/enemy-ai.service.js';
import { TurnEngine } from '../combat/turn-engine.js';
import type { Combatant, CombatantSnapshot } from '../combatant/combatant.js';
import type { RandomSource } from '../rng/rng.service.js';
import type { ActionResult, CombatAction, GridPosition } from '../types/combat-action.js';
import type { CombatSummary, EngineEvent, RewardResult } from '../types/engine-event.js';
import type { CombatOutcome, CombatPhase, StatusEffectKind } from '../types/enums.js';
import type { EffectChange } from '../types/status-effect.js';
import { manhattanAdjacency, type ProximityCheck } from './proximity.js';

export type EngineEventSink = (event: EngineEvent) => void;

/** 승리 시 호출되는 외부 보상 계산기 */
export type RewardCalculator = (defeated: ReadonlyArray<Combatant>) => RewardResult;

export interface EncounterDeps {
  resolver: ActionResolverService;
  ai: EnemyAiService;
  random: RandomSource;
  proximity?: ProximityCheck;
  rewards?: RewardCalculator;
}

/** COMBAT_ACTIVE 안에서의 현재 턴 진행 위치 */
type TurnState = 'START' | 'AWAITING_PLAYER' | 'AI_DECIDE';

export type EncounterSnapshot = {
  id: string;
  phase: CombatPhase;
  round: number;
  currentTurn: string | null;
  turnOrder: string[];
  awaitingPlayerInput: boolean;
  combatants: CombatantSnapshot[];
  lastSummary: CombatSummary | null;
};

export class Encounter {
  private readonly logger = new Logger(Encounter.name);
  private readonly phases = new CombatPhaseMachine();
  private readonly turns = new TurnEngine();
  private readonly sinks = new Set<EngineEventSink>();
  private readonly proximity: ProximityCheck;

  private enemies: Combatant[] = [];
  private turnState: TurnState = 'START';
  private pendingRoundAdvance = false;
  private fled = false;
  private outcome: CombatOutcome = 'ONGOING';
  private defeatedEnemies: Combatant[] = [];
  /** 마지막으로 턴이 시작된 라운드 (전투 요약용) */
  private lastTurnRound = 0;
  /** 도주 직후에는 인접 판정이 한 번 false 가 될 때까지 재교전하지 않는다 */
  private disengaged = false;
  private _lastSummary: CombatSummary | null = null;

  constructor(
    readonly id: string,
    private readonly player: Combatant,
    private readonly deps: EncounterDeps,
  ) {
    if (!player.isPlayer) {
      throw new ContractViolationError('Encounter owner must be a player combatant', {
        id: player.id,
      });
    }
    this.proximity = deps.proximity ?? manhattanAdjacency;
  }

  // --- 조회 ---

  currentPhase(): CombatPhase {
    return this.phases.phase;
  }

  currentRound(): number {
    return this.turns.round;
  }

  /** 전투 중이 아니면 null */
  currentTurnCombatant(): string | null {
    if (this.phases.phase !== 'COMBAT_ACTIVE') return null;
    return this.turns.current()?.id ?? null;
  }

  turnOrderSnapshot(): string[] {
    return this.turns.snapshot();
  }

  isAwaitingPlayerInput(): boolean {
    return this.phases.phase === 'COMBAT_ACTIVE' && this.turnState === 'AWAITING_PLAYER';
  }

  get lastSummary(): CombatSummary | null {
    return this._lastSummary;
  }

  hasCombatant(id: string): boolean {
    return this.roster().some((c) => c.id === id);
  }

  snapshot(): EncounterSnapshot {
    return {
      id: this.id,
      phase: this.phases.phase,
      round: this.turns.round,
      currentTurn: this.currentTurnCombatant(),
      turnOrder: this.turns.snapshot(),
      awaitingPlayerInput: this.isAwaitingPlayerInput(),
      combatants: this.roster().map((c) => c.snapshot()),
      lastSummary: this._lastSummary,
    };
  }

  // --- 이벤트 구독 (읽기 전용) ---

  subscribe(sink: EngineEventSink): () => void {
    this.sinks.add(sink);
    return () => {
      this.sinks.delete(sink);
    };
  }

  // --- 상태이상 ---

  applyStatusEffect(
    combatantId: string,
    kind: StatusEffectKind,
    duration: number,
    intensity: number,
  ): EffectChange {
    const combatant = this.requireCombatant(combatantId);
    return combatant.effects.apply(kind, duration, intensity, this.deps.random);
  }

  removeStatusEffect(combatantId: string, kind: StatusEffectKind): boolean {
    return this.requireCombatant(combatantId).effects.remove(kind);
  }

  queryActiveEffects(combatantId: string): StatusEffectKind[] {
    return this.requireCombatant(combatantId).effects.activeKinds();
  }

  // --- 탐험 ---

  spawnEnemies(enemies: ReadonlyArray<Combatant>): void {
    this.requireExploration('spawn enemies');
    for (const enemy of enemies) {
      if (enemy.isPlayer) {
        throw new ContractViolationError('Spawned combatant must be an enemy', { id: enemy.id });
      }
      if (this.hasCombatant(enemy.id)) {
        throw new ContractViolationError(`Duplicate combatant id: ${enemy.id}`, { id: enemy.id });
      }
      this.enemies.push(enemy);
    }
  }

  movePlayer(destination: GridPosition): void {
    this.requireExploration('move the player');
    const blocked = this.enemies.some(
      (e) => e.isAlive() && e.position.x === destination.x && e.position.y === destination.y,
    );
    if (blocked) {
      throw new InvalidActionError('Destination is occupied', { destination });
    }
    this.player.moveTo(destination);
  }

  // --- 진행 ---

  /**
   * 탐험 중 인접한 적이 없으면 undefined.
   * 플레이어 행동은 WAITING_FOR_PLAYER_INPUT 상태에서만 받는다.
   */
  advance(playerAction?: CombatAction): EngineEvent | undefined {
    if (playerAction && !this.isAwaitingPlayerInput()) {
      throw new ContractViolationError('No player turn is awaiting an action', {
        phase: this.phases.phase,
        actionType: playerAction.type,
      });
    }

    const event = this.step(playerAction);
    if (event) this.emit(event);
    return event;
  }

  private step(playerAction?: CombatAction): EngineEvent | undefined {
    switch (this.phases.phase) {
      case 'EXPLORATION':
        return this.checkEngagement();
      case 'COMBAT_INIT':
        return this.beginCombat();
      case 'COMBAT_ACTIVE':
        return this.stepActive(playerAction);
      case 'COMBAT_RESOLUTION':
        return this.resolveCombat();
      case 'COMBAT_EXIT':
        return this.exitCombat();
    }
  }

  private checkEngagement(): EngineEvent | undefined {
    if (!this.proximity(this.player, this.enemies)) {
      this.disengaged = false;
      return undefined;
    }
    if (this.disengaged) return undefined;
    return this.changePhase('COMBAT_INIT');
  }

  private beginCombat(): EngineEvent {
    this.turns.build(
      this.player,
      this.enemies.filter((e) => e.isAlive()),
    );
    this.turnState = 'START';
    this.pendingRoundAdvance = false;
    this.fled = false;
    this.outcome = 'ONGOING';
    this.defeatedEnemies = [];
    this.lastTurnRound = 0;
    this._lastSummary = null;
    this.logger.log(
      `Encounter ${this.id}: combat begins (${this.turns.snapshot().join(', ')})`,
    );
    return this.changePhase('COMBAT_ACTIVE');
  }

  private stepActive(playerAction?: CombatAction): EngineEvent {
    const outcome = this.evaluateOutcome();
    if (outcome !== 'ONGOING') {
      this.outcome = outcome;
      return this.changePhase('COMBAT_RESOLUTION');
    }

    if (this.pendingRoundAdvance) {
      this.pendingRoundAdvance = false;
      return { type: 'ROUND_ADVANCED', round: this.turns.round };
    }

    switch (this.turnState) {
      case 'START':
        return this.startTurn();
      case 'AWAITING_PLAYER':
        if (!playerAction) {
          return { type: 'WAITING_FOR_PLAYER_INPUT', combatantId: this.player.id };
        }
        return this.act(this.player, playerAction);
      case 'AI_DECIDE':
        return this.actByAi();
    }
  }

  private startTurn(): EngineEvent {
    const { combatant, canAct, effects } = this.turns.startTurn(this.deps.random);
    const round = this.turns.round;
    this.lastTurnRound = round;

    if (!canAct) {
      this.finishTurn();
    } else {
      this.turnState = combatant.isPlayer ? 'AWAITING_PLAYER' : 'AI_DECIDE';
    }
    return { type: 'TURN_STARTED', combatantId: combatant.id, round, canAct, effects };
  }

  private actByAi(): EngineEvent {
    const actor = this.requireCurrent();
    const participants = this.turns.participants();
    const ctx = buildAiContext({
      actor,
      participants,
      round: this.turns.round,
      turn: this.turns.turn,
    });

    let action = this.deps.ai.decide(ctx, this.deps.random);
    try {
      this.deps.resolver.validate(action, { actor, participants, random: this.deps.random });
    } catch (err) {
      if (!(err instanceof InvalidActionError)) throw err;
      this.logger.warn(`AI action rejected for ${actor.id} (${err.message}); waiting instead`);
      action = { type: 'WAIT', priority: 0 };
    }
    return this.act(actor, action);
  }

  /** 검증 실패 시 아무 것도 바뀌지 않고 같은 턴에 머문다 */
  private act(actor: Combatant, action: CombatAction): EngineEvent {
    const result: ActionResult = this.deps.resolver.resolve(action, {
      actor,
      participants: this.turns.participants(),
      random: this.deps.random,
    });
    if (result.outcome === 'FLED') this.fled = true;

    this.finishTurn();
    return { type: 'ACTION_RESOLVED', combatantId: actor.id, action, result };
  }

  /** 턴 종료 → 전투불능자 제거 (제거가 턴 순서 보정을 맡는다) */
  private finishTurn(): void {
    const { roundAdvanced } = this.turns.endTurn();
    if (roundAdvanced) this.pendingRoundAdvance = true;

    for (const combatant of this.turns.participants()) {
      if (combatant.isAlive()) continue;
      if (this.turns.remove(combatant.id)) this.pendingRoundAdvance = true;
      if (!combatant.isPlayer) this.defeatedEnemies.push(combatant);
    }
    this.turnState = 'START';
  }

  private evaluateOutcome(): CombatOutcome {
    if (!this.player.isAlive()) return 'DEFEAT';
    if (this.fled) return 'FLED';
    if (this.enemies.every((e) => !e.isAlive())) return 'VICTORY';
    return 'ONGOING';
  }

  private resolveCombat(): EngineEvent {
    const outcome = this.outcome;
    if (outcome === 'ONGOING') {
      throw new ContractViolationError('Resolution reached without an outcome');
    }
    const reward =
      outcome === 'VICTORY' && this.deps.rewards ? this.deps.rewards(this.defeatedEnemies) : null;
    const summary: CombatSummary = {
      outcome,
      rounds: this.lastTurnRound,
      defeatedEnemyIds: this.defeatedEnemies.map((e) => e.id),
      reward,
    };
    this._lastSummary = summary;
    this.logger.log(
      `Encounter ${this.id}: ${summary.outcome} after ${summary.rounds} round(s)` +
        (reward ? `, +${reward.experience} exp, +${reward.gold} gold` : ''),
    );
    return this.changePhase('COMBAT_EXIT', summary);
  }

  /** 전투 한정 상태 정리 후 탐험으로 */
  private exitCombat(): EngineEvent {
    this.turns.clear();
    this.turnState = 'START';
    this.pendingRoundAdvance = false;
    for (const combatant of this.roster()) combatant.resetCombatState();
    this.enemies = this.enemies.filter((e) => e.isAlive());
    this.disengaged = this.outcome === 'FLED';
    this.fled = false;
    this.outcome = 'ONGOING';
    this.defeatedEnemies = [];
    return this.changePhase('EXPLORATION');
  }

  private changePhase(to: CombatPhase, summary?: CombatSummary): EngineEvent {
    const { from } = this.phases.transition(to);
    return summary
      ? { type: 'PHASE_CHANGED', from, to, summary }
      : { type: 'PHASE_CHANGED', from, to };
  }

  private emit(event: EngineEvent): void {
    for (const sink of this.sinks) sink(event);
  }

  private roster(): Combatant[] {
    return [this.player, ...this.enemies];
  }

  private requireCombatant(id: string): Combatant {
    const combatant = this.roster().find((c) => c.id === id);
    if (!combatant) {
      throw new ContractViolationError(`Unknown combatant: ${id}`, { id });
    }
    return combatant;
  }

  private requireCurrent(): Combatant {
    const current = this.turns.current();
    if (!current) {
      throw new ContractViolationError('No combatant holds the current turn');
    }
    return current;
  }

  private requireExploration(what: string): void {
    if (isInCombat(this.phases.phase)) {
      throw new InvalidActionError(`Cannot ${what} during ${this.phases.phase}`, {
        phase: this.phases.phase,
      });
    }
  }
}
