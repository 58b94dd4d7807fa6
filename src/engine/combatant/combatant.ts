import { ContractViolationError } from '../../common/errors/game-errors.js';
import type { AbilityDefinition, AiProfile } from '../../content/content.types.js';
import type { RandomSource } from '../rng/rng.service.js';
import { EffectStore, type EffectOwner } from '../status/effect-store.js';
import type { StatusService } from '../status/status.service.js';
import type { CombatSide, StatusEffectKind } from '../types/enums.js';
import type { GridPosition } from '../types/combat-action.js';
import type { StatusEffectInstance } from '../types/status-effect.js';

export interface CombatantInit {
  id: string;
  name: string;
  side: CombatSide;
  maxHealth: number;
  health?: number;
  /** 0 이면 마나 없음 */
  maxMana?: number;
  mana?: number;
  manaRegen?: number;
  attackPower: number;
  attackRange: number;
  position: GridPosition;
  abilities?: AbilityDefinition[];
  ai?: AiProfile;
  archetypeId?: string;
}

/** 활성 효과에서 매번 다시 계산되는 행동 게이트 */
export type CombatGates = Readonly<{
  paralyzed: boolean;
  blinded: boolean;
  confused: boolean;
  hasted: boolean;
  slowed: boolean;
  strengthened: boolean;
  weakened: boolean;
  protected: boolean;
}>;

export type CombatantSnapshot = {
  id: string;
  name: string;
  side: CombatSide;
  archetypeId: string | null;
  health: number;
  maxHealth: number;
  mana: number;
  maxMana: number;
  position: GridPosition;
  alive: boolean;
  gates: CombatGates;
  effects: StatusEffectInstance[];
  cooldowns: Record<string, number>;
};

// 0.1 단위 배율 곱셈 오차로 한 칸 내려가는 것 방지
const FLOOR_EPSILON = 1e-9;

function floorAmount(value: number): number {
  return Math.max(0, Math.floor(value + FLOOR_EPSILON));
}

/** 능력 쿨다운과 같은 맵에 둔다. 능력 id 는 소문자 snake_case 라 겹치지 않는다 */
export const DEFEND_COOLDOWN_KEY = 'DEFEND';

export function manhattan(a: GridPosition, b: GridPosition): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export class Combatant implements EffectOwner {
  readonly id: string;
  readonly name: string;
  readonly side: CombatSide;
  readonly archetypeId?: string;
  readonly maxHealth: number;
  readonly maxMana: number;
  readonly manaRegen: number;
  readonly attackPower: number;
  readonly attackRange: number;
  readonly ai?: AiProfile;
  readonly effects: EffectStore;

  private _health: number;
  private _mana: number;
  private _position: GridPosition;
  private readonly abilities: ReadonlyMap<string, AbilityDefinition>;
  private readonly cooldowns = new Map<string, number>();

  constructor(init: CombatantInit, registry: StatusService) {
    if (init.maxHealth <= 0) {
      throw new ContractViolationError('maxHealth must be positive', { id: init.id });
    }
    this.id = init.id;
    this.name = init.name;
    this.side = init.side;
    this.archetypeId = init.archetypeId;
    this.maxHealth = init.maxHealth;
    this.maxMana = init.maxMana ?? 0;
    this.manaRegen = init.manaRegen ?? 0;
    this.attackPower = init.attackPower;
    this.attackRange = init.attackRange;
    this.ai = init.ai;
    this._health = Math.min(init.health ?? init.maxHealth, init.maxHealth);
    this._mana = Math.min(init.mana ?? this.maxMana, this.maxMana);
    this._position = { ...init.position };
    this.abilities = new Map((init.abilities ?? []).map((a) => [a.abilityId, a]));
    this.effects = new EffectStore(registry);
  }

  get health(): number {
    return this._health;
  }

  get mana(): number {
    return this._mana;
  }

  get position(): GridPosition {
    return { ...this._position };
  }

  get isPlayer(): boolean {
    return this.side === 'PLAYER';
  }

  isAlive(): boolean {
    return this._health > 0;
  }

  healthRatio(): number {
    return this._health / this.maxHealth;
  }

  get gates(): CombatGates {
    const has = (kind: StatusEffectKind) => this.effects.has(kind);
    return {
      paralyzed: has('PARALYSIS'),
      blinded: has('BLINDNESS'),
      confused: has('CONFUSION'),
      hasted: has('HASTE'),
      slowed: has('SLOW'),
      strengthened: has('STRENGTH'),
      weakened: has('WEAKNESS'),
      protected: has('PROTECTION'),
    };
  }

  /** 마비면 불가, 둔화면 skip 확률만큼 1회 판정 */
  canAct(random: RandomSource): boolean {
    const gates = this.gates;
    if (gates.paralyzed) return false;
    if (gates.slowed) {
      const { magnitude } = this.effects.policy('SLOW');
      const skipChance = magnitude.type === 'SKIP_CHANCE' ? magnitude.chance : 0;
      return !(random.next() < skipChance);
    }
    return true;
  }

  /** 실제 감소한 HP 를 돌려준다 */
  takeDamage(amount: number, ignoreProtection: boolean = false): number {
    let damage = floorAmount(amount);
    if (!ignoreProtection && this.effects.has('PROTECTION')) {
      const { magnitude } = this.effects.policy('PROTECTION');
      const perIntensity = magnitude.type === 'DAMAGE_REDUCTION' ? magnitude.perIntensity : 0;
      const factor = Math.max(0, 1 - perIntensity * this.effects.intensityOf('PROTECTION'));
      damage = floorAmount(damage * factor);
    }
    const before = this._health;
    this._health = Math.max(0, this._health - damage);
    return before - this._health;
  }

  /** 실제 회복량 (max 초과분 제외) */
  heal(amount: number): number {
    if (!this.isAlive()) return 0;
    const before = this._health;
    this._health = Math.min(this.maxHealth, this._health + floorAmount(amount));
    return this._health - before;
  }

  /** STRENGTH/WEAKNESS 배율은 곱으로 합쳐지고 0 미만으로 내려가지 않는다 */
  effectiveDamageOutput(base: number): number {
    let multiplier = 1;
    for (const kind of ['STRENGTH', 'WEAKNESS'] as const) {
      if (!this.effects.has(kind)) continue;
      const { magnitude } = this.effects.policy(kind);
      if (magnitude.type !== 'DAMAGE_MULTIPLIER') continue;
      multiplier *= 1 + magnitude.perIntensity * this.effects.intensityOf(kind);
    }
    return floorAmount(base * Math.max(0, multiplier));
  }

  regenerateMana(): number {
    const before = this._mana;
    this._mana = Math.min(this.maxMana, this._mana + this.manaRegen);
    return this._mana - before;
  }

  spendMana(cost: number): void {
    if (cost > this._mana) {
      throw new ContractViolationError('Mana spent without validation', {
        id: this.id,
        cost,
        mana: this._mana,
      });
    }
    this._mana -= cost;
  }

  moveTo(position: GridPosition): void {
    this._position = { ...position };
  }

  getAbility(abilityId: string): AbilityDefinition | undefined {
    return this.abilities.get(abilityId);
  }

  listAbilities(): AbilityDefinition[] {
    return [...this.abilities.values()];
  }

  cooldownOf(abilityId: string): number {
    return this.cooldowns.get(abilityId) ?? 0;
  }

  /** 쿨다운 0 + 마나 충분 */
  isAbilityReady(abilityId: string): boolean {
    const ability = this.abilities.get(abilityId);
    if (!ability) return false;
    return this.cooldownOf(abilityId) === 0 && this._mana >= ability.manaCost;
  }

  startCooldown(ability: AbilityDefinition): void {
    this.setCooldown(ability.abilityId, ability.cooldown);
  }

  isDefendReady(): boolean {
    return this.cooldownOf(DEFEND_COOLDOWN_KEY) === 0;
  }

  startDefendCooldown(turns: number): void {
    this.setCooldown(DEFEND_COOLDOWN_KEY, turns);
  }

  private setCooldown(key: string, turns: number): void {
    if (turns > 0) this.cooldowns.set(key, turns);
  }

  /** 자기 턴 종료 시 1회. HASTE 면 추가 감소 */
  tickCooldowns(): void {
    let ticks = 1;
    if (this.effects.has('HASTE')) {
      const { magnitude } = this.effects.policy('HASTE');
      if (magnitude.type === 'COOLDOWN_HASTE') ticks += magnitude.extraTicks;
    }
    for (const [abilityId, remaining] of this.cooldowns) {
      const next = remaining - ticks;
      if (next <= 0) this.cooldowns.delete(abilityId);
      else this.cooldowns.set(abilityId, next);
    }
  }

  /** 전투 종료 시 전투 한정 상태 정리 */
  resetCombatState(): void {
    this.effects.clearAll();
    this.cooldowns.clear();
  }

  snapshot(): CombatantSnapshot {
    return {
      id: this.id,
      name: this.name,
      side: this.side,
      archetypeId: this.archetypeId ?? null,
      health: this._health,
      maxHealth: this.maxHealth,
      mana: this._mana,
      maxMana: this.maxMana,
      position: this.position,
      alive: this.isAlive(),
      gates: this.gates,
      effects: this.effects.snapshot(),
      cooldowns: Object.fromEntries(this.cooldowns),
    };
  }
}
