// 조우 레지스트리 (인메모리) + 컨텐츠 → 전투원 조립

import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  InvalidInputError,
  NotFoundError,
} from '../common/errors/game-errors.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import type { EnemyArchetype } from '../content/content.types.js';
import { ActionResolverService } from '../engine/combat/action-resolver.service.js';
import { EnemyAiService } from '../engine/combat/enemy-ai.service.js';
import { Combatant } from '../engine/combatant/combatant.js';
import { CombatConfigService } from '../engine/config/combat-config.service.js';
import { CombatLogSink } from '../engine/encounter/combat-log.sink.js';
import { Encounter, type EncounterSnapshot } from '../engine/encounter/encounter.js';
import { RewardsService, type EnemyReward } from '../engine/rewards/rewards.service.js';
import { type Rng, RngService, type RngState } from '../engine/rng/rng.service.js';
import { isStatusEffectKind, StatusService } from '../engine/status/status.service.js';
import type { CombatAction } from '../engine/types/combat-action.js';
import type { EngineEvent } from '../engine/types/engine-event.js';
import type { StatusEffectKind } from '../engine/types/enums.js';
import type { EffectChange, StatusEffectInstance } from '../engine/types/status-effect.js';
import type {
  ApplyEffectBody,
  CreateEncounterBody,
  MovePlayerBody,
  SpawnEnemiesBody,
} from './dto/encounter.dto.js';

interface EncounterEntry {
  encounter: Encounter;
  rng: Rng;
  seed: string;
  /** 이 조우에서 끝난 전투 수 (보상 RNG 시드 분리용) */
  combatsFinished: number;
}

export type EncounterView = EncounterSnapshot & { rng: RngState };

@Injectable()
export class EncountersService {
  private readonly logger = new Logger(EncountersService.name);
  private readonly entries = new Map<string, EncounterEntry>();

  constructor(
    private readonly content: ContentLoaderService,
    private readonly configService: CombatConfigService,
    private readonly registry: StatusService,
    private readonly resolver: ActionResolverService,
    private readonly ai: EnemyAiService,
    private readonly rewards: RewardsService,
    private readonly rngService: RngService,
  ) {}

  create(body: CreateEncounterBody): EncounterView {
    const encounterId = randomUUID();
    const seed = body.seed ?? `${this.configService.get().defaultSeed}:${encounterId}`;
    const rng = this.rngService.create(seed);

    const defaults = this.content.getPlayerDefaults();
    const player = new Combatant(
      {
        id: 'player',
        name: body.playerName ?? defaults.name,
        side: 'PLAYER',
        maxHealth: defaults.maxHealth,
        maxMana: defaults.maxMana,
        manaRegen: defaults.manaRegen,
        attackPower: defaults.attackPower,
        attackRange: defaults.attackRange,
        position: body.position,
        abilities: this.content.resolveAbilities(defaults.abilities),
      },
      this.registry,
    );

    const entry: EncounterEntry = {
      encounter: new Encounter(encounterId, player, {
        resolver: this.resolver,
        ai: this.ai,
        random: rng,
        rewards: (defeated) => {
          const combatIndex = entry.combatsFinished++;
          return this.rewards.calculateCombatRewards({
            seed: `${seed}#${combatIndex}`,
            defeated: defeated.map((c) => this.rewardOf(c.archetypeId)),
          });
        },
      }),
      rng,
      seed,
      combatsFinished: 0,
    };
    entry.encounter.subscribe(new CombatLogSink(encounterId).receive);
    this.entries.set(encounterId, entry);

    this.logger.log(`Encounter created: ${encounterId} (seed=${seed})`);
    return this.view(entry);
  }

  get(encounterId: string): EncounterView {
    return this.view(this.requireEntry(encounterId));
  }

  spawnEnemies(encounterId: string, body: SpawnEnemiesBody): EncounterView {
    const entry = this.requireEntry(encounterId);
    const { encounter } = entry;

    const taken = new Set<string>();
    const enemies = body.enemies.map((spec) => {
      const archetype = this.requireArchetype(spec.archetypeId);
      const id = spec.id ?? this.nextEnemyId(encounter, archetype, taken);
      if (encounter.hasCombatant(id) || taken.has(id)) {
        throw new InvalidInputError(`Combatant id already in use: ${id}`, { id });
      }
      taken.add(id);
      return new Combatant(
        {
          id,
          name: archetype.name,
          side: 'ENEMY',
          archetypeId: archetype.archetypeId,
          maxHealth: archetype.maxHealth,
          maxMana: archetype.maxMana,
          manaRegen: archetype.manaRegen,
          attackPower: archetype.attackPower,
          attackRange: archetype.attackRange,
          position: spec.position,
          abilities: this.content.resolveAbilities(archetype.abilities),
          ai: archetype.ai,
        },
        this.registry,
      );
    });

    encounter.spawnEnemies(enemies);
    return this.view(entry);
  }

  movePlayer(encounterId: string, body: MovePlayerBody): EncounterView {
    const entry = this.requireEntry(encounterId);
    entry.encounter.movePlayer(body.destination);
    return this.view(entry);
  }

  advance(
    encounterId: string,
    action?: CombatAction,
  ): { event: EngineEvent | null; state: EncounterView } {
    const entry = this.requireEntry(encounterId);
    const event = entry.encounter.advance(action);
    return { event: event ?? null, state: this.view(entry) };
  }

  listEffects(
    encounterId: string,
    combatantId: string,
  ): { combatantId: string; kinds: StatusEffectKind[]; effects: StatusEffectInstance[] } {
    const { encounter } = this.requireEntry(encounterId);
    this.requireCombatant(encounter, combatantId);
    const kinds = encounter.queryActiveEffects(combatantId);
    const combatant = encounter
      .snapshot()
      .combatants.find((c) => c.id === combatantId);
    return { combatantId, kinds, effects: combatant?.effects ?? [] };
  }

  applyEffect(
    encounterId: string,
    combatantId: string,
    body: ApplyEffectBody,
  ): { change: EffectChange; kinds: StatusEffectKind[] } {
    const { encounter } = this.requireEntry(encounterId);
    this.requireCombatant(encounter, combatantId);
    const policy = this.registry.getPolicy(body.kind);
    const change = encounter.applyStatusEffect(
      combatantId,
      body.kind,
      body.duration ?? policy.baseDuration,
      body.intensity ?? policy.baseIntensity,
    );
    return { change, kinds: encounter.queryActiveEffects(combatantId) };
  }

  removeEffect(
    encounterId: string,
    combatantId: string,
    kind: string,
  ): { removed: boolean; kinds: StatusEffectKind[] } {
    const { encounter } = this.requireEntry(encounterId);
    this.requireCombatant(encounter, combatantId);
    if (!isStatusEffectKind(kind)) {
      throw new InvalidInputError(`Unknown status effect kind: ${kind}`, { kind });
    }
    const removed = encounter.removeStatusEffect(combatantId, kind);
    return { removed, kinds: encounter.queryActiveEffects(combatantId) };
  }

  private view(entry: EncounterEntry): EncounterView {
    return { ...entry.encounter.snapshot(), rng: entry.rng.getState() };
  }

  private requireEntry(encounterId: string): EncounterEntry {
    const entry = this.entries.get(encounterId);
    if (!entry) {
      throw new NotFoundError(`Encounter not found: ${encounterId}`, { encounterId });
    }
    return entry;
  }

  private requireCombatant(encounter: Encounter, combatantId: string): void {
    if (!encounter.hasCombatant(combatantId)) {
      throw new NotFoundError(`Combatant not found: ${combatantId}`, { combatantId });
    }
  }

  private requireArchetype(archetypeId: string): EnemyArchetype {
    const archetype = this.content.getArchetype(archetypeId);
    if (!archetype) {
      throw new InvalidInputError(`Unknown archetypeId: ${archetypeId}`, { archetypeId });
    }
    return archetype;
  }

  private nextEnemyId(
    encounter: Encounter,
    archetype: EnemyArchetype,
    taken: ReadonlySet<string>,
  ): string {
    for (let n = 1; ; n++) {
      const id = `${archetype.archetypeId}_${n}`;
      if (!encounter.hasCombatant(id) && !taken.has(id)) return id;
    }
  }

  private rewardOf(archetypeId: string | undefined): EnemyReward {
    const archetype = archetypeId ? this.content.getArchetype(archetypeId) : undefined;
    return archetype?.reward ?? { experience: 0, goldMin: 0, goldMax: 0 };
  }
}
