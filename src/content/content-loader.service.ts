// combat_v1 JSON 로드 + 스키마 검증 + 메모리 캐시

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z, type ZodType, type ZodTypeDef } from 'zod';
import { ContractViolationError, NotFoundError } from '../common/errors/game-errors.js';
import { CombatConfigService } from '../engine/config/combat-config.service.js';
import {
  type AbilityDefinition,
  AbilityDefinitionSchema,
  type EnemyArchetype,
  EnemyArchetypeSchema,
  type PlayerDefaults,
  PlayerDefaultsSchema,
} from './content.types.js';

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private abilities = new Map<string, AbilityDefinition>();
  private archetypes = new Map<string, EnemyArchetype>();
  private playerDefaults: PlayerDefaults | undefined;

  constructor(private readonly configService: CombatConfigService) {}

  async onModuleInit() {
    await this.load(this.configService.get().contentDir);
  }

  async load(dir: string): Promise<void> {
    const [abilitiesRaw, enemiesRaw, defaultsRaw] = await Promise.all([
      readFile(join(dir, 'abilities.json'), 'utf-8'),
      readFile(join(dir, 'enemies.json'), 'utf-8'),
      readFile(join(dir, 'player_defaults.json'), 'utf-8'),
    ]);

    const abilities = parseContent('abilities.json', abilitiesRaw, z.array(AbilityDefinitionSchema));
    const archetypes = parseContent('enemies.json', enemiesRaw, z.array(EnemyArchetypeSchema));
    const playerDefaults = parseContent('player_defaults.json', defaultsRaw, PlayerDefaultsSchema);

    const abilityMap = new Map(abilities.map((a) => [a.abilityId, a]));
    const referenced = [
      ...archetypes.flatMap((e) => e.abilities.map((id) => ({ owner: e.archetypeId, id }))),
      ...playerDefaults.abilities.map((id) => ({ owner: 'player', id })),
    ];
    const missing = referenced.filter((ref) => !abilityMap.has(ref.id));
    if (missing.length > 0) {
      throw new ContractViolationError('Content references unknown abilities', { missing });
    }

    this.abilities = abilityMap;
    this.archetypes = new Map(archetypes.map((e) => [e.archetypeId, e]));
    this.playerDefaults = playerDefaults;
    this.logger.log(
      `Loaded combat content from ${dir}: ${abilities.length} abilities, ${archetypes.length} archetypes`,
    );
  }

  getPlayerDefaults(): PlayerDefaults {
    if (!this.playerDefaults) {
      throw new ContractViolationError('Combat content has not been loaded');
    }
    return this.playerDefaults;
  }

  /** id 목록 → 정의. 없는 id 는 NotFound */
  resolveAbilities(ids: ReadonlyArray<string>): AbilityDefinition[] {
    return ids.map((id) => {
      const ability = this.abilities.get(id);
      if (!ability) throw new NotFoundError(`Unknown ability: ${id}`, { abilityId: id });
      return ability;
    });
  }

  getArchetype(id: string): EnemyArchetype | undefined {
    return this.archetypes.get(id);
  }
}

function parseContent<T>(file: string, raw: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const data: unknown = JSON.parse(raw);
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ContractViolationError(`Invalid combat content: ${file}`, {
      file,
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}
