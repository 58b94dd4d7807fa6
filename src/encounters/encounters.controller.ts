import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { EncountersService } from './encounters.service.js';
import {
  AdvanceBodySchema,
  type AdvanceBody,
  ApplyEffectBodySchema,
  type ApplyEffectBody,
  CreateEncounterBodySchema,
  type CreateEncounterBody,
  MovePlayerBodySchema,
  type MovePlayerBody,
  SpawnEnemiesBodySchema,
  type SpawnEnemiesBody,
} from './dto/encounter.dto.js';

@Controller('v1/encounters')
export class EncountersController {
  constructor(private readonly encountersService: EncountersService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  createEncounter(
    @Body(new ZodValidationPipe(CreateEncounterBodySchema)) body: CreateEncounterBody,
  ) {
    return this.encountersService.create(body);
  }

  @Get(':encounterId')
  getEncounter(@Param('encounterId') encounterId: string) {
    return this.encountersService.get(encounterId);
  }

  @Post(':encounterId/enemies')
  spawnEnemies(
    @Param('encounterId') encounterId: string,
    @Body(new ZodValidationPipe(SpawnEnemiesBodySchema)) body: SpawnEnemiesBody,
  ) {
    return this.encountersService.spawnEnemies(encounterId, body);
  }

  @Post(':encounterId/move')
  @HttpCode(HttpStatus.OK)
  movePlayer(
    @Param('encounterId') encounterId: string,
    @Body(new ZodValidationPipe(MovePlayerBodySchema)) body: MovePlayerBody,
  ) {
    return this.encountersService.movePlayer(encounterId, body);
  }

  /** 한 번 호출 = 단계 전이 1회 또는 턴 단계 1개 */
  @Post(':encounterId/advance')
  @HttpCode(HttpStatus.OK)
  advance(
    @Param('encounterId') encounterId: string,
    @Body(new ZodValidationPipe(AdvanceBodySchema)) body: AdvanceBody,
  ) {
    return this.encountersService.advance(encounterId, body.action);
  }

  @Get(':encounterId/combatants/:combatantId/effects')
  listEffects(
    @Param('encounterId') encounterId: string,
    @Param('combatantId') combatantId: string,
  ) {
    return this.encountersService.listEffects(encounterId, combatantId);
  }

  @Post(':encounterId/combatants/:combatantId/effects')
  @HttpCode(HttpStatus.OK)
  applyEffect(
    @Param('encounterId') encounterId: string,
    @Param('combatantId') combatantId: string,
    @Body(new ZodValidationPipe(ApplyEffectBodySchema)) body: ApplyEffectBody,
  ) {
    return this.encountersService.applyEffect(encounterId, combatantId, body);
  }

  @Delete(':encounterId/combatants/:combatantId/effects/:kind')
  removeEffect(
    @Param('encounterId') encounterId: string,
    @Param('combatantId') combatantId: string,
    @Param('kind') kind: string,
  ) {
    return this.encountersService.removeEffect(encounterId, combatantId, kind);
  }
}
