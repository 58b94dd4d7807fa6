import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { EncountersController } from './encounters.controller.js';
import { EncountersService } from './encounters.service.js';

@Module({
  imports: [EngineModule],
  controllers: [EncountersController],
  providers: [EncountersService],
  exports: [EncountersService],
})
export class EncountersModule {}
