import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { GameExceptionFilter } from './common/filters/game-exception.filter.js';
import { ContentModule } from './content/content.module.js';
import { CombatConfigModule } from './engine/config/combat-config.module.js';
import { EngineModule } from './engine/engine.module.js';
import { EncountersModule } from './encounters/encounters.module.js';

@Module({
  imports: [CombatConfigModule, ContentModule, EngineModule, EncountersModule],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GameExceptionFilter,
    },
  ],
})
export class AppModule {}
