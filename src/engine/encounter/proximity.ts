import { type Combatant, manhattan } from '../combatant/combatant.js';

/** 탐험 중 전투 개시 판정 (지도/충돌 모듈 경계) */
export type ProximityCheck = (player: Combatant, enemies: ReadonlyArray<Combatant>) => boolean;

/** 전투 개시 거리: Manhattan 1 이하 (대각선은 인접이 아님) */
export const ENGAGE_DISTANCE = 1;

export const manhattanAdjacency: ProximityCheck = (player, enemies) =>
  player.isAlive() &&
  enemies.some(
    (enemy) => enemy.isAlive() && manhattan(player.position, enemy.position) <= ENGAGE_DISTANCE,
  );
