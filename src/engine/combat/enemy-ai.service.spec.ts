import { ACTION_PRIORITY, EnemyAiService } from './enemy-ai.service.js';
import { buildAiContext, type AiContext } from './ai-context.js';
import { ContractViolationError } from '../../common/errors/game-errors.js';
import type { AiProfile } from '../../content/content.types.js';
import type { Combatant } from '../combatant/combatant.js';
import type { StatusService } from '../status/status.service.js';
import { FixedRandom } from '../testing/fixed-random.js';
import { TEST_ABILITIES, makeEnemy, makePlayer, makeRegistry } from '../testing/combat-fixtures.js';

describe('EnemyAiService', () => {
  let service: EnemyAiService;
  let registry: StatusService;
  let player: Combatant;

  beforeEach(() => {
    service = new EnemyAiService();
    registry = makeRegistry();
    player = makePlayer(registry);
  });

  function profile(
    behavior: AiProfile['behavior'],
    aggression: number = 0,
    caution: number = 0,
  ): AiProfile {
    return { behavior, aggression, caution };
  }

  function contextOf(actor: Combatant, ...others: Combatant[]): AiContext {
    return buildAiContext({
      actor,
      participants: [player, actor, ...others],
      round: 1,
      turn: 2,
    });
  }

  describe('buildAiContext', () => {
    it('가장 가까운 상대가 target, 동률이면 먼저 온 쪽', () => {
      const ally = makePlayer(registry, { id: 'ally', position: { x: 2, y: 1 } });
      const enemy = makeEnemy(registry, 'e1', { position: { x: 2, y: 0 } });
      const ctx = buildAiContext({
        actor: enemy,
        participants: [player, ally, enemy],
        round: 1,
        turn: 2,
      });
      expect(ctx.target?.id).toBe('ally');

      const tie = buildAiContext({
        actor: enemy,
        participants: [player, enemy, makePlayer(registry, { id: 'p2', position: { x: 4, y: 0 } })],
        round: 1,
        turn: 2,
      });
      expect(tie.target?.id).toBe('player');
    });

    it('쓰러진 전투원은 제외, 준비된 능력만 노출', () => {
      const caster = makeEnemy(registry, 'c', {
        maxMana: 20,
        abilities: [TEST_ABILITIES.fireball, TEST_ABILITIES.paralyze],
      });
      const fallen = makeEnemy(registry, 'f', { position: { x: 2, y: 0 }, health: 0 });
      const ctx = contextOf(caster, fallen);

      expect(ctx.allies).toEqual([]);
      expect(ctx.opponents.map((o) => o.id)).toEqual(['player']);
      expect(ctx.self.readyAbilities.map((a) => a.abilityId)).toEqual(['fireball', 'paralyze']);

      caster.startCooldown(TEST_ABILITIES.fireball);
      expect(contextOf(caster).self.readyAbilities.map((a) => a.abilityId)).toEqual([
        'paralyze',
      ]);
    });

    it('스냅샷은 동결되어 있다', () => {
      const ctx = contextOf(makeEnemy(registry, 'e1'));
      expect(Object.isFrozen(ctx)).toBe(true);
      expect(Object.isFrozen(ctx.self)).toBe(true);
      expect(Object.isFrozen(ctx.self.position)).toBe(true);
    });

    it('AI 프로필 없는 행동자 → ContractViolationError', () => {
      expect(() =>
        buildAiContext({ actor: player, participants: [player], round: 1, turn: 1 }),
      ).toThrow(ContractViolationError);
    });
  });

  it('생존 상대가 없으면 WAIT', () => {
    const enemy = makeEnemy(registry, 'e1');
    player.takeDamage(100);
    expect(service.decide(contextOf(enemy), new FixedRandom(0))).toEqual({
      type: 'WAIT',
      priority: ACTION_PRIORITY.WAIT,
    });
  });

  describe('AGGRESSIVE', () => {
    it('사거리 안 → ATTACK', () => {
      const enemy = makeEnemy(registry, 'e1');
      expect(service.decide(contextOf(enemy), new FixedRandom(0))).toEqual({
        type: 'ATTACK',
        targetId: 'player',
        priority: ACTION_PRIORITY.ATTACK,
      });
    });

    it('사거리 밖 + 피해 능력 준비 → USE_ABILITY', () => {
      const enemy = makeEnemy(registry, 'e1', {
        position: { x: 3, y: 0 },
        maxMana: 30,
        abilities: [TEST_ABILITIES.fireball],
      });
      expect(service.chooseByBehavior(contextOf(enemy))).toEqual({
        type: 'USE_ABILITY',
        abilityId: 'fireball',
        targetId: 'player',
        priority: ACTION_PRIORITY.ABILITY,
      });
    });

    it('사거리 밖 → 차이가 큰 축으로 한 칸 접근', () => {
      const enemy = makeEnemy(registry, 'e1', { position: { x: 3, y: 1 } });
      expect(service.chooseByBehavior(contextOf(enemy))).toEqual({
        type: 'MOVE',
        destination: { x: 2, y: 1 },
        priority: ACTION_PRIORITY.MOVE,
      });
    });

    it('접근 칸이 모두 막혀 있으면 WAIT', () => {
      const enemy = makeEnemy(registry, 'e1', { position: { x: 3, y: 0 } });
      const blocker = makeEnemy(registry, 'e2', { position: { x: 2, y: 0 } });
      expect(service.chooseByBehavior(contextOf(enemy, blocker)).type).toBe('WAIT');
    });
  });

  describe('DEFENSIVE', () => {
    it('HP 50% 미만 + 보호막 없음 → 긴급 DEFEND', () => {
      const enemy = makeEnemy(registry, 'e1', { health: 10, ai: profile('DEFENSIVE') });
      expect(service.chooseByBehavior(contextOf(enemy))).toEqual({
        type: 'DEFEND',
        priority: ACTION_PRIORITY.EMERGENCY,
      });
    });

    it('보호막이 이미 있으면 사거리 안 공격', () => {
      const enemy = makeEnemy(registry, 'e1', { health: 10, ai: profile('DEFENSIVE') });
      enemy.effects.apply('PROTECTION', 2, 1, new FixedRandom(0));
      expect(service.chooseByBehavior(contextOf(enemy)).type).toBe('ATTACK');
    });

    it('방어 쿨다운 중이면 사거리 안 공격', () => {
      const enemy = makeEnemy(registry, 'e1', { health: 10, ai: profile('DEFENSIVE') });
      enemy.startDefendCooldown(3);
      expect(service.chooseByBehavior(contextOf(enemy)).type).toBe('ATTACK');
    });

    it('사거리 밖이면 제자리 대기', () => {
      const enemy = makeEnemy(registry, 'e1', {
        position: { x: 3, y: 0 },
        ai: profile('DEFENSIVE'),
      });
      expect(service.chooseByBehavior(contextOf(enemy)).type).toBe('WAIT');
    });
  });

  describe('SUPPORT', () => {
    it('가장 많이 다친 아군을 치유', () => {
      const healer = makeEnemy(registry, 'h', {
        position: { x: 2, y: 1 },
        maxMana: 40,
        abilities: [TEST_ABILITIES.heal],
        ai: profile('SUPPORT'),
      });
      const hurt = makeEnemy(registry, 'e1', { health: 12 });
      const worse = makeEnemy(registry, 'e2', { position: { x: 0, y: 1 }, health: 6 });

      expect(service.chooseByBehavior(contextOf(healer, hurt, worse))).toEqual({
        type: 'USE_ABILITY',
        abilityId: 'heal',
        targetId: 'e2',
        priority: ACTION_PRIORITY.EMERGENCY,
      });
    });

    it('다친 아군이 없으면 공격', () => {
      const healer = makeEnemy(registry, 'h', {
        position: { x: 0, y: 1 },
        maxMana: 40,
        abilities: [TEST_ABILITIES.heal],
        ai: profile('SUPPORT'),
      });
      expect(service.chooseByBehavior(contextOf(healer)).type).toBe('ATTACK');
    });
  });

  describe('SPELLCASTER', () => {
    function caster(position = { x: 3, y: 0 }, maxMana = 50): Combatant {
      return makeEnemy(registry, 'c', {
        position,
        maxMana,
        abilities: [TEST_ABILITIES.paralyze, TEST_ABILITIES.fireball],
        ai: profile('SPELLCASTER'),
      });
    }

    it('상대에게 없는 상태이상 우선', () => {
      expect(service.chooseByBehavior(contextOf(caster()))).toMatchObject({
        type: 'USE_ABILITY',
        abilityId: 'paralyze',
      });
    });

    it('이미 걸린 상태이상은 건너뛰고 피해 능력', () => {
      player.effects.apply('PARALYSIS', 1, 1, new FixedRandom(0));
      expect(service.chooseByBehavior(contextOf(caster()))).toMatchObject({
        type: 'USE_ABILITY',
        abilityId: 'fireball',
      });
    });

    it('능력이 없고 붙어 있으면 거리 벌리기', () => {
      expect(service.chooseByBehavior(contextOf(caster({ x: 1, y: 0 }, 0)))).toEqual({
        type: 'MOVE',
        destination: { x: 2, y: 0 },
        priority: ACTION_PRIORITY.MOVE,
      });
    });
  });

  describe('COWARDLY', () => {
    it('HP 30% 미만 → 긴급 후퇴', () => {
      const enemy = makeEnemy(registry, 'e1', { health: 5, ai: profile('COWARDLY') });
      expect(service.chooseByBehavior(contextOf(enemy))).toEqual({
        type: 'MOVE',
        destination: { x: 2, y: 0 },
        priority: ACTION_PRIORITY.EMERGENCY,
      });
    });

    it('뒤가 막히면 옆으로 후퇴', () => {
      const enemy = makeEnemy(registry, 'e1', { health: 5, ai: profile('COWARDLY') });
      const behind = makeEnemy(registry, 'e2', { position: { x: 2, y: 0 } });
      expect(service.chooseByBehavior(contextOf(enemy, behind))).toMatchObject({
        type: 'MOVE',
        destination: { x: 1, y: 1 },
      });
    });

    it('사거리 밖이면 DEFEND', () => {
      const enemy = makeEnemy(registry, 'e1', {
        position: { x: 3, y: 0 },
        ai: profile('COWARDLY'),
      });
      expect(service.chooseByBehavior(contextOf(enemy)).type).toBe('DEFEND');
    });

    it('사거리 밖 + 방어 쿨다운 중이면 WAIT', () => {
      const enemy = makeEnemy(registry, 'e1', {
        position: { x: 3, y: 0 },
        ai: profile('COWARDLY'),
      });
      enemy.startDefendCooldown(3);
      expect(contextOf(enemy).self.defendReady).toBe(false);
      expect(service.chooseByBehavior(contextOf(enemy)).type).toBe('WAIT');
    });
  });

  describe('성향 보정', () => {
    it('caution 1, 난수 0.4 → ATTACK 을 DEFEND 로', () => {
      const enemy = makeEnemy(registry, 'e1', { ai: profile('AGGRESSIVE', 0, 1) });
      expect(service.decide(contextOf(enemy), new FixedRandom(0.4)).type).toBe('DEFEND');
    });

    it('방어 쿨다운 중이면 caution 은 뒤집지 않고 난수도 쓰지 않는다', () => {
      const enemy = makeEnemy(registry, 'e1', { ai: profile('AGGRESSIVE', 0, 1) });
      enemy.startDefendCooldown(2);
      const random = new FixedRandom(0);
      expect(service.decide(contextOf(enemy), random).type).toBe('ATTACK');
      expect(random.draws).toBe(0);
    });

    it('caution 1, 난수 0.6 → ATTACK 유지', () => {
      const enemy = makeEnemy(registry, 'e1', { ai: profile('AGGRESSIVE', 0, 1) });
      expect(service.decide(contextOf(enemy), new FixedRandom(0.6)).type).toBe('ATTACK');
    });

    it('aggression 1 → 사거리 안 대상이면 DEFEND 를 ATTACK 으로', () => {
      const enemy = makeEnemy(registry, 'e1', { health: 10, ai: profile('DEFENSIVE', 1, 0) });
      expect(service.decide(contextOf(enemy), new FixedRandom(0.3))).toEqual({
        type: 'ATTACK',
        targetId: 'player',
        priority: ACTION_PRIORITY.ATTACK,
      });
    });

    it('대상이 사거리 밖이면 aggression 은 뒤집지 않고 난수도 쓰지 않는다', () => {
      const enemy = makeEnemy(registry, 'e1', {
        position: { x: 3, y: 0 },
        ai: profile('DEFENSIVE', 1, 0),
      });
      const random = new FixedRandom(0);
      expect(service.decide(contextOf(enemy), random).type).toBe('WAIT');
      expect(random.draws).toBe(0);
    });

    it('가중치 0 이면 난수를 쓰지 않는다', () => {
      const enemy = makeEnemy(registry, 'e1');
      const random = new FixedRandom(0);
      service.decide(contextOf(enemy), random);
      expect(random.draws).toBe(0);
    });
  });
});
