import { EffectStore } from './effect-store.js';
import { ContractViolationError } from '../../common/errors/game-errors.js';
import { Rng } from '../rng/rng.service.js';
import { FixedRandom } from '../testing/fixed-random.js';
import { makePlayer, makeRegistry } from '../testing/combat-fixtures.js';
import type { StatusService } from './status.service.js';
import type { StatusEffectKind } from '../types/enums.js';

describe('EffectStore', () => {
  let registry: StatusService;
  let store: EffectStore;

  beforeEach(() => {
    registry = makeRegistry();
    store = new EffectStore(registry);
  });

  describe('apply — 신규', () => {
    it('APPLIED + newlyApplied, 난수 소비 없음', () => {
      const random = new FixedRandom(0.5);
      const change = store.apply('POISON', 3, 1.0, random);

      expect(change).toEqual({ kind: 'POISON', op: 'APPLIED', duration: 3, intensity: 1 });
      expect(store.get('POISON')).toEqual({
        kind: 'POISON',
        duration: 3,
        intensity: 1,
        newlyApplied: true,
      });
      expect(random.draws).toBe(0);
    });

    it('DURATION 방식은 신규 적용도 duration cap 으로 자른다', () => {
      store.apply('PARALYSIS', 5, 1.0, new FixedRandom(0));
      expect(store.get('PARALYSIS')?.duration).toBe(2);
    });

    it('intensity 는 cap 으로 자른다', () => {
      store.apply('STRENGTH', 2, 10, new FixedRandom(0));
      expect(store.intensityOf('STRENGTH')).toBe(3);
    });

    it('duration 0 / intensity 0 → ContractViolationError', () => {
      expect(() => store.apply('POISON', 0, 1, new FixedRandom(0))).toThrow(ContractViolationError);
      expect(() => store.apply('POISON', 1.5, 1, new FixedRandom(0))).toThrow(ContractViolationError);
      expect(() => store.apply('POISON', 3, 0, new FixedRandom(0))).toThrow(ContractViolationError);
      expect(store.has('POISON')).toBe(false);
    });
  });

  describe('apply — DURATION 스택', () => {
    it('Paralysis(1) 두 번, U = 1.0 → duration 정확히 2 (cap)', () => {
      store.apply('PARALYSIS', 1, 1.0, new FixedRandom(0));
      const random = new FixedRandom(1.0);
      const change = store.apply('PARALYSIS', 1, 1.0, random);

      expect(change.op).toBe('STACKED');
      expect(store.get('PARALYSIS')?.duration).toBe(2);
      expect(random.draws).toBe(1);
    });

    it('연장량 = ceil(요청 × U), intensity 는 그대로', () => {
      store.apply('BLINDNESS', 2, 1.0, new FixedRandom(0));
      // U = 0.5 → ceil(2 × 0.5) = 1
      store.apply('BLINDNESS', 2, 1.0, new FixedRandom(0));
      expect(store.get('BLINDNESS')?.duration).toBe(3);
      // U = 1.0 → 3 + 2 = 5 → cap 4
      store.apply('BLINDNESS', 2, 1.0, new FixedRandom(1));
      expect(store.get('BLINDNESS')?.duration).toBe(4);
      expect(store.intensityOf('BLINDNESS')).toBe(1);
    });
  });

  describe('apply — INTENSITY 스택', () => {
    it('intensity += 요청 × U, duration = max(기존, 요청)', () => {
      store.apply('POISON', 3, 1.0, new FixedRandom(0));

      // U = 0.5
      store.apply('POISON', 1, 1.0, new FixedRandom(0));
      expect(store.get('POISON')).toMatchObject({ duration: 3, intensity: 1.5 });

      // U = 1.0, 더 긴 요청 duration 으로 재설정
      store.apply('POISON', 5, 1.0, new FixedRandom(1));
      expect(store.get('POISON')).toMatchObject({ duration: 5, intensity: 2.5 });

      // cap 3
      store.apply('POISON', 2, 2.0, new FixedRandom(1));
      expect(store.get('POISON')).toMatchObject({ duration: 5, intensity: 3 });
    });
  });

  describe('스택 성질 (무작위 적용 시퀀스)', () => {
    const durationKinds: StatusEffectKind[] = ['PARALYSIS', 'BLINDNESS', 'CONFUSION', 'HASTE', 'SLOW'];
    const intensityKinds: StatusEffectKind[] = ['POISON', 'REGENERATION', 'STRENGTH', 'WEAKNESS', 'PROTECTION'];

    it.each(durationKinds)('%s: duration 은 줄지 않고 cap 을 넘지 않는다', (kind) => {
      const inputs = new Rng(`inputs-${kind}`, 0);
      const random = new Rng(`stack-${kind}`, 0);
      const cap = registry.getPolicy(kind).maxDuration;

      store.apply(kind, inputs.range(1, 3), 1, random);
      let previous = store.get(kind)?.duration ?? 0;
      for (let i = 0; i < 30; i++) {
        store.apply(kind, inputs.range(1, 4), 1, random);
        const duration = store.get(kind)?.duration ?? 0;
        expect(duration).toBeGreaterThanOrEqual(previous);
        expect(duration).toBeLessThanOrEqual(cap);
        previous = duration;
      }
    });

    it.each(intensityKinds)('%s: intensity 비감소 + cap, duration = max(기존, 요청)', (kind) => {
      const inputs = new Rng(`inputs-${kind}`, 0);
      const random = new Rng(`stack-${kind}`, 0);
      const cap = registry.getPolicy(kind).maxIntensity;

      store.apply(kind, inputs.range(1, 3), 1, random);
      for (let i = 0; i < 30; i++) {
        const before = store.get(kind);
        const requestedDuration = inputs.range(1, 6);
        const requestedIntensity = 0.5 + inputs.next() * 1.5;
        store.apply(kind, requestedDuration, requestedIntensity, random);
        const after = store.get(kind);

        expect(after?.intensity).toBeGreaterThanOrEqual(before?.intensity ?? 0);
        expect(after?.intensity).toBeLessThanOrEqual(cap);
        expect(after?.duration).toBe(Math.max(before?.duration ?? 0, requestedDuration));
      }
    });
  });

  describe('tickTurnStart', () => {
    it('Poison 은 Protection 을 무시: 3턴 × 5 → 85 HP 후 제거', () => {
      const owner = makePlayer(registry);
      const random = new FixedRandom(0.5);
      owner.effects.apply('POISON', 3, 1.0, random);
      owner.effects.apply('PROTECTION', 3, 1.0, random);

      for (let turn = 0; turn < 3; turn++) {
        const changes = owner.effects.tickTurnStart(owner);
        expect(changes.filter((c) => c.kind === 'POISON').map((c) => c.amount)).toEqual([-5]);
        owner.effects.tickTurnEnd();
      }

      expect(owner.health).toBe(85);
      expect(owner.effects.has('POISON')).toBe(false);
    });

    it('Regeneration → floor(3 × intensity) 회복', () => {
      const owner = makePlayer(registry, { health: 50 });
      owner.effects.apply('REGENERATION', 3, 2.0, new FixedRandom(0));

      const changes = owner.effects.tickTurnStart(owner);
      expect(changes).toEqual([
        { kind: 'REGENERATION', op: 'TICKED', amount: 6, duration: 3 },
      ]);
      expect(owner.health).toBe(56);
    });

    it('죽은 대상은 회복하지 않는다', () => {
      const owner = makePlayer(registry, { health: 0 });
      owner.effects.apply('REGENERATION', 3, 1.0, new FixedRandom(0));
      expect(owner.effects.tickTurnStart(owner)).toEqual([]);
      expect(owner.health).toBe(0);
    });

    it('newlyApplied 표시는 첫 턴 시작에서 지워진다', () => {
      const owner = makePlayer(registry);
      owner.effects.apply('HASTE', 3, 1.0, new FixedRandom(0));
      owner.effects.tickTurnStart(owner);
      expect(owner.effects.get('HASTE')?.newlyApplied).toBe(false);
    });
  });

  describe('tickTurnEnd', () => {
    it('모든 효과 1 감소, 0 이하 제거', () => {
      const random = new FixedRandom(0);
      store.apply('PARALYSIS', 1, 1, random);
      store.apply('SLOW', 3, 1, random);

      expect(store.tickTurnEnd()).toEqual([{ kind: 'PARALYSIS', op: 'REMOVED' }]);
      expect(store.activeKinds()).toEqual(['SLOW']);
      expect(store.get('SLOW')?.duration).toBe(2);
    });
  });

  describe('remove / clearAll / activeKinds', () => {
    it('없는 kind 제거는 false, 상태 불변', () => {
      store.apply('HASTE', 3, 1, new FixedRandom(0));
      const before = store.snapshot();

      expect(store.remove('POISON')).toBe(false);
      expect(store.snapshot()).toEqual(before);
    });

    it('있는 kind 제거는 true', () => {
      store.apply('POISON', 3, 1, new FixedRandom(0));
      expect(store.remove('POISON')).toBe(true);
      expect(store.has('POISON')).toBe(false);
    });

    it('activeKinds 는 적용 순서가 아닌 열거 순서', () => {
      const random = new FixedRandom(0);
      store.apply('PROTECTION', 2, 1, random);
      store.apply('POISON', 3, 1, random);
      store.apply('HASTE', 3, 1, random);
      expect(store.activeKinds()).toEqual(['POISON', 'HASTE', 'PROTECTION']);
    });

    it('clearAll → 전부 REMOVED', () => {
      const random = new FixedRandom(0);
      store.apply('WEAKNESS', 2, 1, random);
      store.apply('CONFUSION', 2, 1, random);
      expect(store.clearAll()).toEqual([
        { kind: 'CONFUSION', op: 'REMOVED' },
        { kind: 'WEAKNESS', op: 'REMOVED' },
      ]);
      expect(store.activeKinds()).toEqual([]);
    });

    it('get 은 복사본을 돌려준다', () => {
      store.apply('POISON', 3, 1, new FixedRandom(0));
      const copy = store.get('POISON');
      if (copy) copy.duration = 99;
      expect(store.get('POISON')?.duration).toBe(3);
    });
  });
});
