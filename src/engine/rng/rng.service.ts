// splitmix64 기반 결정적 RNG: seed + cursor 만 기록하면 전투를 그대로 재현할 수 있다

import { Injectable } from '@nestjs/common';

/** 엔진이 의존하는 최소 난수 인터페이스 (0.0 ~ 1.0) */
export interface RandomSource {
  next(): number;
}

export interface RngState {
  seed: string;
  cursor: number;
}

const MASK_64 = 0xFFFFFFFFFFFFFFFFn;

/** 상위 53비트만 써서 1.0 이 나오지 않게 한다 */
export function toUnitInterval(raw: bigint): number {
  return Number(raw >> 11n) / 2 ** 53;
}

export class Rng implements RandomSource {
  private state: bigint;
  private _cursor: number;

  constructor(
    private readonly seed: string,
    cursor: number = 0,
  ) {
    this.state = this.hashSeed(seed);
    this._cursor = cursor;
    // 커서 위치까지 상태만 진행
    for (let i = 0; i < cursor; i++) {
      this.advanceState();
    }
  }

  private hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & MASK_64;
    }
    return h === 0n ? 1n : h;
  }

  private advanceState(): void {
    this.state = (this.state + 0x9E3779B97F4A7C15n) & MASK_64;
  }

  private nextRaw(): bigint {
    this._cursor++;
    this.advanceState();
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xBF58476D1CE4E5B9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94D049BB133111EBn) & MASK_64;
    return (z ^ (z >> 31n)) & MASK_64;
  }

  /** [0, 1) 실수 */
  next(): number {
    return toUnitInterval(this.nextRaw());
  }

  /** min~max 정수 (inclusive) */
  range(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  getState(): RngState {
    return { seed: this.seed, cursor: this._cursor };
  }

  get cursor(): number {
    return this._cursor;
  }
}

/** [min, max] 균등 분포. 스택 배율 U(0.5, 1.0) 에 사용 */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random.next();
}

@Injectable()
export class RngService {
  /** seed + cursor 기반 결정적 RNG 인스턴스 생성 */
  create(seed: string, cursor: number = 0): Rng {
    return new Rng(seed, cursor);
  }
}
