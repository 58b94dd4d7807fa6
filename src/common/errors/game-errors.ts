import { HttpStatus } from '@nestjs/common';

export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

export class NotFoundError extends GameError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND, details);
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, 422, details);
  }
}

/**
 * 행동 전제조건 실패 (마나 부족, 쿨다운, 사거리 등).
 * 상태는 변경되지 않으며 호출자가 다른 행동을 다시 제출해야 한다.
 */
export class InvalidActionError extends GameError {
  constructor(message = 'Invalid action', details?: Record<string, unknown>) {
    super('INVALID_ACTION', message, 422, details);
    this.name = 'InvalidActionError';
  }
}

/** 호출 계약 위반: 복구 대상이 아닌 프로그래밍 오류 */
export class ContractViolationError extends GameError {
  constructor(message = 'Contract violation', details?: Record<string, unknown>) {
    super('CONTRACT_VIOLATION', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
    this.name = 'ContractViolationError';
  }
}
