export class AppError extends Error {
  constructor(public code: number, message: string) {
    super(message);
    this.name = 'AppError';
  }
}

export const ERR = {
  INVALID_PARAM: 1001,
  OUT_OF_BOUNDS: 1003,
  INTERNAL: 1005,
  INVALID_PATH: 1006,
  PRESET_NOT_FOUND: 1007
} as const;

export type ErrCode = (typeof ERR)[keyof typeof ERR];

// Contract breaches are thrown, never returned.
export function invariant(cond: unknown, code: ErrCode, message: string): asserts cond {
  if (!cond) throw new AppError(code, message);
}
