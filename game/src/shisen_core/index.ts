export * from './types';
export * from './board';
export * from './link';
export * from './solver';
export * from './generator';
export * from './random';
export * from './props';
export * from './presets';
