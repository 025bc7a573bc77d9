import { AppError, ERR } from '@shisen-sho/shared';

export type BoardPreset = {
  id: string;
  name: string;
  innerCols: number;
  innerRows: number;
};

export type PresetPack = {
  meta: { version: string; defaultId: string };
  presets: BoardPreset[];
};

export const DEFAULT_PRESETS: PresetPack = {
  meta: { version: '1', defaultId: 'classic' },
  presets: [
    { id: 'small', name: 'Small', innerCols: 4, innerRows: 4 },
    { id: 'classic', name: 'Classic', innerCols: 8, innerRows: 7 },
    { id: 'wide', name: 'Wide', innerCols: 12, innerRows: 7 },
    { id: 'large', name: 'Large', innerCols: 16, innerRows: 8 }
  ]
};

export function getPreset(pack: PresetPack, id: string = pack.meta.defaultId): BoardPreset {
  const p = pack.presets.find((x) => x.id === id);
  if (!p) throw new AppError(ERR.PRESET_NOT_FOUND, 'PRESET_NOT_FOUND:' + id);
  return p;
}
