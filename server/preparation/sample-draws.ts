/**
 * Deterministic synthetic draws for seeding development data.
 */

import type { GridCellMetadata } from '@shared/forecast-types';
import type { RawDrawLine } from './raw-draw-source';

/** mulberry32: small seeded PRNG returning floats in [0, 1). */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface SampleDrawOptions {
  months: readonly string[];
  drawsPerSet: number;
  seed: number;
}

/**
 * Zero-inflated, heavy-tailed fatality counts. Each cell gets its own
 * intensity so the seeded data spans quiet and violent cells.
 */
export function* generateSampleDraws(
  cells: Iterable<GridCellMetadata>,
  options: SampleDrawOptions
): Generator<RawDrawLine> {
  const random = seededRandom(options.seed);
  for (const cell of cells) {
    const intensity = Math.exp(random() * 6);
    const zeroShare = 0.3 + random() * 0.5;
    for (const month of options.months) {
      const draws: number[] = [];
      for (let i = 0; i < options.drawsPerSet; i++) {
        if (random() < zeroShare) {
          draws.push(0);
        } else {
          draws.push(Math.floor(-Math.log(1 - random()) * intensity));
        }
      }
      yield { grid_id: cell.grid_id, month, draws };
    }
  }
}
