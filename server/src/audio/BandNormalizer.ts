const WARMUP_SAMPLES = 20;
const MAX_NORMALIZED = 2.0;
const EPSILON = 1e-9;

/**
 * Linear-interpolated quantile of an ascending array (q in [0, 1]).
 */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) {
    return 0;
  }
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

/**
 * Converts raw per-band energy into an adaptive 0..~0.96 signal using the
 * median and 90th percentile of a rolling window of past energies.
 */
export class BandNormalizer {
  private readonly history: number[][];

  constructor(
    private readonly bandCount: number,
    private readonly capacity = 300
  ) {
    this.history = Array.from({ length: bandCount }, () => []);
  }

  updateAndNormalize(energies: readonly number[]): number[] {
    const normalized: number[] = [];

    for (let band = 0; band < this.bandCount; band++) {
      const energy = energies[band] ?? 0;
      const samples = this.history[band];

      samples.push(energy);
      if (samples.length > this.capacity) {
        samples.shift();
      }

      if (samples.length < WARMUP_SAMPLES) {
        normalized.push(0);
        continue;
      }

      const sorted = [...samples].sort((a, b) => a - b);
      const median = quantile(sorted, 0.5);
      const p90 = quantile(sorted, 0.9);

      if (p90 <= median) {
        normalized.push(0);
        continue;
      }

      const ratio = (energy - median) / (p90 - median + EPSILON);
      normalized.push(Math.tanh(Math.min(Math.max(ratio, 0), MAX_NORMALIZED)));
    }

    return normalized;
  }

  historySize(band: number): number {
    return this.history[band]?.length ?? 0;
  }
}
