import Meyda from 'meyda';

// Upper edge of each band in Hz; a band starts where the previous one ends
export const BAND_EDGES_HZ = [50, 100, 250, 500, 1000, 2000, 4000, 6000, 10000, 20000] as const;

export function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value > 0 && (value & (value - 1)) === 0;
}

/**
 * Magnitude spectrum (first n/2 bins) scaled by 1/n, with no window applied.
 * A unit sine centred on bin k gives 0.5 at k.
 */
export function magnitudeSpectrum(frame: Float32Array): Float32Array {
  const n = frame.length;
  if (n === 0) {
    return new Float32Array(0);
  }

  Meyda.bufferSize = n;
  Meyda.windowingFunction = 'rect';
  // A list of features yields a features object; a single name yields the bare array
  const features = Meyda.extract(['amplitudeSpectrum'], frame);
  const spectrum = features?.amplitudeSpectrum;
  if (!spectrum) {
    return new Float32Array(n / 2);
  }

  const scaled = new Float32Array(spectrum.length);
  for (let i = 0; i < spectrum.length; i++) {
    scaled[i] = spectrum[i] / n;
  }
  return scaled;
}

/**
 * Bin range [min, max) covered by a band for an n-point transform.
 */
export function bandBinRange(
  band: number,
  frameSize: number,
  sampleRate: number
): [number, number] {
  const freqMin = band > 0 ? BAND_EDGES_HZ[band - 1] : 0;
  const freqMax = BAND_EDGES_HZ[band];
  const lastBin = frameSize / 2 - 1;

  const binMin = Math.max(Math.floor((freqMin * frameSize) / sampleRate), 0);
  const binMax = Math.min(Math.floor((freqMax * frameSize) / sampleRate), lastBin);
  return [binMin, binMax];
}

/**
 * Mean spectral magnitude per band. Empty or inverted ranges give 0.
 */
export function computeBandEnergies(frame: Float32Array, sampleRate: number): number[] {
  const n = frame.length;
  if (n === 0) {
    return BAND_EDGES_HZ.map(() => 0);
  }

  const magnitudes = magnitudeSpectrum(frame);

  return BAND_EDGES_HZ.map((_, band) => {
    const [binMin, binMax] = bandBinRange(band, n, sampleRate);
    if (binMax <= binMin) {
      return 0;
    }
    let sum = 0;
    for (let bin = binMin; bin < binMax; bin++) {
      sum += magnitudes[bin];
    }
    return sum / (binMax - binMin);
  });
}
