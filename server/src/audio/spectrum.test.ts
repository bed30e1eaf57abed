import { describe, it, expect } from 'vitest';
import { BAND_EDGES_HZ, bandBinRange, computeBandEnergies, isPowerOfTwo, magnitudeSpectrum } from './spectrum';

const SAMPLE_RATE = 44100;

function sine(frequency: number, size: number, amplitude = 1): Float32Array {
  const frame = new Float32Array(size);
  for (let i = 0; i < size; i++) {
    frame[i] = amplitude * Math.sin((2 * Math.PI * frequency * i) / SAMPLE_RATE);
  }
  return frame;
}

// Sine whose frequency falls exactly on an FFT bin
function binTone(bin: number, size: number, amplitude = 1): Float32Array {
  return sine((bin * SAMPLE_RATE) / size, size, amplitude);
}

describe('isPowerOfTwo', () => {
  it('accepts powers of two only', () => {
    expect(isPowerOfTwo(1024)).toBe(true);
    expect(isPowerOfTwo(1)).toBe(true);
    expect(isPowerOfTwo(1000)).toBe(false);
    expect(isPowerOfTwo(0)).toBe(false);
    expect(isPowerOfTwo(2.5)).toBe(false);
  });
});

describe('bandBinRange', () => {
  it('maps band edges to bins for a 1024-point frame', () => {
    expect(bandBinRange(0, 1024, SAMPLE_RATE)).toEqual([0, 1]);
    expect(bandBinRange(5, 1024, SAMPLE_RATE)).toEqual([23, 46]);
    expect(bandBinRange(9, 1024, SAMPLE_RATE)).toEqual([232, 464]);
  });

  it('caps the top bin at n/2 - 1', () => {
    expect(bandBinRange(9, 1024, 22050)).toEqual([464, 511]);
  });
});

describe('magnitudeSpectrum', () => {
  it('returns n/2 bins with the peak at the tone frequency', () => {
    const spectrum = magnitudeSpectrum(sine(1000, 1024));

    expect(spectrum.length).toBe(512);
    let peak = 0;
    for (let bin = 1; bin < spectrum.length; bin++) {
      if (spectrum[bin] > spectrum[peak]) peak = bin;
    }
    expect(peak).toBe(23);
  });

  it('puts a bin-centred unit sine at 0.5 in its own bin only', () => {
    const spectrum = magnitudeSpectrum(binTone(32, 1024));

    expect(spectrum[32]).toBeCloseTo(0.5, 4);
    expect(spectrum[31]).toBeLessThan(1e-4);
    expect(spectrum[33]).toBeLessThan(1e-4);
    expect(spectrum[100]).toBeLessThan(1e-4);
  });

  it('returns an empty spectrum for an empty frame', () => {
    expect(magnitudeSpectrum(new Float32Array(0)).length).toBe(0);
  });
});

describe('computeBandEnergies', () => {
  it('returns one energy per band', () => {
    expect(computeBandEnergies(sine(1000, 1024), SAMPLE_RATE)).toHaveLength(BAND_EDGES_HZ.length);
  });

  it('isolates a tone in the 1-2 kHz band', () => {
    // Bin 32 is about 1378 Hz; band 5 spans bins [23, 46)
    const energies = computeBandEnergies(binTone(32, 1024), SAMPLE_RATE);
    const band = energies[5];

    expect(band).toBeCloseTo(0.5 / 23, 5);
    expect(energies.indexOf(Math.max(...energies))).toBe(5);
    for (const far of [0, 1, 2, 8, 9]) {
      expect(energies[far]).toBeLessThan(band * 0.01);
    }
  });

  it('scales linearly with amplitude', () => {
    const quiet = computeBandEnergies(binTone(32, 1024, 0.25), SAMPLE_RATE);
    const loud = computeBandEnergies(binTone(32, 1024, 1), SAMPLE_RATE);
    expect(loud[5] / quiet[5]).toBeCloseTo(4, 3);
  });

  it('gives 0 for bands with no bins at small frame sizes', () => {
    // 64 points at 44.1 kHz: band 0 covers bins [0, 0)
    const energies = computeBandEnergies(sine(1000, 64), SAMPLE_RATE);
    expect(energies[0]).toBe(0);
  });

  it('gives all zeros for silence and for an empty frame', () => {
    expect(computeBandEnergies(new Float32Array(1024), SAMPLE_RATE)).toEqual(BAND_EDGES_HZ.map(() => 0));
    expect(computeBandEnergies(new Float32Array(0), SAMPLE_RATE)).toEqual(BAND_EDGES_HZ.map(() => 0));
  });
});
