import { describe, expect, it } from 'vitest';
import {
  concatSamples,
  createAudioFrame,
  decodeWav,
  encodeWav,
  frameDurationMs,
  frameEnergy,
  isVoicedFrame,
} from '../src/audio/pcm.js';
import { ScribeError } from '../src/errors.js';
import { silentSamples, voicedSamples } from './helpers.js';

describe('pcm', () => {
  it('normalizes RMS energy to 0..1', () => {
    expect(frameEnergy(voicedSamples(8000))).toBe(0.244140625);
    expect(frameEnergy(silentSamples())).toBe(0);
    expect(frameEnergy(new Int16Array(0))).toBe(0);
    expect(frameEnergy(Int16Array.from([-16384, 16384]))).toBe(0.5);
  });

  it('classifies frames against the energy threshold', () => {
    const quiet = createAudioFrame(voicedSamples(300), 'alice', 0, 0);
    const loud = createAudioFrame(voicedSamples(8000), 'alice', 1, 20);

    expect(isVoicedFrame(quiet, 0.015)).toBe(false);
    expect(isVoicedFrame(loud, 0.015)).toBe(true);
  });

  it('derives frame duration from the sample count', () => {
    expect(frameDurationMs(createAudioFrame(voicedSamples(), 'alice', 0, 0))).toBe(20);
    expect(frameDurationMs({ samples: new Int16Array(960), sampleRate: 48000, channels: 2 })).toBe(10);
  });

  it('concatenates frame payloads in order', () => {
    const frames = [
      createAudioFrame(Int16Array.from([1, 2]), 'alice', 0, 0),
      createAudioFrame(Int16Array.from([3]), 'alice', 1, 20),
    ];

    expect(Array.from(concatSamples(frames))).toEqual([1, 2, 3]);
  });

  it('wraps samples in a 16-bit PCM WAV container', () => {
    const wav = encodeWav(Int16Array.from([1, -1, 32767]), 16000, 1);

    expect(wav.length).toBe(50);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.readUInt32LE(4)).toBe(42);
    expect(wav.toString('ascii', 8, 16)).toBe('WAVEfmt ');
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(28)).toBe(32000);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.toString('ascii', 36, 40)).toBe('data');
    expect(wav.readUInt32LE(40)).toBe(6);
    expect([wav.readInt16LE(44), wav.readInt16LE(46), wav.readInt16LE(48)]).toEqual([1, -1, 32767]);
  });

  it('writes only the samples a view covers', () => {
    const view = Int16Array.from([9, 1, -1, 7]).subarray(1, 3);

    const wav = encodeWav(view, 16000, 1);

    expect(wav.length).toBe(48);
    expect(wav.readUInt32LE(40)).toBe(4);
    expect([wav.readInt16LE(44), wav.readInt16LE(46)]).toEqual([1, -1]);
  });

  it('copies a long utterance body byte for byte', () => {
    // 30s at 16kHz
    const samples = new Int16Array(480_000).map((_, i) => (i % 2000) - 1000);

    const wav = encodeWav(samples, 16000, 1);

    expect(wav.readUInt32LE(40)).toBe(960_000);
    expect(wav.readInt16LE(44)).toBe(-1000);
    expect(wav.readInt16LE(44 + 2 * 1999)).toBe(999);
    expect(wav.readInt16LE(44 + 2 * 479_999)).toBe(999);
  });

  it('reads back a PCM WAV file', () => {
    const decoded = decodeWav(encodeWav(Int16Array.from([1, -2, 3, -4]), 8000, 2));

    expect(decoded.sampleRate).toBe(8000);
    expect(decoded.channels).toBe(2);
    expect(Array.from(decoded.samples)).toEqual([1, -2, 3, -4]);
  });

  it('skips chunks it does not know', () => {
    const plain = encodeWav(Int16Array.from([5, 6]), 16000, 1);
    const list = Buffer.alloc(8 + 3 + 1);
    list.write('LIST', 0, 'ascii');
    list.writeUInt32LE(3, 4);
    const wav = Buffer.concat([plain.subarray(0, 36), list, plain.subarray(36)]);

    expect(Array.from(decodeWav(wav).samples)).toEqual([5, 6]);
  });

  it('rejects compressed and foreign files', () => {
    const eightBit = encodeWav(Int16Array.from([1]), 16000, 1);
    eightBit.writeUInt16LE(8, 34);

    expect(() => decodeWav(Buffer.from('ID3 not a wave file'))).toThrow('Unsupported audio: not a RIFF/WAVE file');
    expect(() => decodeWav(eightBit)).toThrow('Unsupported audio: format 1 at 8 bits, expected 16-bit PCM');
    expect(() => decodeWav(eightBit)).toThrow(ScribeError);
  });
});
