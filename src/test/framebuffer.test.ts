import { describe, it, expect } from 'vitest';
import { Framebuffer, UPPER_HALF } from '../engine/Framebuffer.js';
import { Color, RESET, bgRGB, fgRGB } from '../utils/Colors.js';

describe('Framebuffer', () => {
  it('clears to the clear colour with nothing written', () => {
    const fb = new Framebuffer(2, 2);
    expect(fb.getPixel(1, 1)?.toArray()).toEqual([12, 12, 20]);
    expect(fb.countWritten()).toBe(0);
    expect(fb.getPixel(2, 0)).toBeNull();
  });

  it('marks written pixels until the next clear', () => {
    const fb = new Framebuffer(2, 2, new Color(1, 2, 3));
    fb.setPixel(0, 1, 100, 110, 120);
    fb.setPixel(-1, 0, 1, 1, 1);
    expect(fb.isWritten(0, 1)).toBe(true);
    expect(fb.countWritten()).toBe(1);
    fb.clear();
    expect(fb.isWritten(0, 1)).toBe(false);
    expect(fb.getPixel(0, 1)?.toArray()).toEqual([1, 2, 3]);
  });

  describe('toHalfBlockLines', () => {
    it('puts even rows in the foreground and odd rows in the background', () => {
      const fb = new Framebuffer(2, 2, Color.black());
      fb.setPixel(0, 0, 255, 0, 0);
      fb.setPixel(0, 1, 0, 0, 255);
      const lines = fb.toHalfBlockLines(2, 1, 1);
      expect(lines).toEqual([
        fgRGB(255, 0, 0) + bgRGB(0, 0, 255) + UPPER_HALF +
        fgRGB(0, 0, 0) + bgRGB(0, 0, 0) + UPPER_HALF + RESET,
      ]);
    });

    it('only emits colour codes that change', () => {
      const fb = new Framebuffer(3, 4, Color.black());
      fb.setPixel(2, 1, 9, 9, 9);
      const lines = fb.toHalfBlockLines(3, 2, 1);
      expect(lines).toEqual([
        fgRGB(0, 0, 0) + bgRGB(0, 0, 0) + UPPER_HALF + UPPER_HALF + bgRGB(9, 9, 9) + UPPER_HALF + RESET,
        fgRGB(0, 0, 0) + bgRGB(0, 0, 0) + UPPER_HALF.repeat(3) + RESET,
      ]);
    });

    it('averages n x n blocks with a floor when supersampling', () => {
      // One cell at factor 2: 2 pixels wide, 4 tall
      const fb = new Framebuffer(2, 4, Color.black());
      fb.setPixel(0, 0, 10, 0, 0);
      fb.setPixel(1, 0, 20, 0, 0);
      fb.setPixel(0, 1, 30, 0, 0);
      fb.setPixel(1, 1, 41, 0, 0);
      fb.setPixel(0, 2, 0, 3, 0);
      const lines = fb.toHalfBlockLines(1, 1, 2);
      expect(lines).toEqual([fgRGB(25, 0, 0) + bgRGB(0, 0, 0) + UPPER_HALF + RESET]);
    });

    it('returns no lines for an empty buffer', () => {
      expect(new Framebuffer(0, 0).toHalfBlockLines(4, 2, 1)).toEqual([]);
    });
  });
});

describe('Color', () => {
  it('parses and prints hex', () => {
    expect(Color.fromHex('#ff8000').toArray()).toEqual([255, 128, 0]);
    expect(Color.fromHex('nonsense').toArray()).toEqual([0, 0, 0]);
    expect(new Color(255, 128, 0).toHex()).toBe('#ff8000');
  });

  it('truncates and clamps channels', () => {
    expect(new Color(300, -4, 12.9).clamped().toArray()).toEqual([255, 0, 12]);
  });

  it('builds 24-bit escape codes', () => {
    expect(new Color(1, 2, 3).toFgAnsi()).toBe('\x1b[38;2;1;2;3m');
    expect(new Color(1, 2, 3).toBgAnsi()).toBe('\x1b[48;2;1;2;3m');
  });
});
