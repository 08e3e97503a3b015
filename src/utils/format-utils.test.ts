import { describe, expect, it } from 'vitest';
import { formatDuration, formatGigabytes, formatSize } from './format-utils';

describe('Format Utils', () => {
  describe('formatDuration', () => {
    it('should format seconds', () => {
      expect(formatDuration(5000)).toBe('5s');
    });

    it('should format minutes', () => {
      expect(formatDuration(125000)).toBe('2m 5s');
    });

    it('should format hours', () => {
      expect(formatDuration(3665000)).toBe('1h 1m');
    });
  });

  describe('formatSize', () => {
    it('should pick the largest unit below 1024', () => {
      expect(formatSize(512)).toBe('512.00 B');
      expect(formatSize(1536)).toBe('1.50 KB');
      expect(formatSize(420 * 1024 * 1024)).toBe('420.00 MB');
      expect(formatSize(6 * 1024 ** 3)).toBe('6.00 GB');
    });
  });

  describe('formatGigabytes', () => {
    it('should use binary gigabytes', () => {
      expect(formatGigabytes(5 * 1024 ** 3)).toBe('5.00');
      expect(formatGigabytes(1024 ** 3 / 4)).toBe('0.25');
    });
  });
});
