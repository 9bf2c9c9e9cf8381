import { describe, it, expect } from '@jest/globals';
import {
  canonicalize,
  computeFingerprint,
  shortId,
} from '../../src/core/identity/fingerprint.js';

describe('Content Fingerprints', () => {
  describe('computeFingerprint', () => {
    it('should produce deterministic fingerprints for the same content', () => {
      const content = { statement: 'Logs must be retained.', index: 2 };

      expect(computeFingerprint(content)).toBe(computeFingerprint(content));
    });

    it('should produce different fingerprints for different content', () => {
      expect(computeFingerprint({ name: 'a' })).not.toBe(computeFingerprint({ name: 'b' }));
    });

    it('should ignore key order', () => {
      expect(computeFingerprint({ a: 1, b: 2, c: 3 })).toBe(computeFingerprint({ c: 3, a: 1, b: 2 }));
    });

    it('should prefix the algorithm', () => {
      expect(computeFingerprint([1, 2, { nested: true }])).toMatch(/^sha256:[a-f0-9]{64}$/);
    });

    it('should truncate when asked', () => {
      expect(computeFingerprint('x', 16)).toMatch(
        /^sha256:[a-f0-9]{16}$/
      );
    });
  });

  describe('canonicalize', () => {
    it('should sort keys and drop undefined values', () => {
      expect(canonicalize({ b: 1, a: 'x', skip: undefined })).toBe('{"a":"x","b":1}');
    });

    it('should render null and undefined alike', () => {
      expect(canonicalize(null)).toBe('null');
      expect(canonicalize(undefined)).toBe('null');
    });
  });

  describe('shortId', () => {
    it('should be 12 hex characters by default', () => {
      expect(shortId('The organization must enforce MFA.')).toMatch(/^[a-f0-9]{12}$/);
    });

    it('should be a prefix of the full sha256 fingerprint', () => {
      const full = computeFingerprint('abc');
      expect(full.startsWith(`sha256:${shortId('abc')}`)).toBe(true);
    });
  });
});
