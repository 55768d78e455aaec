import { sha256Hash, shortHash } from '../../utils/cryptoUtils';

describe('Crypto Utilities', () => {
  describe('sha256Hash', () => {
    it('should hash a string to the known SHA-256 digest', () => {
      // Given: The standard "abc" test vector
      // When: Hash it
      const hash = sha256Hash('abc');

      // Then: Should match the published digest
      expect(hash).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    });

    it('should create consistent hashes for the same object', () => {
      const input = { height: 101, forkId: 'v27' };

      expect(sha256Hash(input)).toBe(sha256Hash({ height: 101, forkId: 'v27' }));
    });

    it('should hash objects through their JSON serialization', () => {
      // Given: An object and its JSON text
      const input = { test: 'data' };

      // Then: Both hash the same
      expect(sha256Hash(input)).toBe(sha256Hash('{"test":"data"}'));
    });

    it('should create different hashes for different inputs', () => {
      expect(sha256Hash({ test: 'data1' })).not.toBe(sha256Hash({ test: 'data2' }));
    });
  });

  describe('shortHash', () => {
    it('should keep the first 8 characters by default', () => {
      expect(shortHash('ba7816bf8f01cfea')).toBe('ba7816bf');
    });

    it('should honour a custom length', () => {
      expect(shortHash('ba7816bf8f01cfea', 4)).toBe('ba78');
    });
  });
});
