import { describe, it, expect } from 'vitest';
import { createMemoryStorage } from './memory-storage.js';

describe('createMemoryStorage', () => {
  describe('get', () => {
    it('get_KeyExists_ReturnsValue', async () => {
      // Arrange
      const storage = createMemoryStorage();
      await storage.set('oidc-token:https://idp.example.com#cli', '{"accessToken":"a"}');

      // Act
      const result = await storage.get('oidc-token:https://idp.example.com#cli');

      // Assert
      expect(result).toBe('{"accessToken":"a"}');
    });

    it('get_KeyDoesNotExist_ReturnsUndefined', async () => {
      const storage = createMemoryStorage();

      expect(await storage.get('nonexistent')).toBeUndefined();
    });

    it('get_InitialEntries_AreVisible', async () => {
      const storage = createMemoryStorage({ seeded: 'value' });

      expect(await storage.get('seeded')).toBe('value');
      expect(storage.writeCount()).toBe(0);
    });
  });

  describe('set', () => {
    it('set_OverwriteExistingKey_UpdatesValueAndCountsWrites', async () => {
      // Arrange
      const storage = createMemoryStorage();
      await storage.set('key', 'value1');

      // Act
      await storage.set('key', 'value2');

      // Assert
      expect(await storage.get('key')).toBe('value2');
      expect(storage.writeCount()).toBe(2);
    });
  });

  describe('delete', () => {
    it('delete_KeyExists_ReturnsTrueAndRemovesKey', async () => {
      // Arrange
      const storage = createMemoryStorage({ key: 'value' });

      // Act
      const result = await storage.delete('key');

      // Assert
      expect(result).toBe(true);
      expect(await storage.get('key')).toBeUndefined();
    });

    it('delete_KeyDoesNotExist_ReturnsFalse', async () => {
      const storage = createMemoryStorage();

      expect(await storage.delete('nonexistent')).toBe(false);
    });
  });

  describe('entries', () => {
    it('entries_ReturnsSnapshotNotLiveView', async () => {
      // Arrange
      const storage = createMemoryStorage({ a: '1' });
      const snapshot = storage.entries();

      // Act
      await storage.set('b', '2');

      // Assert
      expect([...snapshot.keys()]).toEqual(['a']);
      expect([...storage.entries().keys()]).toEqual(['a', 'b']);
    });
  });
});
