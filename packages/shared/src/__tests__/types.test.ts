import { RENDER_MODES, isRenderMode, type SentenceRecord } from '../types';

describe('Types', () => {
  describe('isRenderMode', () => {
    it('should accept every render mode', () => {
      expect(RENDER_MODES.every((mode) => isRenderMode(mode))).toBe(true);
    });

    it('should reject anything else', () => {
      expect(isRenderMode('draft')).toBe(false);
      expect(isRenderMode('Final')).toBe(false);
      expect(isRenderMode(undefined)).toBe(false);
      expect(isRenderMode(1)).toBe(false);
    });
  });

  describe('SentenceRecord', () => {
    it('should accept a record whose modification trails its creation', () => {
      const record: SentenceRecord = {
        position: 0,
        text: 'First.',
        createdAt: new Date('2024-01-01T10:00:00Z'),
        modifiedAt: new Date('2024-01-01T10:05:00Z'),
        author: 'Ada',
        revisionId: 1,
      };

      expect(record.modifiedAt.getTime()).toBeGreaterThanOrEqual(record.createdAt.getTime());
    });
  });
});
