import { describe, it, expect } from '@jest/globals';
import { extractPointOutcome, OUTCOMES, parseOutcome, rankOf, reconcile, worse } from '../outcome.js';

describe('outcome', () => {
  describe('parseOutcome', () => {
    it('should match known outcomes case-insensitively', () => {
      expect(parseOutcome('failed')).toBe('Failed');
      expect(parseOutcome(' Passed ')).toBe('Passed');
      expect(parseOutcome('notApplicable')).toBe('NotApplicable');
    });

    it('should treat empty and unknown statuses as NeverRun', () => {
      expect(parseOutcome(undefined)).toBe('NeverRun');
      expect(parseOutcome(null)).toBe('NeverRun');
      expect(parseOutcome('')).toBe('NeverRun');
      expect(parseOutcome('Unspecified')).toBe('NeverRun');
      expect(parseOutcome('InProgress')).toBe('NeverRun');
    });
  });

  describe('rankOf', () => {
    it('should rank every outcome below the one listed before it', () => {
      for (let i = 1; i < OUTCOMES.length; i++) {
        expect(rankOf(OUTCOMES[i - 1])).toBeGreaterThan(rankOf(OUTCOMES[i]));
      }
    });
  });

  describe('worse', () => {
    it('should keep the higher-precedence outcome', () => {
      expect(worse('Passed', 'Failed')).toBe('Failed');
      expect(worse('Blocked', 'Paused')).toBe('Blocked');
      expect(worse('NotApplicable', 'Passed')).toBe('NotApplicable');
      expect(worse('NeverRun', 'Passed')).toBe('Passed');
    });

    it('should be commutative', () => {
      for (const a of OUTCOMES) {
        for (const b of OUTCOMES) {
          expect(worse(a, b)).toBe(worse(b, a));
        }
      }
    });
  });

  describe('reconcile', () => {
    it('should fold observations into the worst outcome', () => {
      expect(reconcile(['Passed', 'Failed', 'Passed'])).toBe('Failed');
      expect(reconcile(['Active', 'Paused'])).toBe('Paused');
      expect(reconcile(['Active', 'Blocked'])).toBe('Blocked');
      expect(reconcile(['Passed', undefined])).toBe('Passed');
    });

    it('should not depend on the order of observations', () => {
      const observed = ['Passed', 'NotApplicable', 'Unspecified', 'Paused', ''];
      const expected = reconcile(observed);
      for (let shift = 1; shift < observed.length; shift++) {
        const rotated = [...observed.slice(shift), ...observed.slice(0, shift)];
        expect(reconcile(rotated)).toBe(expected);
        expect(reconcile([...rotated].reverse())).toBe(expected);
      }
      expect(expected).toBe('Paused');
    });

    it('should be NeverRun for no observations', () => {
      expect(reconcile([])).toBe('NeverRun');
    });
  });

  describe('extractPointOutcome', () => {
    it('should use the first non-empty outcome field', () => {
      expect(extractPointOutcome({ outcome: '', mostRecentResult: { outcome: 'Failed' } })).toBe('Failed');
      expect(
        extractPointOutcome({ lastTestRun: { outcome: 'Passed' }, lastResultDetails: { outcome: 'Blocked' } })
      ).toBe('Passed');
      expect(extractPointOutcome({ outcome: null, lastResultDetails: { outcome: 'Blocked' } })).toBe('Blocked');
    });

    it('should return undefined when no field carries an outcome', () => {
      expect(extractPointOutcome({})).toBeUndefined();
      expect(extractPointOutcome({ mostRecentResult: null })).toBeUndefined();
    });
  });
});
