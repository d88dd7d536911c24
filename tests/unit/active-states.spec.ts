import {
  newlyActiveStates,
  statesChanged,
} from '../../src/utils/active-states';

describe('active state helpers', () => {
  describe('statesChanged', () => {
    it('should treat equal sets in any order as unchanged', () => {
      expect(statesChanged(['cart'], ['cart'])).toBe(false);
      expect(statesChanged(['cart', 'payment'], ['payment', 'cart'])).toBe(false);
    });

    it('should detect added or replaced states', () => {
      expect(statesChanged(['cart'], ['cart', 'payment'])).toBe(true);
      expect(statesChanged(['cart'], ['payment'])).toBe(true);
      expect(statesChanged(['cart'], [])).toBe(true);
    });
  });

  describe('newlyActiveStates', () => {
    it('should list states active after but not before, once each', () => {
      expect(
        newlyActiveStates(['cart'], ['cart', 'payment', 'payment']),
      ).toEqual(['payment']);
    });

    it('should return nothing when states only drop out', () => {
      expect(newlyActiveStates(['cart', 'payment'], ['cart'])).toEqual([]);
    });
  });
});
