import { InvalidStateError } from '$types/errors';
import { selectMove } from './turn-move';
import type { GameRules } from './types';

const RULES: GameRules = { target: 21, maxSay: 3 };

describe('turn-move', () => {
  describe('selectMove', () => {
    describe('reaching the next multiple of 4', () => {
      it('should take 3 from 17 to reach 20', () => {
        expect(selectMove(17, RULES, () => 0)).toBe(3);
      });

      it('should take 2 from 18 and 1 from 19', () => {
        expect(selectMove(18, RULES, () => 0)).toBe(2);
        expect(selectMove(19, RULES, () => 0)).toBe(1);
      });

      it('should return the exact distance for every non-safe total', () => {
        for (let total = 0; total <= 19; total++) {
          if (total % 4 === 0) continue;
          const expected = 4 - (total % 4);
          expect(selectMove(total, RULES, () => 0.99)).toBe(expected);
        }
      });

      it('should not consult the random source when a safe total is reachable', () => {
        const random = vi.fn(() => 0.5);

        selectMove(5, RULES, random);

        expect(random).not.toHaveBeenCalled();
      });
    });

    describe('random play from a safe total', () => {
      it('should draw from 1..3 at the start of the game', () => {
        expect(selectMove(0, RULES, () => 0)).toBe(1);
        expect(selectMove(0, RULES, () => 0.5)).toBe(2);
        expect(selectMove(0, RULES, () => 0.99)).toBe(3);
      });

      it('should consult the random source exactly once', () => {
        const random = vi.fn(() => 0.4);

        expect(selectMove(8, RULES, random)).toBe(2);
        expect(random).toHaveBeenCalledTimes(1);
      });

      it('should allow all three moves from 16', () => {
        expect(selectMove(16, RULES, () => 0.99)).toBe(3);
      });

      it('should take the forced single move from 20', () => {
        expect(selectMove(20, RULES, () => 0.99)).toBe(1);
      });
    });

    describe('legality', () => {
      it('should never pass the target for any total and random draw', () => {
        const draws = [0, 0.2, 0.34, 0.5, 0.67, 0.9, 0.999];
        for (let total = 0; total <= 20; total++) {
          for (const r of draws) {
            const count = selectMove(total, RULES, () => r);
            expect(count).toBeGreaterThanOrEqual(1);
            expect(count).toBeLessThanOrEqual(3);
            expect(total + count).toBeLessThanOrEqual(21);
          }
        }
      });

      it('should only speak 21 from 20', () => {
        const draws = [0, 0.5, 0.999];
        for (let total = 0; total <= 19; total++) {
          for (const r of draws) {
            expect(total + selectMove(total, RULES, () => r)).toBeLessThan(21);
          }
        }
      });
    });

    describe('invalid state', () => {
      it('should throw for totals outside 0..20', () => {
        expect(() => selectMove(21, RULES, () => 0)).toThrow(InvalidStateError);
        expect(() => selectMove(-1, RULES, () => 0)).toThrow(InvalidStateError);
      });

      it('should throw for fractional totals', () => {
        expect(() => selectMove(4.5, RULES, () => 0)).toThrow(InvalidStateError);
      });
    });

    describe('other rule sets', () => {
      it('should aim for totals that leave the opponent on the target', () => {
        // target 10, up to 3: safe totals are 1, 5, 9
        const rules = { target: 10, maxSay: 3 };
        expect(selectMove(0, rules, () => 0.99)).toBe(1);
        expect(selectMove(2, rules, () => 0.99)).toBe(3);
        expect(selectMove(7, rules, () => 0.99)).toBe(2);
      });
    });
  });
});
