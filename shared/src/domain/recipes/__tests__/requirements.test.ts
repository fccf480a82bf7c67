import { computeRequirements, isValidBatchQuantity } from '../requirements.js';

describe('isValidBatchQuantity', () => {
    it.each([1, 10, 10000])('accepts %s', (quantity) => {
        expect(isValidBatchQuantity(quantity)).toBe(true);
    });

    it.each([0, -1, 2.5, Number.NaN, Number.POSITIVE_INFINITY])('rejects %s', (quantity) => {
        expect(isValidBatchQuantity(quantity)).toBe(false);
    });
});

describe('computeRequirements', () => {
    it('scales each per-unit quantity by the batch size', () => {
        expect(
            computeRequirements(
                [
                    { materialName: 'Matcha', quantityNeeded: 2 },
                    { materialName: 'Milk', quantityNeeded: 30 },
                ],
                10,
            ),
        ).toEqual([
            { materialName: 'Matcha', required: 20 },
            { materialName: 'Milk', required: 300 },
        ]);
    });

    it('merges a repeated ingredient at its first position', () => {
        expect(
            computeRequirements(
                [
                    { materialName: 'Matcha', quantityNeeded: 2 },
                    { materialName: 'Milk', quantityNeeded: 30 },
                    { materialName: 'Matcha', quantityNeeded: 3 },
                ],
                10,
            ),
        ).toEqual([
            { materialName: 'Matcha', required: 50 },
            { materialName: 'Milk', required: 300 },
        ]);
    });

    it('returns nothing for an empty recipe', () => {
        expect(computeRequirements([], 4)).toEqual([]);
    });
});
