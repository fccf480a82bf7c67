import {
    compareLowStockUrgency,
    isLowStock,
    rankLowStock,
    stockDeficit,
    stockRatio,
    type StockThreshold,
} from '../lowStock.js';

function material(
    name: string,
    stockLevel: number,
    reorderLevel: number,
    lotNumber: number | null = null,
): StockThreshold {
    return { name, stockLevel, reorderLevel, lotNumber };
}

describe('lowStock', () => {
    it('counts stock equal to the reorder level as low', () => {
        expect(isLowStock(material('Cups', 50, 50))).toBe(true);
        expect(isLowStock(material('Cups', 51, 50))).toBe(false);
    });

    it('has no ratio when the reorder level is zero or below', () => {
        expect(stockRatio(material('Lids', 0, 0))).toBeNull();
        expect(stockRatio(material('Lids', 5, -1))).toBeNull();
        expect(stockRatio(material('Cups', 25, 100))).toBe(0.25);
    });

    it('measures the deficit as reorder minus stock', () => {
        expect(stockDeficit(material('Cups', 25, 100))).toBe(75);
    });

    describe('compareLowStockUrgency', () => {
        it('puts zero-reorder rows ahead of any ratio', () => {
            expect(compareLowStockUrgency(material('Lids', 0, 0), material('Cups', 0, 10))).toBeLessThan(0);
            expect(compareLowStockUrgency(material('Cups', 0, 10), material('Lids', 0, 0))).toBeGreaterThan(0);
        });

        it('breaks equal ratios by the larger deficit', () => {
            const small = material('Straws', 5, 10);
            const large = material('Cups', 50, 100);
            expect(compareLowStockUrgency(large, small)).toBeLessThan(0);
        });

        it('orders lots of the same material with the lot-less row first', () => {
            expect(compareLowStockUrgency(material('Tea', 1, 2, null), material('Tea', 1, 2, 7))).toBe(-1);
            expect(compareLowStockUrgency(material('Tea', 1, 2, 9), material('Tea', 1, 2, 7))).toBe(2);
            expect(compareLowStockUrgency(material('Tea', 1, 2, 7), material('Tea', 1, 2, 7))).toBe(0);
        });
    });

    it('drops healthy rows and ranks the rest by urgency', () => {
        const ranked = rankLowStock([
            material('Milk', 200, 200),
            material('Beans', 900, 100),
            material('Sugar', 10, 100),
            material('Lids', 0, 0),
            material('Tea', 60, 120),
        ]);

        expect(ranked.map((m) => m.name)).toEqual(['Lids', 'Sugar', 'Tea', 'Milk']);
    });
});
