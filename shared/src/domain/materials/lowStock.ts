/**
 * Low-stock ranking
 *
 * A material is low when stock_level <= reorder_level. Urgency order:
 *   1. reorder_level <= 0 first (no ratio can be computed, always urgent)
 *   2. ascending stock_level / reorder_level
 *   3. larger absolute deficit first
 *   4. name, then lot (nulls first), for a stable order
 */

export interface StockThreshold {
    name: string;
    stockLevel: number;
    reorderLevel: number;
    lotNumber: number | null;
}

export function isLowStock(material: Pick<StockThreshold, 'stockLevel' | 'reorderLevel'>): boolean {
    return material.stockLevel <= material.reorderLevel;
}

/**
 * stock/reorder ratio, or null when the reorder level cannot divide
 */
export function stockRatio(material: Pick<StockThreshold, 'stockLevel' | 'reorderLevel'>): number | null {
    return material.reorderLevel > 0 ? material.stockLevel / material.reorderLevel : null;
}

export function stockDeficit(material: Pick<StockThreshold, 'stockLevel' | 'reorderLevel'>): number {
    return material.reorderLevel - material.stockLevel;
}

export function compareLowStockUrgency(a: StockThreshold, b: StockThreshold): number {
    const ratioA = stockRatio(a);
    const ratioB = stockRatio(b);

    if (ratioA === null && ratioB !== null) return -1;
    if (ratioA !== null && ratioB === null) return 1;
    if (ratioA !== null && ratioB !== null && ratioA !== ratioB) return ratioA - ratioB;

    const deficitDiff = stockDeficit(b) - stockDeficit(a);
    if (deficitDiff !== 0) return deficitDiff;

    const byName = a.name.localeCompare(b.name);
    if (byName !== 0) return byName;

    if (a.lotNumber === b.lotNumber) return 0;
    if (a.lotNumber === null) return -1;
    if (b.lotNumber === null) return 1;
    return a.lotNumber - b.lotNumber;
}

/**
 * Filter to low-stock rows and order them most urgent first.
 */
export function rankLowStock<T extends StockThreshold>(materials: readonly T[]): T[] {
    return materials.filter(isLowStock).sort(compareLowStockUrgency);
}
