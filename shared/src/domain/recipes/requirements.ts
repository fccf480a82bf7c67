/**
 * Batch requirement arithmetic
 *
 * Recipe quantities are per ONE unit of product; a batch needs
 * quantity_needed × batch quantity of each ingredient.
 */

export interface RequirementLine {
    materialName: string;
    quantityNeeded: number;
}

export interface MaterialRequirement {
    materialName: string;
    required: number;
}

export function isValidBatchQuantity(quantity: number): boolean {
    return Number.isInteger(quantity) && quantity > 0;
}

/**
 * Scale recipe lines to a batch and merge repeated ingredients.
 * Output keeps the order in which each ingredient first appears.
 */
export function computeRequirements(
    lines: readonly RequirementLine[],
    batchQuantity: number,
): MaterialRequirement[] {
    const byName = new Map<string, number>();
    for (const line of lines) {
        const current = byName.get(line.materialName) ?? 0;
        byName.set(line.materialName, current + line.quantityNeeded * batchQuantity);
    }
    return Array.from(byName, ([materialName, required]) => ({ materialName, required }));
}
