/**
 * Domain layer - pure business rules, no database access
 */

export {
    BATCH_STATUSES,
    BATCH_STATUS_TRANSITIONS,
    INITIAL_BATCH_STATUS,
    getBatchTransition,
    isBatchStatus,
    isTerminalBatchStatus,
    isValidBatchTransition,
    type BatchTimestampField,
    type BatchTransitionDefinition,
} from './batches/stateMachine.js';

export {
    compareLowStockUrgency,
    isLowStock,
    rankLowStock,
    stockDeficit,
    stockRatio,
    type StockThreshold,
} from './materials/lowStock.js';

export {
    computeRequirements,
    isValidBatchQuantity,
    type MaterialRequirement,
    type RequirementLine,
} from './recipes/requirements.js';
