/**
 * Batch Status State Machine - Pure Domain Logic
 * NO DATABASE DEPENDENCIES - pure functions only.
 *
 * STATUS FLOW:
 * Ready → Shipped (terminal)
 *
 * Deletion is not a status: a batch in either status can be removed
 * outright by the orchestrator.
 */

import type { BatchStatus } from '../../database/types.js';

export type { BatchStatus };

export type BatchTimestampField = 'dateShipped';

export interface BatchTransitionDefinition {
    to: BatchStatus;
    timestamps: BatchTimestampField[];
    description: string;
}

export const BATCH_STATUSES: readonly BatchStatus[] = ['Ready', 'Shipped'] as const;

export const INITIAL_BATCH_STATUS: BatchStatus = 'Ready';

export const BATCH_STATUS_TRANSITIONS: Record<BatchStatus, BatchTransitionDefinition[]> = {
    Ready: [
        {
            to: 'Shipped',
            timestamps: ['dateShipped'],
            description: 'Ship the batch',
        },
    ],
    Shipped: [],
};

export function isBatchStatus(value: unknown): value is BatchStatus {
    return typeof value === 'string' && BATCH_STATUSES.some((status) => status === value);
}

export function getBatchTransition(
    from: BatchStatus,
    to: BatchStatus,
): BatchTransitionDefinition | null {
    return BATCH_STATUS_TRANSITIONS[from].find((t) => t.to === to) ?? null;
}

export function isValidBatchTransition(from: BatchStatus, to: BatchStatus): boolean {
    return getBatchTransition(from, to) !== null;
}

export function isTerminalBatchStatus(status: BatchStatus): boolean {
    return BATCH_STATUS_TRANSITIONS[status].length === 0;
}
