/**
 * Payload Schemas
 * zod schemas for the data the provider pushes under each top-level key.
 * Objects pass unknown fields through so provider additions do not fail decoding.
 */

import { z } from 'zod';

export const BlockSchema = z
  .object({
    id: z.string(),
    height: z.number().int().nonnegative(),
    timestamp: z.number(),
    tx_count: z.number().int().nonnegative(),
    size: z.number().nonnegative(),
    weight: z.number().nonnegative(),
  })
  .passthrough();

export const MempoolBlockSchema = z
  .object({
    blockSize: z.number().nonnegative(),
    blockVSize: z.number().nonnegative(),
    nTx: z.number().int().nonnegative(),
    totalFees: z.number().nonnegative(),
    medianFee: z.number(),
    feeRange: z.array(z.number()),
  })
  .passthrough();

export const LiveChartPointSchema = z
  .object({
    added: z.number(),
  })
  .passthrough();

export const MempoolInfoSchema = z
  .object({
    size: z.number().int().nonnegative(),
    bytes: z.number().nonnegative(),
  })
  .passthrough();

export const RecommendedFeesSchema = z
  .object({
    fastestFee: z.number(),
    halfHourFee: z.number(),
    hourFee: z.number(),
    economyFee: z.number(),
    minimumFee: z.number(),
  })
  .passthrough();

export const DifficultyAdjustmentSchema = z
  .object({
    progressPercent: z.number(),
    difficultyChange: z.number(),
    remainingBlocks: z.number().int(),
    estimatedRetargetDate: z.number(),
  })
  .passthrough();

export const TransactionSummarySchema = z
  .object({
    txid: z.string(),
    fee: z.number(),
    vsize: z.number(),
    value: z.number(),
  })
  .passthrough();

export const TransactionSchema = z
  .object({
    txid: z.string(),
  })
  .passthrough();

export const AddressActivitySchema = z.object({
  mempool: z.array(TransactionSchema).default([]),
  confirmed: z.array(TransactionSchema).default([]),
  removed: z.array(TransactionSchema).default([]),
});

export const MultiAddressActivitySchema = z.record(z.string(), AddressActivitySchema);

export const ProjectedBlockTransactionsSchema = z
  .object({
    index: z.number().int().nonnegative(),
  })
  .passthrough();

export const MempoolTransactionsSchema = z
  .object({
    added: z.array(TransactionSchema).default([]),
    removed: z.array(z.unknown()).default([]),
  })
  .passthrough();

export const MempoolTxidsSchema = z
  .object({
    added: z.array(z.string()).default([]),
    removed: z.array(z.string()).default([]),
  })
  .passthrough();

export const RbfReplacementsSchema = z.array(z.unknown());

export type Block = z.infer<typeof BlockSchema>;
export type MempoolBlock = z.infer<typeof MempoolBlockSchema>;
export type LiveChartPoint = z.infer<typeof LiveChartPointSchema>;
export type MempoolInfo = z.infer<typeof MempoolInfoSchema>;
export type RecommendedFees = z.infer<typeof RecommendedFeesSchema>;
export type DifficultyAdjustment = z.infer<typeof DifficultyAdjustmentSchema>;
export type TransactionSummary = z.infer<typeof TransactionSummarySchema>;
export type Transaction = z.infer<typeof TransactionSchema>;
export type AddressActivity = z.infer<typeof AddressActivitySchema>;
export type ProjectedBlockTransactions = z.infer<typeof ProjectedBlockTransactionsSchema>;
export type MempoolTransactions = z.infer<typeof MempoolTransactionsSchema>;
export type MempoolTxids = z.infer<typeof MempoolTxidsSchema>;
export type RbfReplacements = z.infer<typeof RbfReplacementsSchema>;

/**
 * Payload type carried under each recognised inbound key
 */
export interface PayloadMap {
  block: Block;
  blocks: Block[];
  'mempool-blocks': MempoolBlock[];
  'live-2h-chart': LiveChartPoint;
  mempoolInfo: MempoolInfo;
  vBytesPerSecond: number;
  fees: RecommendedFees;
  da: DifficultyAdjustment;
  transactions: TransactionSummary[];
  'address-transactions': Transaction[];
  'address-block-transactions': Transaction[];
  'multi-address-transactions': AddressActivity;
  'projected-block-transactions': ProjectedBlockTransactions;
  'mempool-transactions': MempoolTransactions;
  'mempool-txids': MempoolTxids;
  rbfLatest: RbfReplacements;
  rbfLatestSummary: RbfReplacements;
}

export type EventKey = keyof PayloadMap;
