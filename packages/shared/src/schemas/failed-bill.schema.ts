// ============================================================================
// Failed Bills — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  AgeBucket,
  GroupDimension,
} from '../constants/failed-bill.constants.js';

// --- Enum Value Arrays ---

const AGE_BUCKET_VALUES = [
  AgeBucket.DAYS_0_30,
  AgeBucket.DAYS_31_60,
  AgeBucket.DAYS_61_PLUS,
] as const;

const GROUP_DIMENSIONS = [
  GroupDimension.KIND,
  GroupDimension.PROVIDER,
  GroupDimension.AGE_BUCKET,
] as const;

// ============================================================================
// Raw Failed-Bill Payload (as produced by upstream adjudication)
// ============================================================================

export const rawServiceLineSchema = z.object({
  procedureCode: z.string().max(20),
  dateOfService: z.string().max(40).nullish(),
  units: z.union([z.number(), z.string().max(20)]).nullish(),
  modifiers: z.array(z.string().max(10)).nullish(),
});

export type RawServiceLine = z.infer<typeof rawServiceLineSchema>;

export const rawFailedBillSchema = z.object({
  filename: z.string().trim().min(1).max(255),
  provider: z.string().max(200).nullish(),
  serviceLines: z.array(rawServiceLineSchema).default([]),
  failureReasons: z.array(z.string().max(500)).default([]),
});

export type RawFailedBill = z.infer<typeof rawFailedBillSchema>;

// ============================================================================
// Triage Views
// ============================================================================

// --- List Failed Bills Query ---

export const failedBillListQuerySchema = z.object({
  kind: z.string().min(1).max(50).optional(),
  provider: z.string().min(1).max(200).optional(),
  age_bucket: z.enum(AGE_BUCKET_VALUES).optional(),
  search: z.string().max(255).optional(),
  group_by: z.enum(GROUP_DIMENSIONS).optional(),
});

export type FailedBillListQuery = z.infer<typeof failedBillListQuerySchema>;

// --- Filename Param ---

export const failedBillFilenameParamSchema = z.object({
  filename: z.string().min(1).max(255),
});

export type FailedBillFilenameParam = z.infer<
  typeof failedBillFilenameParamSchema
>;
