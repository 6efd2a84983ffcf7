import { randomUUID } from "node:crypto";
import type { BatchId, CorrelationId } from "./types.js";

export function asCorrelationId(value: string): CorrelationId {
  return value as CorrelationId;
}

export function newCorrelationId(): CorrelationId {
  return asCorrelationId(randomUUID());
}

export function asBatchId(value: string): BatchId {
  return value as BatchId;
}

export function newBatchId(): BatchId {
  return asBatchId(randomUUID());
}
