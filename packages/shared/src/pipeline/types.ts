export type CorrelationId = string & { readonly __brand: "CorrelationId" };

export type BatchId = string & { readonly __brand: "BatchId" };

export type BatchContext = {
  batchId: BatchId;
  correlationId: CorrelationId;
  receivedAt: string;
};
