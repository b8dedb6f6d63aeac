export interface RefundRequest {
  sagaId: string;
  shipmentId: string;
  amount: number;
  currency: string;
}

export interface RefundPort {
  processRefund(request: RefundRequest): Promise<{ refundId: string }>;
  /** Reverses whatever `processRefund` did for this saga; no-op when nothing was refunded. */
  reverseRefund(sagaId: string): Promise<void>;
}
