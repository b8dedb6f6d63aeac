import { v4 as uuidv4 } from 'uuid';
import type { RefundPort, RefundRequest } from '@cargotrace/domain';
import { getPool } from './pool.js';
import type { Queryable } from './pool.js';

/** Records refunds for the payment relay; one refund per saga. */
export class PgRefundLedger implements RefundPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async processRefund(request: RefundRequest): Promise<{ refundId: string }> {
    const { rows } = await this.db.query(
      `INSERT INTO tracking.refunds (saga_id, refund_id, shipment_id, amount, currency, status)
       VALUES ($1,$2,$3,$4,$5,'PROCESSED')
       ON CONFLICT (saga_id) DO UPDATE SET updated_at = NOW()
       RETURNING refund_id`,
      [request.sagaId, uuidv4(), request.shipmentId, request.amount, request.currency],
    );
    const refundId = rows[0]?.['refund_id'];
    if (typeof refundId !== 'string') throw new Error(`Refund for saga ${request.sagaId} was not recorded`);
    return { refundId };
  }

  async reverseRefund(sagaId: string): Promise<void> {
    await this.db.query(
      `UPDATE tracking.refunds SET status = 'REVERSED', updated_at = NOW()
       WHERE saga_id = $1 AND status = 'PROCESSED'`,
      [sagaId],
    );
  }
}
