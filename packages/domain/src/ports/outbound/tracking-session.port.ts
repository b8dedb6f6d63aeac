export type TrackingSessionState = 'ACTIVE' | 'STOPPED';

export interface TrackingSession {
  readonly shipmentId: string;
  readonly state: TrackingSessionState;
  readonly startedAt: Date;
  readonly updatedAt: Date;
}

export interface TrackingSessionPort {
  /** Idempotent; starting an active session is a no-op. */
  start(shipmentId: string, at: Date): Promise<void>;
  stop(shipmentId: string, at: Date): Promise<void>;
  resume(shipmentId: string, at: Date): Promise<void>;
  get(shipmentId: string): Promise<TrackingSession | null>;
}
