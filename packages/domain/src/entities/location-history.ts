export interface HistoryPoint {
  readonly lat: number;
  readonly lng: number;
  readonly altitude?: number;
  readonly speed?: number;
  readonly heading?: number;
  readonly ts: Date;
}

export interface HistoryStatistics {
  /** Every point ever appended, including ones later dropped by compression. */
  readonly totalPoints: number;
  readonly totalDistanceKm: number;
  readonly minLat?: number;
  readonly maxLat?: number;
  readonly minLng?: number;
  readonly maxLng?: number;
  readonly avgSpeed?: number;
  readonly maxSpeed?: number;
  /** Points that carried a speed; the denominator of `avgSpeed`. */
  readonly speedSamples: number;
  readonly lastUpdate?: Date;
}

/** One bucket per shipment per UTC calendar day. */
export interface LocationHistoryBucket {
  readonly shipmentId: string;
  /** YYYY-MM-DD (UTC) */
  readonly date: string;
  readonly points: readonly HistoryPoint[];
  readonly statistics: HistoryStatistics;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly version: number;
}
