import { bearingDeg, distanceKm } from '@cargotrace/domain';
import type { GeoPoint } from '@cargotrace/domain';
import type { DriveRng } from './drive-rng.js';

/** Body of `POST /api/locations`. */
export interface SimulatedReport {
  shipmentId: string;
  deviceId: string;
  latitude: number;
  longitude: number;
  /** ISO-8601 */
  timestamp: string;
  /** metres per second */
  speed: number;
  heading: number;
  accuracy: number;
}

export interface SimulatorOptions {
  shipmentId: string;
  deviceId: string;
  from: GeoPoint;
  to: GeoPoint;
  intervalMs: number;
  start: Date;
  rng: DriveRng;
}

type DrivePhase = 'idle' | 'accel' | 'cruise' | 'decel';

const KM_PER_DEG_LAT = 111;

/**
 * Drives a device from `from` towards `to` through idle, accelerate, cruise
 * and decelerate phases. Every random draw comes from the seeded generator,
 * so one seed always produces the same track.
 */
export class DeviceSimulator {
  private position: GeoPoint;
  private speedKph = 0;
  private phase: DrivePhase = 'idle';
  private phaseTicks = 0;
  private cruiseTarget = 0;
  private tick = 0;
  private done = false;

  constructor(private readonly opts: SimulatorOptions) {
    this.position = opts.from;
  }

  get arrived(): boolean {
    return this.done;
  }

  next(): SimulatedReport {
    this.tick++;
    const rng = this.opts.rng;
    let heading = bearingDeg(this.position, this.opts.to);

    if (!this.done) {
      this.step();
      heading = (heading + rng.between(-2.5, 2.5) + 360) % 360;

      const distKmStep = (this.speedKph / 3600) * (this.opts.intervalMs / 1000);
      const remainingKm = distanceKm(this.position, this.opts.to);
      if (distKmStep >= remainingKm) {
        this.position = this.opts.to;
        this.speedKph = 0;
        this.done = true;
      } else {
        this.position = move(this.position, heading, distKmStep);
      }
    }

    return {
      shipmentId: this.opts.shipmentId,
      deviceId: this.opts.deviceId,
      latitude: this.position.lat,
      longitude: this.position.lng,
      timestamp: new Date(this.opts.start.getTime() + this.tick * this.opts.intervalMs).toISOString(),
      speed: Math.round((this.speedKph / 3.6) * 10) / 10,
      heading: Math.round(heading) % 360,
      accuracy: Math.round(rng.between(3, 25)),
    };
  }

  // ─── Drive phases ───────────────────────────────────────────────────────────

  private nextPhase(): void {
    const rng = this.opts.rng;
    switch (this.phase) {
      case 'idle':
        this.phase = 'accel';
        this.cruiseTarget = rng.between(30, 100); // km/h
        this.phaseTicks = rng.wholeBetween(8, 16);
        break;
      case 'accel':
        this.phase = 'cruise';
        this.phaseTicks = rng.wholeBetween(10, 30);
        break;
      case 'cruise':
        if (rng.chance(0.3)) {
          this.phase = 'idle';
          this.phaseTicks = rng.wholeBetween(5, 15);
        } else {
          this.phase = 'decel';
          this.phaseTicks = rng.wholeBetween(5, 12);
        }
        break;
      case 'decel':
        this.phase = 'accel';
        this.cruiseTarget = rng.between(30, 100);
        this.phaseTicks = rng.wholeBetween(6, 15);
        break;
    }
  }

  private step(): void {
    if (this.phaseTicks <= 0) this.nextPhase();
    this.phaseTicks--;

    switch (this.phase) {
      case 'idle':
        this.speedKph = this.speedKph < 1 ? 0 : this.speedKph * 0.5;
        break;
      case 'accel':
        this.speedKph += (this.cruiseTarget - this.speedKph) * 0.25;
        break;
      case 'cruise':
        this.speedKph = Math.max(5, this.cruiseTarget + this.opts.rng.between(-2, 2));
        break;
      case 'decel':
        this.speedKph = Math.max(0, this.speedKph * 0.8);
        break;
    }
  }
}

/** Flat-earth displacement; good enough over one reporting interval. */
function move(from: GeoPoint, headingDeg: number, km: number): GeoPoint {
  const rad = (headingDeg * Math.PI) / 180;
  const dLat = (km * Math.cos(rad)) / KM_PER_DEG_LAT;
  const dLng = (km * Math.sin(rad)) / (KM_PER_DEG_LAT * Math.cos((from.lat * Math.PI) / 180));
  return { lat: from.lat + dLat, lng: from.lng + dLng };
}
