import { describe, it, expect } from '@jest/globals';
import { seededRng } from '../drive-rng.js';
import { DeviceSimulator } from '../simulator.js';
import type { SimulatedReport } from '../simulator.js';

const START = new Date(Date.UTC(2025, 0, 6, 8, 0, 0));

function drive(seed: number, maxTicks = 500): { reports: SimulatedReport[]; sim: DeviceSimulator } {
  const sim = new DeviceSimulator({
    shipmentId: 'shp-sim',
    deviceId: 'dev-sim',
    from: { lat: 0, lng: 0 },
    to: { lat: 0, lng: 0.05 },
    intervalMs: 60_000,
    start: START,
    rng: seededRng(seed),
  });
  const reports: SimulatedReport[] = [];
  while (!sim.arrived && reports.length < maxTicks) reports.push(sim.next());
  return { reports, sim };
}

describe('DeviceSimulator', () => {
  it('replays the same track for the same seed', () => {
    expect(drive(7).reports).toEqual(drive(7).reports);
  });

  it('produces a different track for another seed', () => {
    expect(drive(7).reports).not.toEqual(drive(8).reports);
  });

  it('reaches the destination and stops there', () => {
    const { reports, sim } = drive(42);

    expect(sim.arrived).toBe(true);
    const last = reports[reports.length - 1];
    expect(last).toMatchObject({ latitude: 0, longitude: 0.05, speed: 0 });
  });

  it('spaces reports one interval apart with plausible readings', () => {
    const { reports } = drive(3);

    reports.forEach((r, i) => {
      expect(r.timestamp).toBe(new Date(START.getTime() + (i + 1) * 60_000).toISOString());
      expect(r.speed).toBeGreaterThanOrEqual(0);
      expect(r.heading).toBeGreaterThanOrEqual(0);
      expect(r.heading).toBeLessThan(360);
      expect(r.accuracy).toBeGreaterThanOrEqual(3);
      expect(r.accuracy).toBeLessThanOrEqual(25);
    });
  });
});
