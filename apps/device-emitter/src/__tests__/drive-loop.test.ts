import { describe, it, expect } from '@jest/globals';
import { setTimeout as delay } from 'node:timers/promises';
import { driveLoop } from '../drive-loop.js';
import type { ReportSource } from '../drive-loop.js';
import type { SimulatedReport } from '../simulator.js';

/** Arrives after `total` reports, one minute apart. */
function scriptedSource(total: number): ReportSource {
  let emitted = 0;
  return {
    get arrived() {
      return emitted >= total;
    },
    next(): SimulatedReport {
      emitted++;
      return {
        shipmentId: 'shp-loop',
        deviceId: 'dev-loop',
        latitude: 0,
        longitude: emitted * 0.01,
        timestamp: new Date(Date.UTC(2025, 0, 6, 8, emitted)).toISOString(),
        speed: 10,
        heading: 90,
        accuracy: 5,
      };
    },
  };
}

describe('driveLoop', () => {
  it('waits for each send before producing the next report', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const received: string[] = [];

    const sent = await driveLoop(
      scriptedSource(3),
      async (report) => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await delay(10); // slower than the interval
        received.push(report.timestamp);
        inFlight--;
      },
      1,
    );

    expect(sent).toBe(3);
    expect(maxInFlight).toBe(1);
    expect(received).toEqual([
      '2025-01-06T08:01:00.000Z',
      '2025-01-06T08:02:00.000Z',
      '2025-01-06T08:03:00.000Z',
    ]);
  });

  it('sends nothing for a source that has already arrived', async () => {
    const calls: SimulatedReport[] = [];
    const send = async (report: SimulatedReport): Promise<void> => {
      calls.push(report);
    };

    const sent = await driveLoop(scriptedSource(0), send, 1);

    expect(sent).toBe(0);
    expect(calls).toEqual([]);
  });
});
