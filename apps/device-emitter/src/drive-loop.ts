import { setTimeout as delay } from 'node:timers/promises';
import type { SimulatedReport } from './simulator.js';

export interface ReportSource {
  next(): SimulatedReport;
  readonly arrived: boolean;
}

/**
 * Sends one report per interval until the source arrives. The next report is
 * only produced once the previous send has settled, so reports reach the API
 * in timestamp order. Resolves with the number of reports sent.
 */
export async function driveLoop(
  source: ReportSource,
  send: (report: SimulatedReport) => Promise<void>,
  intervalMs: number,
): Promise<number> {
  let sent = 0;
  while (!source.arrived) {
    await delay(intervalMs);
    await send(source.next());
    sent++;
  }
  return sent;
}
