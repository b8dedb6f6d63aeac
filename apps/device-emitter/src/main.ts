import 'dotenv/config';
import { fetch } from 'undici';
import { z } from 'zod';
import { driveLoop } from './drive-loop.js';
import { seededRng } from './drive-rng.js';
import { DeviceSimulator } from './simulator.js';
import type { SimulatedReport } from './simulator.js';

/**
 * Simulated GPS device: one process per tracked shipment.
 *
 * Env vars:
 *   SHIPMENT_ID       shipment to report for (required)
 *   DEVICE_ID         device identifier (default: sim-<SHIPMENT_ID>)
 *   API_BASE_URL      base URL of the tracking API (default: http://localhost:3001)
 *   EMIT_INTERVAL_MS  reporting interval in ms (default: 2000)
 *   START_LAT/LNG     route start
 *   END_LAT/LNG       route end
 *   SEED              seed for the drive simulation (default: 1)
 */

const EnvSchema = z.object({
  SHIPMENT_ID: z.string().min(1),
  DEVICE_ID: z.string().min(1).optional(),
  API_BASE_URL: z.string().url().default('http://localhost:3001'),
  EMIT_INTERVAL_MS: z.coerce.number().int().min(100).default(2000),
  START_LAT: z.coerce.number().min(-90).max(90),
  START_LNG: z.coerce.number().min(-180).max(180),
  END_LAT: z.coerce.number().min(-90).max(90),
  END_LNG: z.coerce.number().min(-180).max(180),
  SEED: z.coerce.number().int().default(1),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  for (const issue of parsed.error.issues) {
    console.error(`[emitter] ${issue.path.join('.')}: ${issue.message}`);
  }
  process.exit(1);
}
const env = parsed.data;
const deviceId = env.DEVICE_ID ?? `sim-${env.SHIPMENT_ID}`;

const simulator = new DeviceSimulator({
  shipmentId: env.SHIPMENT_ID,
  deviceId,
  from: { lat: env.START_LAT, lng: env.START_LNG },
  to: { lat: env.END_LAT, lng: env.END_LNG },
  intervalMs: env.EMIT_INTERVAL_MS,
  start: new Date(),
  rng: seededRng(env.SEED),
});

async function post(report: SimulatedReport): Promise<void> {
  try {
    const resp = await fetch(`${env.API_BASE_URL}/api/locations`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'x-user-id': deviceId },
      body: JSON.stringify(report),
    });
    if (!resp.ok) {
      const text = await resp.text();
      console.error(`[emitter:${deviceId}] report rejected ${resp.status}: ${text}`);
    }
  } catch (err) {
    console.error(`[emitter:${deviceId}] network error`, err instanceof Error ? err.message : err);
  }
}

console.log(`[emitter] starting device ${deviceId} for shipment ${env.SHIPMENT_ID}`);
driveLoop(simulator, post, env.EMIT_INTERVAL_MS)
  .then((sent) => {
    console.log(`[emitter:${deviceId}] reached destination after ${sent} reports`);
  })
  .catch((err: unknown) => {
    console.error(`[emitter:${deviceId}] stopped`, err);
    process.exit(1);
  });
