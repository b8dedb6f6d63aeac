import type { Request } from 'express';

export const SYSTEM_ACTOR = 'system';

/** Caller identity from `x-user-id`; requests without one act as `system`. */
export function actorOf(req: Request): string {
  const header = req.header('x-user-id')?.trim();
  return header ? header : SYSTEM_ACTOR;
}
