import { z } from "zod";

import type { CoreErrorPayload } from "./errors.js";

/** Envelope of every request served by the core host. */
export const CoreRequestSchema = z
  .object({
    requestId: z.string().min(1).optional(),
    sessionId: z.string().trim().min(1),
    /** Requested profile; only honoured on the first request of a session. */
    sessionProfile: z.string().trim().min(1).optional(),
    sessionOrigin: z.string().optional(),
    /** Version reported by MCP clients; compared with the core version for agent origins. */
    clientVersion: z.string().optional(),
    capability: z.string().trim().min(1),
    method: z.string().trim().min(1),
    params: z.record(z.unknown()).default({}),
    idempotencyKey: z.string().trim().min(1).optional(),
  })
  .strict();

export type CoreRequest = z.infer<typeof CoreRequestSchema>;
export type CoreRequestInput = z.input<typeof CoreRequestSchema>;

export interface CoreResponse {
  requestId: string;
  ok: boolean;
  result?: unknown;
  error?: CoreErrorPayload;
}
