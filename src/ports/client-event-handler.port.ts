// =============================================================================
// ClientEventHandlerPort — Outbound sink for user-interaction requests
// =============================================================================

import type { ClientRequest } from "../domain/stream-message.schema.js";

/** One-way: the interpreter hands requests over and never waits on a reply. */
export interface ClientEventHandlerPort {
  handle(request: ClientRequest): void;
}
