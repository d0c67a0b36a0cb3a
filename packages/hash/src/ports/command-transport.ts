import type { WireCommand, WireValue } from "./wire-value"

/**
 * Issues one command and resolves with its reply.
 *
 * @remarks
 * - Exactly one reply per request, in submission order.
 * - Error replies from the store resolve as `{ kind: "error" }`.
 * - Connection, timeout and protocol failures reject. The command layer does
 *   not wrap or retry them.
 */
export interface CommandTransport {
  submit(command: WireCommand): Promise<WireValue>
}
