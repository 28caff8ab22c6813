import type { StreamSession, StreamTransport, Tenant } from "@labframe/notify-core";

export type Health = { ok: boolean; detail?: string };

export interface Adapter {
  name: string;
  health?(): Promise<Health>;
}

/** A running stream: the session and the promise that settles when it has closed. */
export type OpenStream = { session: StreamSession; done: Promise<void> };

/**
 * What the SSE adapter needs from the host: turn a transport into a session
 * for a tenant whose detector is already registered.
 */
export interface StreamHost {
  stream(tenant: Tenant, transport: StreamTransport): OpenStream;
}
