import type { StreamSession, StreamTransport, Tenant } from "@labframe/notify-core";
import type { Adapter, StreamHost } from "../types";

/** The slice of `http.ServerResponse` an event stream needs. */
export interface SseResponse {
  setHeader(name: string, value: string): unknown;
  writeHead(statusCode: number): unknown;
  write(chunk: string): boolean;
  end(): unknown;
  flushHeaders?(): void;
  on(event: "close", listener: () => void): unknown;
  once(event: "close" | "drain", listener: () => void): unknown;
  off(event: "close" | "drain", listener: () => void): unknown;
  readonly writableEnded?: boolean;
}

export const SSE_HEADERS: Readonly<Record<string, string>> = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
  // nginx buffers proxied responses unless told otherwise
  "X-Accel-Buffering": "no",
};

class ResponseTransport implements StreamTransport {
  private closed = false;

  constructor(private readonly res: SseResponse) {}

  get disconnected(): boolean {
    return this.closed || this.res.writableEnded === true;
  }

  markClosed(): void {
    this.closed = true;
  }

  write(frame: string): boolean {
    return this.res.write(frame);
  }

  drained(): Promise<void> {
    if (this.disconnected) return Promise.resolve();
    return new Promise(resolve => {
      const settle = () => {
        this.res.off("drain", settle);
        this.res.off("close", settle);
        resolve();
      };
      this.res.once("drain", settle);
      this.res.once("close", settle);
    });
  }
}

export class SseAdapter implements Adapter {
  public readonly name = "sse";
  private readonly sessions = new Set<StreamSession>();

  constructor(private readonly host: StreamHost) {}

  /**
   * Serve one client until it disconnects or the host shuts down.
   * Resolves once the subscription has been released and the response ended.
   */
  async handler(res: SseResponse, tenant: Tenant): Promise<void> {
    for (const [k, v] of Object.entries(SSE_HEADERS)) res.setHeader(k, v);
    res.writeHead(200);
    res.flushHeaders?.();
    const transport = new ResponseTransport(res);
    const { session, done } = this.host.stream(tenant, transport);
    this.sessions.add(session);
    res.on("close", () => {
      transport.markClosed();
      session.close();
    });
    try {
      await done;
    } finally {
      this.sessions.delete(session);
      if (!res.writableEnded) res.end();
    }
  }

  get activeSessions(): number {
    return this.sessions.size;
  }
}
