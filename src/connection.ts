import { createConnection, type Socket } from "net";
import { logger } from "./log.js";

const log = logger.child({ component: "connection" });

export class ConnectionError extends Error {
  constructor(public host: string, public port: number, public code: string | undefined, detail: string) {
    super(`Connection to ${host}:${port} failed: ${detail}`);
    this.name = "ConnectionError";
  }
}

function errorCode(e: Error): string | undefined {
  return "code" in e && typeof e.code === "string" ? e.code : undefined;
}

type Waiter = {
  resolve: () => void;
  reject: (err: Error) => void;
};

/**
 * A single TCP socket used for blocking-style exchanges: write a request,
 * then take one read of whatever the peer has sent so far.
 */
export class ProbeConnection {
  private pending: Buffer = Buffer.alloc(0);
  private ended = false;
  private failure: Error | null = null;
  private waiter: Waiter | null = null;
  private closed = false;

  private constructor(private socket: Socket, private maxPending: number) {
    socket.on("data", (chunk: Buffer) => {
      this.pending = Buffer.concat([this.pending, chunk]);
      // Leave the rest in the kernel until a read makes room
      if (this.pending.length >= this.maxPending) socket.pause();
      this.wake();
    });
    socket.on("end", () => {
      this.ended = true;
      this.wake();
    });
    socket.on("error", (err: Error) => {
      this.failure = err;
      const w = this.waiter;
      this.waiter = null;
      w?.reject(err);
    });
  }

  static open(host: string, port: number, maxPending = 64 * 1024): Promise<ProbeConnection> {
    return new Promise((resolve, reject) => {
      let socket: Socket;
      try {
        // Half-open: a peer closing its side must not end ours before the next write
        socket = createConnection({ host, port, allowHalfOpen: true });
      } catch (e) {
        const err = e instanceof Error ? e : new Error(String(e));
        reject(new ConnectionError(host, port, errorCode(err), err.message));
        return;
      }
      const onError = (err: Error) => {
        socket.destroy();
        reject(new ConnectionError(host, port, errorCode(err), err.message));
      };
      socket.once("error", onError);
      socket.once("connect", () => {
        socket.off("error", onError);
        log.debug("connection.open", { host, port });
        resolve(new ProbeConnection(socket, maxPending));
      });
    });
  }

  send(bytes: Uint8Array): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => {
      this.socket.write(bytes, (err) => (err ? reject(err) : resolve()));
    });
  }

  /** One read of at most `maxBytes`; empty once the peer has closed its side. */
  async readOnce(maxBytes: number): Promise<Buffer> {
    while (this.pending.length === 0 && !this.ended) {
      if (this.failure) throw this.failure;
      await new Promise<void>((resolve, reject) => {
        this.waiter = { resolve, reject };
      });
    }
    const out = this.pending.subarray(0, maxBytes);
    this.pending = this.pending.subarray(out.length);
    if (this.pending.length < this.maxPending && this.socket.isPaused()) this.socket.resume();
    return out;
  }

  get paused(): boolean {
    return this.socket.isPaused();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.socket.destroy();
    log.debug("connection.close", {});
  }

  private wake() {
    const w = this.waiter;
    this.waiter = null;
    w?.resolve();
  }
}
