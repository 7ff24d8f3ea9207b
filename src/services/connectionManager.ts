import { logEvent, type LogFields } from "../utils/logEvent";

export class NotConnectedError extends Error {
  constructor(message = "Connection manager is not connected.") {
    super(message);
    this.name = "NotConnectedError";
  }
}

export type ConnectionEventLogger = (event: string, fields?: LogFields) => void;

export type ConnectionManagerOptions = {
  /** Included in lifecycle events so several managers can be told apart. */
  label?: string;
  logger?: ConnectionEventLogger;
};

// ---------------------------------------------------------------------------
// ConnectionManager
//
// Owns the connected flag and the in-memory store. The store only exists
// while connected: every connect() from the disconnected state starts with
// an empty map and disconnect() drops it, so nothing survives a cycle.
// ---------------------------------------------------------------------------

export class ConnectionManager<TRecord> {
  private store: Map<string, TRecord> | null = null;
  private readonly label: string;
  private readonly logger: ConnectionEventLogger;

  constructor(options: ConnectionManagerOptions = {}) {
    this.label = options.label || "default";
    this.logger = options.logger || logEvent;
  }

  /** No-op when already connected; the current store is kept. */
  connect(): void {
    if (this.store) {
      return;
    }

    this.store = new Map<string, TRecord>();
    this.logger("connection_opened", { connection: this.label });
  }

  disconnect(): void {
    if (!this.store) {
      return;
    }

    const discarded = this.store.size;
    this.store = null;
    this.logger("connection_closed", {
      connection: this.label,
      discarded_records: discarded,
    });
  }

  isConnected(): boolean {
    return this.store !== null;
  }

  getStore(): Map<string, TRecord> {
    if (!this.store) {
      throw new NotConnectedError();
    }

    return this.store;
  }
}
