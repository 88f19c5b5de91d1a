import { errorMessage, type WorkflowEvent } from "@sct/contracts";
import { WebSocket } from "ws";

export interface ObserverConnection {
  readonly id: string;
  /** Must not wait on the remote end; a returned promise only reports late failures. */
  send(message: string): void | Promise<void>;
  close?(code: number, reason: string): void;
}

export interface EventPublisher {
  publish(event: WorkflowEvent): PublishReport;
}

export type PublishReport = {
  delivered: number;
  dropped: number;
};

export class ObserverDeliveryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ObserverDeliveryError";
  }
}

/**
 * Process-wide fan-out of workflow events. Delivery is best effort and at
 * most once per observer; an observer whose send throws or rejects is
 * removed, the others still receive the event.
 */
export class EventBroadcaster implements EventPublisher {
  private readonly observers = new Set<ObserverConnection>();
  private closed = false;

  get size(): number {
    return this.observers.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  register(connection: ObserverConnection): boolean {
    if (this.closed) {
      connection.close?.(1001, "server shutting down");
      return false;
    }
    this.observers.add(connection);
    return true;
  }

  unregister(connection: ObserverConnection): boolean {
    return this.observers.delete(connection);
  }

  has(connection: ObserverConnection): boolean {
    return this.observers.has(connection);
  }

  publish(event: WorkflowEvent): PublishReport {
    if (this.closed) {
      return { delivered: 0, dropped: 0 };
    }
    const message = JSON.stringify(event);
    let delivered = 0;
    let dropped = 0;

    // Snapshot: observers registered during this loop get the next event;
    // ones unregistered during it get nothing more.
    for (const connection of [...this.observers]) {
      if (!this.observers.has(connection)) {
        continue;
      }
      try {
        const pending = connection.send(message);
        if (pending instanceof Promise) {
          pending.catch((error: unknown) => {
            this.drop(connection, event.type, error);
          });
        }
        delivered += 1;
      } catch (error) {
        this.drop(connection, event.type, error);
        dropped += 1;
      }
    }
    return { delivered, dropped };
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const connection of [...this.observers]) {
      try {
        connection.close?.(1001, "server shutting down");
      } catch (error) {
        console.warn(`[control-tower] observer ${connection.id} failed to close: ${errorMessage(error)}`);
      }
    }
    this.observers.clear();
  }

  private drop(connection: ObserverConnection, eventType: string, error: unknown): void {
    if (!this.observers.delete(connection)) {
      return;
    }
    console.warn(
      `[control-tower] dropped observer ${connection.id} while delivering ${eventType}: ${errorMessage(error)}`,
    );
  }
}

/**
 * Adapts a `ws` socket. Sends are queued by `ws` and never awaited by the
 * broadcaster; a socket whose outbound buffer grows past `maxBufferedBytes`
 * is treated as failed.
 */
export class WebSocketObserver implements ObserverConnection {
  readonly id: string;
  private readonly socket: WebSocket;
  private readonly maxBufferedBytes: number;

  constructor(params: { id: string; socket: WebSocket; maxBufferedBytes: number }) {
    this.id = params.id;
    this.socket = params.socket;
    this.maxBufferedBytes = params.maxBufferedBytes;
  }

  send(message: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      throw new ObserverDeliveryError(`socket is not open (readyState=${this.socket.readyState})`);
    }
    if (this.socket.bufferedAmount > this.maxBufferedBytes) {
      this.socket.terminate();
      throw new ObserverDeliveryError(`outbound buffer exceeded ${this.maxBufferedBytes} bytes`);
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.send(message, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  close(code: number, reason: string): void {
    this.socket.close(code, reason);
  }
}
