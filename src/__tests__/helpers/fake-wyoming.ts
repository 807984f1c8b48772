/**
 * In-process Wyoming service. Each connect() opens a pair of in-memory pipes;
 * `serve` plays the service side of that connection.
 */

import { Duplex, PassThrough } from "stream";
import {
  encodeEvent,
  WyomingEventReader,
  wyomingConnection,
  type ConnectWyoming,
  type WyomingEvent,
} from "../../wyoming";

export interface ServiceSide {
  next(timeoutMs?: number): Promise<WyomingEvent | null>;
  /** Read until (and including) an event of `type`. */
  until(type: string): Promise<WyomingEvent[]>;
  send(ev: WyomingEvent): void;
  raw(bytes: string | Uint8Array): void;
  end(): void;
}

export interface FakeWyoming {
  connect: ConnectWyoming;
  readonly connections: number;
}

export function fakeWyoming(serve: (side: ServiceSide) => Promise<void> | void): FakeWyoming {
  let connections = 0;

  const connect: ConnectWyoming = async () => {
    connections++;
    const toService = new PassThrough();
    const toClient = new PassThrough();
    const reader = new WyomingEventReader(toService);

    const side: ServiceSide = {
      next: (timeoutMs) => reader.next(timeoutMs),
      until: async (type) => {
        const seen: WyomingEvent[] = [];
        for (;;) {
          const ev = await reader.next(1000);
          if (!ev) return seen;
          seen.push(ev);
          if (ev.type === type) return seen;
        }
      },
      send: (ev) => {
        if (!toClient.destroyed) toClient.write(encodeEvent(ev));
      },
      raw: (bytes) => {
        if (!toClient.destroyed) toClient.write(bytes);
      },
      end: () => toClient.end(),
    };

    Promise.resolve(serve(side)).catch((err: unknown) => {
      toClient.destroy(err instanceof Error ? err : new Error(String(err)));
    });

    return wyomingConnection(Duplex.from({ readable: toClient, writable: toService }));
  };

  return {
    connect,
    get connections() {
      return connections;
    },
  };
}
