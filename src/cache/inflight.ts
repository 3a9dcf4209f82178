// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Single-flight registry.
 *
 * Concurrent callers with the same key share one computation. The key
 * is released as soon as the computation settles, so later callers go
 * back through the cache rather than reusing a stale promise.
 *
 * The computation runs on its own signal, which aborts only once every
 * caller that joined it has aborted. One caller giving up never cancels
 * the work for the others.
 */

interface Flight<T> {
  promise: Promise<T>;
  controller: AbortController;
  callers: number;
}

export class InFlightRegistry<T> {
  private inFlight = new Map<string, Flight<T>>();

  /**
   * Run fn for key, or join the computation already running for it.
   * A caller without a signal keeps the shared computation alive.
   */
  run(key: string, fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    let flight = this.inFlight.get(key);
    if (!flight || flight.controller.signal.aborted) {
      flight = this.start(key, fn);
    }
    flight.callers++;

    if (!signal) {
      return flight.promise;
    }

    const joined = flight;
    const leave = (): void => {
      joined.callers--;
      if (joined.callers === 0) {
        joined.controller.abort(signal.reason);
      }
    };
    if (signal.aborted) {
      leave();
      return joined.promise;
    }
    signal.addEventListener('abort', leave, { once: true });
    return joined.promise.finally(() => signal.removeEventListener('abort', leave));
  }

  has(key: string): boolean {
    return this.inFlight.has(key);
  }

  get size(): number {
    return this.inFlight.size;
  }

  private start(key: string, fn: (signal: AbortSignal) => Promise<T>): Flight<T> {
    const controller = new AbortController();
    const flight: Flight<T> = {
      controller,
      callers: 0,
      promise: fn(controller.signal).finally(() => {
        if (this.inFlight.get(key) === flight) {
          this.inFlight.delete(key);
        }
      }),
    };
    this.inFlight.set(key, flight);
    return flight;
  }
}
