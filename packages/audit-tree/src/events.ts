// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Trail Event Emitter
 *
 * `TrailEventEmitter` is a typed publish-subscribe bus that lets an
 * application observe a {@link Trail} as it is built, without the trail
 * itself writing anywhere.
 *
 * Supported events:
 *   - trail:step: a step ran (successfully or not)
 *   - trail:failure: the first failure of a trail was observed
 *   - trail:skipped: a step was not run because the trail had already failed
 *
 * Usage:
 * ```ts
 * const events = new TrailEventEmitter();
 * events.on(EVENT_FAILURE, (payload) => {
 *   console.log(`${payload.trail} failed:`, payload.reason);
 * });
 *
 * Trail.leaf(order, 'Order received', { name: 'settlement', events })
 *   .andThen(validate)
 *   .andThen(settle);
 * ```
 */

// ---------------------------------------------------------------------------
// Event type constants
// ---------------------------------------------------------------------------

/** Emitted after every step a trail runs. */
export const EVENT_STEP = 'trail:step' as const;

/** Emitted when a step fails and the trail starts short-circuiting. */
export const EVENT_FAILURE = 'trail:failure' as const;

/** Emitted for every step skipped because of an earlier failure. */
export const EVENT_SKIPPED = 'trail:skipped' as const;

export type TrailEventName = typeof EVENT_STEP | typeof EVENT_FAILURE | typeof EVENT_SKIPPED;

// ---------------------------------------------------------------------------
// Event payload interfaces
// ---------------------------------------------------------------------------

export interface TrailStepEventPayload {
  /** Name of the trail, from its configuration. */
  readonly trail: string;
  /** How the step ended. */
  readonly outcome: 'success' | 'failure';
  /** ISO 8601 timestamp of the step. */
  readonly timestamp: string;
}

export interface TrailFailureEventPayload {
  readonly trail: string;
  /** The failure reason, exactly as the step reported it. */
  readonly reason: unknown;
  readonly timestamp: string;
}

export interface TrailSkippedEventPayload {
  readonly trail: string;
  readonly timestamp: string;
}

/** Maps each event name to its payload type. */
export interface TrailEventPayloadMap {
  [EVENT_STEP]: TrailStepEventPayload;
  [EVENT_FAILURE]: TrailFailureEventPayload;
  [EVENT_SKIPPED]: TrailSkippedEventPayload;
}

export type TrailEventListener<E extends TrailEventName> = (
  payload: TrailEventPayloadMap[E],
) => void;

// ---------------------------------------------------------------------------
// TrailEventEmitter
// ---------------------------------------------------------------------------

interface ListenerEntry<E extends TrailEventName> {
  readonly listener: TrailEventListener<E>;
  readonly once: boolean;
}

type ListenerRegistry = {
  [E in TrailEventName]: Array<ListenerEntry<E>>;
};

/**
 * Typed event emitter for trail lifecycle events.
 *
 * Listeners run synchronously in registration order.  There is no Node.js
 * `EventEmitter` dependency, so the emitter works in any JavaScript runtime.
 */
export class TrailEventEmitter {
  readonly #listeners: ListenerRegistry = {
    [EVENT_STEP]: [],
    [EVENT_FAILURE]: [],
    [EVENT_SKIPPED]: [],
  };

  /**
   * Registers a persistent listener for the specified event.
   *
   * @returns `this` for fluent chaining.
   */
  on<E extends TrailEventName>(event: E, listener: TrailEventListener<E>): this {
    this.#entries(event).push({ listener, once: false });
    return this;
  }

  /** Registers a listener that is removed after its first invocation. */
  once<E extends TrailEventName>(event: E, listener: TrailEventListener<E>): this {
    this.#entries(event).push({ listener, once: true });
    return this;
  }

  /**
   * Removes a previously registered listener.  If it was registered more
   * than once, only the first matching entry is removed.
   */
  off<E extends TrailEventName>(event: E, listener: TrailEventListener<E>): this {
    const entries = this.#entries(event);
    const index = entries.findIndex((entry) => entry.listener === listener);
    if (index !== -1) {
      entries.splice(index, 1);
    }
    return this;
  }

  /**
   * Invokes every listener registered for `event`.
   *
   * Once-listeners are removed before invocation so a listener that emits
   * the same event cannot fire twice.
   *
   * @returns `true` if at least one listener was invoked.
   */
  emit<E extends TrailEventName>(event: E, payload: TrailEventPayloadMap[E]): boolean {
    const entries = this.#entries(event);
    if (entries.length === 0) return false;

    // Listeners added or removed during emission do not affect this call.
    const snapshot = [...entries];
    const remaining = entries.filter((entry) => !entry.once);
    entries.splice(0, entries.length, ...remaining);

    for (const { listener } of snapshot) {
      listener(payload);
    }
    return true;
  }

  /** Removes all listeners for `event`, or for every event if omitted. */
  removeAllListeners(event?: TrailEventName): this {
    if (event !== undefined) {
      this.#entries(event).length = 0;
    } else {
      this.#entries(EVENT_STEP).length = 0;
      this.#entries(EVENT_FAILURE).length = 0;
      this.#entries(EVENT_SKIPPED).length = 0;
    }
    return this;
  }

  listenerCount(event: TrailEventName): number {
    return this.#entries(event).length;
  }

  /** A copy of the listeners registered for `event`. */
  listeners<E extends TrailEventName>(event: E): ReadonlyArray<TrailEventListener<E>> {
    return this.#entries(event).map((entry) => entry.listener);
  }

  #entries<E extends TrailEventName>(event: E): Array<ListenerEntry<E>> {
    return this.#listeners[event];
  }
}
