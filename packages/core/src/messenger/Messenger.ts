import type { PayloadOfTopic, Topic, Unsubscribe } from "./topic.js";

export type SubscribeOptions = {
  /**
   * Replay the remembered snapshot to the new listener, if any.
   */
  replay?: boolean;
  signal?: AbortSignal;
};

export type ListenerErrorHandler = (info: { topic: string; error: unknown }) => void;

type AnyTopic = Topic<unknown, string>;
type AnyListener = (payload: unknown) => void;

export type ScopedMessenger<Topics extends readonly AnyTopic[]> = {
  publish<T extends Topics[number]>(topic: T, payload: PayloadOfTopic<T>): void;
  subscribe<T extends Topics[number]>(
    topic: T,
    handler: (payload: PayloadOfTopic<T>) => void,
    options?: SubscribeOptions,
  ): Unsubscribe;
  getSnapshot<T extends Topics[number]>(topic: T): PayloadOfTopic<T> | undefined;
};

export class Messenger {
  #listeners = new Map<string, Set<AnyListener>>();
  #snapshots = new Map<string, unknown>();
  #onListenerError: ListenerErrorHandler;

  constructor(opts: { onListenerError?: ListenerErrorHandler } = {}) {
    this.#onListenerError = opts.onListenerError ?? (() => {});
  }

  publish<T>(topic: Topic<T>, payload: T): void {
    if (topic.remember) {
      if (this.#snapshots.has(topic.name)) {
        const prev = this.#snapshots.get(topic.name) as T;
        const isEqual = topic.isEqual ?? Object.is;
        if (isEqual(prev, payload)) return;
      }
      this.#snapshots.set(topic.name, payload);
    }

    const set = this.#listeners.get(topic.name);
    if (!set) return;

    // Listener failures never reach the publisher.
    for (const handler of Array.from(set)) {
      this.#invoke(topic.name, handler, payload);
    }
  }

  subscribe<T>(topic: Topic<T>, handler: (payload: T) => void, options: SubscribeOptions = {}): Unsubscribe {
    const listener = handler as AnyListener;
    const set = this.#listeners.get(topic.name) ?? new Set<AnyListener>();
    set.add(listener);
    this.#listeners.set(topic.name, set);

    if (options.replay && this.#snapshots.has(topic.name)) {
      this.#invoke(topic.name, listener, this.#snapshots.get(topic.name));
    }

    const unsubscribe = () => {
      const current = this.#listeners.get(topic.name);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) this.#listeners.delete(topic.name);
    };

    if (options.signal) {
      if (options.signal.aborted) {
        unsubscribe();
      } else {
        options.signal.addEventListener("abort", unsubscribe, { once: true });
      }
    }

    return unsubscribe;
  }

  getSnapshot<T>(topic: Topic<T>): T | undefined {
    return this.#snapshots.get(topic.name) as T | undefined;
  }

  clear(): void {
    this.#listeners.clear();
    this.#snapshots.clear();
  }

  /**
   * Restricts a consumer to a fixed topic list; anything else is a programming error.
   */
  scope<const Topics extends readonly AnyTopic[]>(config: { name: string; topics: Topics }): ScopedMessenger<Topics> {
    const allowed = new Set(config.topics.map((topic) => topic.name));
    const assertAllowed = (topic: AnyTopic) => {
      if (!allowed.has(topic.name)) {
        throw new Error(`messenger scope(${config.name}) does not allow topic ${topic.name}`);
      }
    };

    const self = this;

    return {
      publish<T extends Topics[number]>(topic: T, payload: PayloadOfTopic<T>): void {
        assertAllowed(topic);
        self.publish(topic as unknown as Topic<PayloadOfTopic<T>>, payload);
      },
      subscribe<T extends Topics[number]>(
        topic: T,
        handler: (payload: PayloadOfTopic<T>) => void,
        options?: SubscribeOptions,
      ): Unsubscribe {
        assertAllowed(topic);
        return self.subscribe(topic as unknown as Topic<PayloadOfTopic<T>>, handler, options);
      },
      getSnapshot<T extends Topics[number]>(topic: T): PayloadOfTopic<T> | undefined {
        assertAllowed(topic);
        return self.getSnapshot(topic as unknown as Topic<PayloadOfTopic<T>>);
      },
    } satisfies ScopedMessenger<Topics>;
  }

  #invoke(topic: string, handler: AnyListener, payload: unknown) {
    try {
      handler(payload);
    } catch (error) {
      this.#onListenerError({ topic, error });
    }
  }
}
