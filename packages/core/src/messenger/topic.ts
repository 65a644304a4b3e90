export type TopicKind = "event" | "state";

export type Unsubscribe = () => void;

// Method syntax keeps the comparator bivariant, so a Topic<Specific> fits where Topic<unknown> is listed.
export type IsEqual<Payload> = {
  compare(prev: Payload, next: Payload): boolean;
}["compare"];

export type Topic<Payload, Name extends string = string> = {
  name: Name;
  kind: TopicKind;
  /**
   * State topics keep the last payload as a snapshot and skip equal republishes.
   */
  remember: boolean;
  isEqual?: IsEqual<Payload>;
};

export type PayloadOfTopic<T> = T extends Topic<infer P, string> ? P : never;

export const eventTopic = <Payload, const Name extends string = string>(name: Name): Topic<Payload, Name> => ({
  name,
  kind: "event",
  remember: false,
});

export const stateTopic = <Payload, const Name extends string = string>(
  name: Name,
  opts: { isEqual?: IsEqual<Payload> } = {},
): Topic<Payload, Name> => ({
  name,
  kind: "state",
  remember: true,
  ...(opts.isEqual ? { isEqual: opts.isEqual } : {}),
});
