export type { ListenerErrorHandler, ScopedMessenger, SubscribeOptions } from "./Messenger.js";
export { Messenger } from "./Messenger.js";
export type { PayloadOfTopic, Topic, TopicKind, Unsubscribe } from "./topic.js";
export { eventTopic, stateTopic } from "./topic.js";
